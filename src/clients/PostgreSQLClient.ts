import { Client } from 'pg';
import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import { PostgreSQLClient as IPostgreSQLClient, DumpInfo } from '../interfaces/PostgreSQLClient';
import { ConnectionSpec } from '../interfaces/ConnectionSpec';
import { Logger } from '../interfaces/Logger';
import { ConnectivityError, DumpToolError, formatError, toError } from '../errors';
import { describeConnection } from './ConnectionStringParser';

const PG_DUMP_COMMAND = 'pg_dump';
const STDERR_TAIL_LENGTH = 2000;

/**
 * Environment for the pg_dump subprocess: a copy of the parent environment plus the
 * password and port. The parent process.env is never modified, so the secret only lives
 * in the child's environment block.
 */
export function buildDumpEnvironment(
  spec: ConnectionSpec,
  baseEnv: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  return {
    ...baseEnv,
    PGPASSWORD: spec.password,
    PGPORT: String(spec.port),
  };
}

/**
 * pg_dump arguments for a custom-format dump. -U is left out when no user was resolved.
 */
export function buildDumpArguments(spec: ConnectionSpec, outputPath: string): string[] {
  const args = ['-h', spec.host];
  if (spec.user) {
    args.push('-U', spec.user);
  }
  args.push('-d', spec.database, '-F', 'c', '-f', outputPath);
  return args;
}

/**
 * PostgreSQL client implementation for the connectivity check and pg_dump
 */
export class PostgreSQLClient implements IPostgreSQLClient {
  private spec: ConnectionSpec;
  private logger: Logger;

  constructor(spec: ConnectionSpec, logger: Logger) {
    this.spec = spec;
    this.logger = logger;
  }

  /**
   * Open a connection, run a trivial query and close it again.
   * Any failure aborts the run before a dump is attempted.
   */
  async testConnection(): Promise<void> {
    const client = new Client({
      host: this.spec.host,
      port: this.spec.port,
      database: this.spec.database,
      user: this.spec.user,
      password: this.spec.password,
    });

    try {
      await client.connect();
      await client.query('SELECT 1');
      this.logger.debug('PostgreSQL connection test passed', {
        database: describeConnection(this.spec),
      });
    } catch (error) {
      throw new ConnectivityError(
        `Cannot connect to ${describeConnection(this.spec)}: ${this.redact(formatError(error))}`,
        toError(error)
      );
    } finally {
      await client.end().catch(cleanupError => {
        this.logger.warn('Failed to close database connection during cleanup', {
          error: formatError(cleanupError),
        });
      });
    }
  }

  /**
   * Dump the database in custom format to outputPath
   */
  async createDump(outputPath: string): Promise<DumpInfo> {
    const timestamp = new Date();

    this.logger.info(`Creating PostgreSQL dump for database: ${this.spec.database}`, {
      outputPath,
    });

    try {
      await this.executePgDump(outputPath);
    } catch (error) {
      await this.removePartialDump(outputPath);
      throw error;
    }

    let fileSize: number;
    try {
      fileSize = (await fs.stat(outputPath)).size;
    } catch (error) {
      throw new DumpToolError(
        `pg_dump reported success but no dump was written to ${outputPath}: ${formatError(error)}`,
        0,
        toError(error)
      );
    }

    this.logger.info(`PostgreSQL dump created: ${fileSize} bytes`, { outputPath });

    return {
      filePath: outputPath,
      fileSize,
      databaseName: this.spec.database,
      timestamp,
    };
  }

  getDatabaseName(): string {
    return this.spec.database;
  }

  /**
   * Spawn pg_dump and settle once it exits
   */
  private executePgDump(outputPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const pgDump = spawn(PG_DUMP_COMMAND, buildDumpArguments(this.spec, outputPath), {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: buildDumpEnvironment(this.spec),
      });

      let stderr = '';

      pgDump.stdout.on('data', (data: Buffer) => {
        this.logger.debug('pg_dump output', { output: data.toString().trim() });
      });

      pgDump.stderr.on('data', (data: Buffer) => {
        const chunk = data.toString();
        stderr += chunk;

        if (chunk.includes('WARNING') || chunk.includes('NOTICE')) {
          this.logger.warn('pg_dump warning', { output: chunk.trim() });
        }
      });

      pgDump.on('error', error => {
        reject(new DumpToolError(this.analyzePgDumpSpawnError(error), undefined, error));
      });

      pgDump.on('close', code => {
        if (code === 0) {
          this.logger.debug('pg_dump completed successfully');
          resolve();
          return;
        }

        const exitCode = code ?? -1;
        reject(new DumpToolError(this.analyzePgDumpError(exitCode, stderr), exitCode));
      });
    });
  }

  /**
   * Map common pg_dump failures to readable messages
   */
  private analyzePgDumpError(exitCode: number, stderr: string): string {
    const lowerStderr = stderr.toLowerCase();

    if (lowerStderr.includes('password authentication failed')) {
      return `pg_dump authentication failed (exit code ${exitCode}). Please check database credentials.`;
    }

    if (lowerStderr.includes('database') && lowerStderr.includes('does not exist')) {
      return `pg_dump failed: database "${this.spec.database}" does not exist (exit code ${exitCode}).`;
    }

    if (lowerStderr.includes('permission denied')) {
      return `pg_dump failed: insufficient permissions to dump the database (exit code ${exitCode}).`;
    }

    if (lowerStderr.includes('no space left on device')) {
      return `pg_dump failed: insufficient disk space (exit code ${exitCode}).`;
    }

    const details = this.redact(stderr.trim()).slice(-STDERR_TAIL_LENGTH);
    return `pg_dump failed with exit code ${exitCode}. Error details: ${details || 'none'}`;
  }

  private analyzePgDumpSpawnError(error: Error): string {
    const message = error.message.toLowerCase();

    if (message.includes('enoent')) {
      return 'pg_dump command not found. Please ensure PostgreSQL client tools are installed.';
    }

    if (message.includes('eacces')) {
      return 'Permission denied executing pg_dump. Please check file permissions.';
    }

    return `Failed to execute pg_dump: ${error.message}`;
  }

  private async removePartialDump(outputPath: string): Promise<void> {
    try {
      await fs.unlink(outputPath);
      this.logger.debug(`Removed partial dump file: ${outputPath}`);
    } catch (error) {
      this.logger.debug(`No partial dump file removed at ${outputPath}`, {
        error: formatError(error),
      });
    }
  }

  private redact(text: string): string {
    return text.split(this.spec.password).join('[REDACTED]');
  }
}
