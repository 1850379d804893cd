import { promises as fs } from 'fs';
import { basename, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { BackupManager as IBackupManager, BackupResult } from '../interfaces/BackupManager';
import { PostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { Compressor } from '../interfaces/Compressor';
import { StorageClient } from '../interfaces/StorageClient';
import { RetentionManager } from '../interfaces/RetentionManager';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { ConnectivityError, FilesystemError, formatError, toError } from '../errors';

export interface BackupManagerDependencies {
  postgresClient: PostgreSQLClient;
  compressor: Compressor;
  storageClient: StorageClient;
  retentionManager: RetentionManager;
  logger: Logger;
}

/**
 * Format a date as YYYYMMDDHHMMSS in local time
 */
export function formatBackupTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');

  return (
    String(date.getFullYear()) +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

/**
 * Name of the uncompressed dump for a run; compression appends .gz
 */
export function buildDumpFileName(date: Date): string {
  return `backup-${formatBackupTimestamp(date)}.sql`;
}

/**
 * BackupManager implementation that runs one backup from start to finish:
 * connectivity check, pg_dump, gzip, upload, retention.
 * The first failure rejects the run; nothing is retried.
 */
export class BackupManager implements IBackupManager {
  private postgresClient: PostgreSQLClient;
  private compressor: Compressor;
  private storageClient: StorageClient;
  private retentionManager: RetentionManager;
  private logger: Logger;
  private config: BackupConfig;

  constructor(config: BackupConfig, dependencies: BackupManagerDependencies) {
    this.config = config;
    this.postgresClient = dependencies.postgresClient;
    this.compressor = dependencies.compressor;
    this.storageClient = dependencies.storageClient;
    this.retentionManager = dependencies.retentionManager;
    this.logger = dependencies.logger;
  }

  async executeBackup(): Promise<BackupResult> {
    const startTime = Date.now();
    const runId = uuidv4();
    const dumpPath = join(this.config.backupDir, buildDumpFileName(new Date(startTime)));

    this.logger.logBackupStart(this.postgresClient.getDatabaseName(), {
      runId,
      backupDir: this.config.backupDir,
      storageProvider: this.storageClient.provider,
    });

    await this.ensureBackupDirectory();

    this.logger.info(`[${runId}] Testing database connectivity`);
    await this.postgresClient.testConnection();

    this.logger.info(`[${runId}] Dumping database to ${dumpPath}`);
    const dump = await this.postgresClient.createDump(dumpPath);

    this.logger.info(`[${runId}] Compressing dump`);
    const compressed = await this.compressor.compress(dump.filePath);
    const fileName = basename(compressed.filePath);

    this.logger.info(`[${runId}] Uploading ${fileName} to ${this.storageClient.provider}`);
    const upload = await this.storageClient.uploadFile(compressed.filePath, fileName);
    this.logger.info(`[${runId}] Backup uploaded: ${upload.id}`, { location: upload.location });

    const retention = await this.retentionManager.enforceRetention();

    const duration = Date.now() - startTime;
    this.logger.logBackupComplete(fileName, compressed.compressedSize, upload.location, duration);

    return {
      runId,
      fileName,
      artifactPath: compressed.filePath,
      fileSize: compressed.compressedSize,
      uploadId: upload.id,
      location: upload.location,
      evictedFiles: retention.evicted.map(artifact => artifact.fileName),
      retainedCount: retention.retainedCount,
      duration,
    };
  }

  /**
   * Check database and storage connectivity without dumping anything
   */
  async validateConfiguration(): Promise<boolean> {
    try {
      await this.postgresClient.testConnection();
    } catch (error) {
      if (error instanceof ConnectivityError) {
        this.logger.error('PostgreSQL connection test failed', error);
        return false;
      }
      throw error;
    }
    this.logger.info('PostgreSQL connection test passed');

    const storageConnected = await this.storageClient.testConnection();
    if (!storageConnected) {
      this.logger.error(`${this.storageClient.provider} storage connection test failed`);
      return false;
    }
    this.logger.info(`${this.storageClient.provider} storage connection test passed`);

    return true;
  }

  private async ensureBackupDirectory(): Promise<void> {
    try {
      await fs.mkdir(this.config.backupDir, { recursive: true });
    } catch (error) {
      throw new FilesystemError(
        `Failed to create backup directory ${this.config.backupDir}: ${formatError(error)}`,
        this.config.backupDir,
        toError(error)
      );
    }
  }
}
