import {
  PostgreSQLClient,
  buildDumpArguments,
  buildDumpEnvironment,
} from '../src/clients/PostgreSQLClient';
import { ConnectionSpec } from '../src/interfaces/ConnectionSpec';
import { DumpToolError } from '../src/errors';
import { createMockLogger } from './helpers/mockLogger';
import { Client } from 'pg';
import { spawn, ChildProcess } from 'child_process';
import { promises as fs, Stats } from 'fs';
import { EventEmitter } from 'events';

// Mock dependencies
jest.mock('pg');
jest.mock('child_process');
jest.mock('fs', () => ({
  promises: {
    stat: jest.fn(),
    unlink: jest.fn(),
  },
}));

const mockClient = {
  connect: jest.fn(),
  query: jest.fn(),
  end: jest.fn(),
};

const mockSpawn = spawn as jest.MockedFunction<typeof spawn>;
const mockFs = fs as jest.Mocked<typeof fs>;
const MockedClient = Client as jest.MockedClass<typeof Client>;

interface MockProcess extends EventEmitter {
  stdout: EventEmitter;
  stderr: EventEmitter;
}

describe('PostgreSQLClient', () => {
  const spec: ConnectionSpec = {
    host: 'db.example.com',
    port: 5433,
    database: 'mydb',
    user: 'alice',
    password: 'secret',
  };
  let client: PostgreSQLClient;
  let mockLogger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    jest.clearAllMocks();
    MockedClient.mockImplementation(() => mockClient as unknown as Client);
    mockLogger = createMockLogger();
    client = new PostgreSQLClient(spec, mockLogger);
  });

  describe('buildDumpArguments', () => {
    it('should pass host, user, database, custom format and output path', () => {
      expect(buildDumpArguments(spec, '/backups/backup.sql')).toEqual([
        '-h',
        'db.example.com',
        '-U',
        'alice',
        '-d',
        'mydb',
        '-F',
        'c',
        '-f',
        '/backups/backup.sql',
      ]);
    });

    it('should leave out -U when no user was resolved', () => {
      const noUser: ConnectionSpec = { host: 'db', port: 5432, database: 'mydb', password: 'x' };

      expect(buildDumpArguments(noUser, '/out.sql')).toEqual([
        '-h',
        'db',
        '-d',
        'mydb',
        '-F',
        'c',
        '-f',
        '/out.sql',
      ]);
    });

    it('should never put the password on the command line', () => {
      expect(buildDumpArguments(spec, '/out.sql')).not.toContain('secret');
    });
  });

  describe('buildDumpEnvironment', () => {
    it('should add the password and port to a copy of the base environment', () => {
      const baseEnv = { PATH: '/usr/bin', LANG: 'C' };

      const env = buildDumpEnvironment(spec, baseEnv);

      expect(env).toEqual({
        PATH: '/usr/bin',
        LANG: 'C',
        PGPASSWORD: 'secret',
        PGPORT: '5433',
      });
      expect(baseEnv).toEqual({ PATH: '/usr/bin', LANG: 'C' });
    });
  });

  describe('testConnection', () => {
    it('should connect with the resolved parameters and close the connection', async () => {
      mockClient.connect.mockResolvedValue(undefined);
      mockClient.query.mockResolvedValue({ rows: [] });
      mockClient.end.mockResolvedValue(undefined);

      await expect(client.testConnection()).resolves.toBeUndefined();

      expect(MockedClient).toHaveBeenCalledWith({
        host: 'db.example.com',
        port: 5433,
        database: 'mydb',
        user: 'alice',
        password: 'secret',
      });
      expect(mockClient.query).toHaveBeenCalledWith('SELECT 1');
      expect(mockClient.end).toHaveBeenCalled();
    });

    it('should raise a ConnectivityError when the connection fails', async () => {
      mockClient.connect.mockRejectedValue(new Error('connect ECONNREFUSED'));
      mockClient.end.mockResolvedValue(undefined);

      await expect(client.testConnection()).rejects.toMatchObject({
        name: 'ConnectivityError',
        stage: 'connectivity',
        message: 'Cannot connect to db.example.com:5433/mydb: Error: connect ECONNREFUSED',
      });
      expect(mockClient.end).toHaveBeenCalled();
    });

    it('should redact the password from driver errors', async () => {
      mockClient.connect.mockRejectedValue(new Error('password "secret" was rejected'));
      mockClient.end.mockResolvedValue(undefined);

      await expect(client.testConnection()).rejects.toThrow(
        'Cannot connect to db.example.com:5433/mydb: Error: password "[REDACTED]" was rejected'
      );
    });

    it('should only warn when closing the connection fails', async () => {
      mockClient.connect.mockResolvedValue(undefined);
      mockClient.query.mockResolvedValue({ rows: [] });
      mockClient.end.mockRejectedValue(new Error('Cleanup failed'));

      await expect(client.testConnection()).resolves.toBeUndefined();
      expect(mockLogger.warn).toHaveBeenCalledWith(
        'Failed to close database connection during cleanup',
        { error: 'Error: Cleanup failed' }
      );
    });
  });

  describe('createDump', () => {
    const outputPath = '/backups/backup-20240115030405.sql';
    let mockProcess: MockProcess;

    beforeEach(() => {
      mockProcess = Object.assign(new EventEmitter(), {
        stdout: new EventEmitter(),
        stderr: new EventEmitter(),
      });
      mockSpawn.mockReturnValue(mockProcess as unknown as ChildProcess);
      mockFs.stat.mockResolvedValue({ size: 2048 } as Stats);
      mockFs.unlink.mockResolvedValue(undefined);
    });

    it('should run pg_dump with a scoped environment', async () => {
      const passwordBefore = process.env.PGPASSWORD;

      const dumpPromise = client.createDump(outputPath);
      mockProcess.emit('close', 0);
      const result = await dumpPromise;

      expect(result).toEqual({
        filePath: outputPath,
        fileSize: 2048,
        databaseName: 'mydb',
        timestamp: expect.any(Date),
      });
      expect(mockSpawn).toHaveBeenCalledWith(
        'pg_dump',
        ['-h', 'db.example.com', '-U', 'alice', '-d', 'mydb', '-F', 'c', '-f', outputPath],
        {
          stdio: ['ignore', 'pipe', 'pipe'],
          env: expect.objectContaining({ PGPASSWORD: 'secret', PGPORT: '5433' }),
        }
      );
      expect(process.env.PGPASSWORD).toBe(passwordBefore);
      expect(mockFs.unlink).not.toHaveBeenCalled();
    });

    it('should report authentication failures', async () => {
      const dumpPromise = client.createDump(outputPath);
      mockProcess.stderr.emit(
        'data',
        Buffer.from('pg_dump: error: FATAL:  password authentication failed for user "alice"')
      );
      mockProcess.emit('close', 1);

      await expect(dumpPromise).rejects.toMatchObject({
        name: 'DumpToolError',
        exitCode: 1,
        message: 'pg_dump authentication failed (exit code 1). Please check database credentials.',
      });
      expect(mockFs.unlink).toHaveBeenCalledWith(outputPath);
    });

    it('should carry the exit code and redacted stderr for other failures', async () => {
      const dumpPromise = client.createDump(outputPath);
      mockProcess.stderr.emit('data', Buffer.from('unexpected output mentioning secret\n'));
      mockProcess.emit('close', 2);

      await expect(dumpPromise).rejects.toMatchObject({
        name: 'DumpToolError',
        stage: 'dump',
        exitCode: 2,
        message:
          'pg_dump failed with exit code 2. Error details: unexpected output mentioning [REDACTED]',
      });
    });

    it('should report a missing pg_dump binary', async () => {
      const dumpPromise = client.createDump(outputPath);
      mockProcess.emit('error', new Error('spawn pg_dump ENOENT'));

      await expect(dumpPromise).rejects.toThrow(
        'pg_dump command not found. Please ensure PostgreSQL client tools are installed.'
      );
    });

    it('should fail when pg_dump exits cleanly without writing a file', async () => {
      mockFs.stat.mockRejectedValue(new Error('ENOENT: no such file or directory'));

      const dumpPromise = client.createDump(outputPath);
      mockProcess.emit('close', 0);

      await expect(dumpPromise).rejects.toBeInstanceOf(DumpToolError);
    });

    it('should log pg_dump warnings', async () => {
      const dumpPromise = client.createDump(outputPath);
      mockProcess.stderr.emit('data', Buffer.from('WARNING: some extension is out of date\n'));
      mockProcess.emit('close', 0);
      await dumpPromise;

      expect(mockLogger.warn).toHaveBeenCalledWith('pg_dump warning', {
        output: 'WARNING: some extension is out of date',
      });
    });
  });

  it('should expose the database name', () => {
    expect(client.getDatabaseName()).toBe('mydb');
  });
});
