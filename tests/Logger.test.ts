// Mock winston to capture log calls
const mockWinstonLogger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
};

jest.mock('winston', () => ({
  createLogger: jest.fn(() => mockWinstonLogger),
  format: {
    combine: jest.fn(),
    timestamp: jest.fn(),
    errors: jest.fn(),
    printf: jest.fn(),
  },
  transports: {
    Console: jest.fn(),
  },
}));

import winston from 'winston';
import { Logger, sanitizeMeta, isLogLevel } from '../src/clients/Logger';
import { LogLevel } from '../src/interfaces/Logger';
import { UploadError } from '../src/errors';

describe('sanitizeMeta', () => {
  it('should redact keys that look like secrets', () => {
    expect(
      sanitizeMeta({
        password: 'test-secret',
        apiToken: 'test-token',
        storageCredentials: { private_key: 'test-private-key' },
        databaseUrl: 'postgresql://alice:test-secret@db/mydb',
        runId: 'run-1',
      })
    ).toEqual({
      password: '[REDACTED]',
      apiToken: '[REDACTED]',
      storageCredentials: '[REDACTED]',
      databaseUrl: '[REDACTED]',
      runId: 'run-1',
    });
  });

  it('should recurse into nested objects and leave arrays and dates alone', () => {
    const when = new Date('2024-01-15T03:04:05Z');

    expect(
      sanitizeMeta({
        config: { backupDir: '/backups', secretAccessKey: 'test-secret' },
        evicted: ['backup-20240101000000.sql.gz'],
        when,
      })
    ).toEqual({
      config: { backupDir: '/backups', secretAccessKey: '[REDACTED]' },
      evicted: ['backup-20240101000000.sql.gz'],
      when,
    });
  });

  it('should not modify its input', () => {
    const meta = { password: 'test-secret' };

    sanitizeMeta(meta);

    expect(meta).toEqual({ password: 'test-secret' });
  });
});

describe('isLogLevel', () => {
  it('should accept the known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('INFO')).toBe(false);
  });
});

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = new Logger(LogLevel.DEBUG);
  });

  it('should create a winston logger at the requested level', () => {
    expect(winston.createLogger).toHaveBeenCalledWith(
      expect.objectContaining({ level: 'debug' })
    );
  });

  describe('output format', () => {
    type Formatter = Parameters<typeof winston.format.printf>[0];

    function formatLine(info: Parameters<Formatter>[0]): string {
      const formatter = jest.mocked(winston.format.printf).mock.calls[0][0];
      return formatter(info);
    }

    it('should write one JSON object with redacted metadata', () => {
      const line = formatLine({
        timestamp: '2024-01-15T03:04:05.000Z',
        level: 'info',
        message: 'Backup uploaded',
        runId: 'run-1',
        password: 'test-secret',
      });

      expect(line).toBe(
        '{"timestamp":"2024-01-15T03:04:05.000Z","level":"info","message":"Backup uploaded","meta":{"runId":"run-1","password":"[REDACTED]"}}'
      );
    });

    it('should include the stack and omit empty metadata', () => {
      const line = formatLine({
        timestamp: '2024-01-15T03:04:05.000Z',
        level: 'error',
        message: 'boom',
        stack: 'Error: boom\n    at test',
      });

      expect(JSON.parse(line)).toEqual({
        timestamp: '2024-01-15T03:04:05.000Z',
        level: 'error',
        message: 'boom',
        stack: 'Error: boom\n    at test',
      });
    });
  });

  describe('Basic logging methods', () => {
    it('should log info, warn and debug messages', () => {
      const meta = { key: 'value' };

      logger.info('info message', meta);
      logger.warn('warn message', meta);
      logger.debug('debug message', meta);

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('info message', meta);
      expect(mockWinstonLogger.warn).toHaveBeenCalledWith('warn message', meta);
      expect(mockWinstonLogger.debug).toHaveBeenCalledWith('debug message', meta);
    });

    it('should log error messages with error object', () => {
      const error = new Error('Test error');

      logger.error('Test error message', error, { key: 'value' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Test error message', {
        key: 'value',
        error: {
          name: 'Error',
          message: 'Test error',
          stack: error.stack,
        },
      });
    });

    it('should include the stage of a backup error and the code of a system error', () => {
      const uploadError = new UploadError('Failed to upload');
      const systemError = Object.assign(new Error('permission denied'), { code: 'EACCES' });

      logger.error('upload failed', uploadError);
      logger.error('write failed', systemError);

      expect(mockWinstonLogger.error).toHaveBeenNthCalledWith(1, 'upload failed', {
        error: {
          name: 'UploadError',
          message: 'Failed to upload',
          stack: uploadError.stack,
          stage: 'upload',
        },
      });
      expect(mockWinstonLogger.error).toHaveBeenNthCalledWith(2, 'write failed', {
        error: {
          name: 'Error',
          message: 'permission denied',
          stack: systemError.stack,
          code: 'EACCES',
        },
      });
    });

    it('should log error messages without error object', () => {
      logger.error('Test error message', undefined, { key: 'value' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Test error message', {
        key: 'value',
      });
    });
  });

  describe('Specialized logging methods', () => {
    it('should log backup start', () => {
      logger.logBackupStart('mydb', { runId: 'run-1' });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Backup operation started', {
        operation: 'backup_start',
        databaseName: 'mydb',
        runId: 'run-1',
      });
    });

    it('should log backup completion with the size in megabytes', () => {
      logger.logBackupComplete(
        'backup-20240115030405.sql.gz',
        1572864,
        'gdrive://folder-123/backup-20240115030405.sql.gz',
        5000
      );

      expect(mockWinstonLogger.info).toHaveBeenCalledWith(
        'Backup operation completed successfully',
        {
          operation: 'backup_complete',
          fileName: 'backup-20240115030405.sql.gz',
          fileSize: 1572864,
          location: 'gdrive://folder-123/backup-20240115030405.sql.gz',
          duration: 5000,
          fileSizeMB: 1.5,
        }
      );
    });

    it('should log backup errors with the failed stage', () => {
      const error = new UploadError('Failed to upload');

      logger.logBackupError('upload', error, { duration: 10 });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Backup operation failed: upload', {
        operation: 'backup_error',
        failedOperation: 'upload',
        duration: 10,
        error: {
          name: 'UploadError',
          message: 'Failed to upload',
          stack: error.stack,
          stage: 'upload',
        },
      });
    });

    it('should log retention cleanup', () => {
      logger.logRetentionCleanup(2, 7, 7);

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Retention cleanup completed', {
        operation: 'retention_cleanup',
        deletedCount: 2,
        retainedCount: 7,
        maxBackups: 7,
      });
    });

    it('should sanitize the configuration it logs at startup', () => {
      logger.logConfigurationStart({ backupDir: '/backups', storageCredentials: { a: 1 } });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith(
        'Application starting with configuration',
        {
          operation: 'startup',
          config: { backupDir: '/backups', storageCredentials: '[REDACTED]' },
        }
      );
    });

    it('should log scheduled executions', () => {
      logger.logScheduledExecution('0 2 * * *');

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Scheduled backup execution triggered', {
        operation: 'scheduled_execution',
        cronExpression: '0 2 * * *',
      });
    });
  });
});
