import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { BackupError } from '../errors';

const SENSITIVE_KEYS = ['password', 'secret', 'key', 'token', 'credential', 'databaseurl', 'db_url'];

/**
 * Replace the value of every key that looks like it holds a secret, recursing into
 * nested objects
 */
export function sanitizeMeta(meta: LogMeta): LogMeta {
  const sanitized: LogMeta = { ...meta };

  for (const [key, value] of Object.entries(sanitized)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeMeta(value);
    }
  }

  return sanitized;
}

function isPlainObject(value: unknown): value is LogMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some(level => level === value);
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: LogMeta = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [new winston.transports.Console()],
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta: LogMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...(error instanceof BackupError ? { stage: error.stage } : {}),
          ...('code' in error ? { code: error.code } : {}),
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logBackupStart(databaseName: string, meta?: LogMeta): void {
    this.info('Backup operation started', {
      operation: 'backup_start',
      databaseName,
      ...meta,
    });
  }

  logBackupComplete(fileName: string, fileSize: number, location: string, duration: number): void {
    this.info('Backup operation completed successfully', {
      operation: 'backup_complete',
      fileName,
      fileSize,
      location,
      duration,
      fileSizeMB: Math.round((fileSize / 1024 / 1024) * 100) / 100,
    });
  }

  logBackupError(operation: string, error: Error, meta?: LogMeta): void {
    this.error(`Backup operation failed: ${operation}`, error, {
      operation: 'backup_error',
      failedOperation: operation,
      ...meta,
    });
  }

  logRetentionCleanup(deletedCount: number, retainedCount: number, maxBackups: number): void {
    this.info('Retention cleanup completed', {
      operation: 'retention_cleanup',
      deletedCount,
      retainedCount,
      maxBackups,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config: sanitizeMeta(config),
    });
  }

  logScheduledExecution(cronExpression: string): void {
    this.info('Scheduled backup execution triggered', {
      operation: 'scheduled_execution',
      cronExpression,
    });
  }
}
