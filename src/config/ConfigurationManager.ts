import { tmpdir } from 'os';
import { join } from 'path';
import * as cron from 'node-cron';
import { BackupConfig, StorageProvider } from '../interfaces/BackupConfig';
import { LogLevel } from '../interfaces/Logger';
import { EnvironmentConfig } from '../types/EnvironmentConfig';
import { ConfigurationError } from '../errors';
import { isLogLevel } from '../clients/Logger';

export { ConfigurationError };

export const DEFAULT_MAX_BACKUPS = 7;
export const DEFAULT_TIMEZONE = 'UTC';

type EnvironmentKey = keyof EnvironmentConfig;
type Environment = Partial<Record<string, string>>;

const STORAGE_PROVIDERS: readonly StorageProvider[] = ['gdrive', 's3'];

/**
 * Builds the BackupConfig once at process start from environment variables
 */
export class ConfigurationManager {
  /**
   * Load and validate configuration
   * @throws ConfigurationError naming the first offending variable
   */
  static loadConfiguration(env: Environment = process.env): BackupConfig {
    const read = (name: EnvironmentKey): string | undefined => {
      const value = env[name]?.trim();
      return value ? value : undefined;
    };

    const databaseUrl = read('DB_URL');
    const credentialBlob = read('STORAGE_SERVICE_ACCOUNT_KEY') ?? read('GOOGLE_SERVICE_ACCOUNT_KEY');
    const storageDestination = read('STORAGE_DESTINATION') ?? read('GOOGLE_DRIVE_FOLDER_ID');

    const missingVars: EnvironmentKey[] = [];
    if (!databaseUrl) missingVars.push('DB_URL');
    if (!credentialBlob) missingVars.push('STORAGE_SERVICE_ACCOUNT_KEY');
    if (!storageDestination) missingVars.push('STORAGE_DESTINATION');

    if (!databaseUrl || !credentialBlob || !storageDestination) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missingVars.join(', ')}`,
        missingVars[0]
      );
    }

    const config: BackupConfig = {
      databaseUrl,
      storageProvider: this.parseStorageProvider(read('STORAGE_PROVIDER')),
      storageCredentials: this.parseCredentials(credentialBlob),
      storageDestination,
      backupDir: read('BACKUP_DIR') ?? join(tmpdir(), 'backups'),
      maxBackups: this.parseMaxBackups(read('MAX_BACKUPS')),
      timezone: read('BACKUP_TIMEZONE') ?? DEFAULT_TIMEZONE,
      runOnStart: this.parseBoolean(read('BACKUP_RUN_ON_START'), 'BACKUP_RUN_ON_START'),
      logLevel: this.parseLogLevel(read('LOG_LEVEL')),
    };

    // Add optional properties only if they exist
    const databaseUser = read('DB_USER');
    if (databaseUser) {
      config.databaseUser = databaseUser;
    }
    const databaseName = read('DB_NAME');
    if (databaseName) {
      config.databaseName = databaseName;
    }
    const schedule = read('BACKUP_SCHEDULE');
    if (schedule) {
      if (!cron.validate(schedule)) {
        throw new ConfigurationError(
          `BACKUP_SCHEDULE must be a valid cron expression, got "${schedule}"`,
          'BACKUP_SCHEDULE'
        );
      }
      config.schedule = schedule;
    }

    return config;
  }

  /**
   * Copy of the configuration that is safe to log
   */
  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    const { databaseUrl, storageCredentials, ...rest } = config;
    return {
      ...rest,
      databaseUrl: this.redactUrl(databaseUrl),
      storageCredentials: '[REDACTED]',
    };
  }

  private static parseStorageProvider(value: string | undefined): StorageProvider {
    if (value === undefined) {
      return 'gdrive';
    }
    const provider = STORAGE_PROVIDERS.find(candidate => candidate === value.toLowerCase());
    if (!provider) {
      throw new ConfigurationError(
        `STORAGE_PROVIDER must be one of ${STORAGE_PROVIDERS.join(', ')}, got "${value}"`,
        'STORAGE_PROVIDER'
      );
    }
    return provider;
  }

  private static parseCredentials(blob: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(blob);
    } catch {
      // The parse error quotes the input, which is key material
      throw new ConfigurationError(
        'STORAGE_SERVICE_ACCOUNT_KEY must be a JSON object',
        'STORAGE_SERVICE_ACCOUNT_KEY'
      );
    }

    if (!this.isRecord(parsed)) {
      throw new ConfigurationError(
        'STORAGE_SERVICE_ACCOUNT_KEY must be a JSON object',
        'STORAGE_SERVICE_ACCOUNT_KEY'
      );
    }
    return parsed;
  }

  private static parseMaxBackups(value: string | undefined): number {
    if (value === undefined) {
      return DEFAULT_MAX_BACKUPS;
    }
    if (!/^\d+$/.test(value)) {
      throw new ConfigurationError(
        `MAX_BACKUPS must be a non-negative integer, got "${value}"`,
        'MAX_BACKUPS'
      );
    }
    return parseInt(value, 10);
  }

  private static parseBoolean(value: string | undefined, field: EnvironmentKey): boolean {
    if (value === undefined) {
      return false;
    }
    switch (value.toLowerCase()) {
      case 'true':
      case '1':
      case 'yes':
        return true;
      case 'false':
      case '0':
      case 'no':
        return false;
      default:
        throw new ConfigurationError(`${field} must be true or false, got "${value}"`, field);
    }
  }

  private static parseLogLevel(value: string | undefined): LogLevel {
    if (value === undefined) {
      return LogLevel.INFO;
    }
    const level = value.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}, got "${value}"`,
        'LOG_LEVEL'
      );
    }
    return level;
  }

  private static redactUrl(url: string): string {
    try {
      const parsed = new URL(url);
      if (parsed.password) {
        parsed.password = 'REDACTED';
      }
      if (parsed.searchParams.has('password')) {
        parsed.searchParams.set('password', 'REDACTED');
      }
      return parsed.toString();
    } catch {
      return '[REDACTED]';
    }
  }

  private static isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
