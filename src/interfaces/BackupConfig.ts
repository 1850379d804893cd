import { LogLevel } from './Logger';

export type StorageProvider = 'gdrive' | 's3';

export interface BackupConfig {
  databaseUrl: string;
  databaseUser?: string;
  databaseName?: string;
  storageProvider: StorageProvider;
  storageCredentials: Record<string, unknown>; // parsed service-account JSON
  storageDestination: string; // Drive folder id or S3 bucket
  backupDir: string;
  maxBackups: number;
  schedule?: string; // cron format
  timezone: string;
  runOnStart: boolean;
  logLevel: LogLevel;
}
