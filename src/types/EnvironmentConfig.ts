export interface EnvironmentConfig {
  // Required
  DB_URL: string;
  STORAGE_SERVICE_ACCOUNT_KEY: string;
  STORAGE_DESTINATION: string;

  // Accepted in place of the two STORAGE_* variables above
  GOOGLE_SERVICE_ACCOUNT_KEY?: string;
  GOOGLE_DRIVE_FOLDER_ID?: string;

  // Optional
  DB_USER?: string;
  DB_NAME?: string;
  STORAGE_PROVIDER?: string;
  BACKUP_DIR?: string;
  MAX_BACKUPS?: string;
  BACKUP_SCHEDULE?: string;
  BACKUP_TIMEZONE?: string;
  BACKUP_RUN_ON_START?: string;
  LOG_LEVEL?: string;
}
