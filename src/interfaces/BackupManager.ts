/**
 * Result of a backup run
 */
export interface BackupResult {
  /** Identifier carried by every log line of the run */
  runId: string;

  /** Name of the compressed artifact, backup-<YYYYMMDDHHMMSS>.sql.gz */
  fileName: string;

  /** Local path of the compressed artifact */
  artifactPath: string;

  /** Size of the compressed artifact in bytes */
  fileSize: number;

  /** Identifier returned by the storage service */
  uploadId: string;

  /** Remote location of the uploaded artifact */
  location: string;

  /** File names removed by the retention pass, oldest first */
  evictedFiles: string[];

  /** Number of artifacts kept locally after the retention pass */
  retainedCount: number;

  /** Duration of the run in milliseconds */
  duration: number;
}

/**
 * Interface for the main backup orchestration manager
 */
export interface BackupManager {
  /** Execute a complete backup run, rejecting with a BackupError on the first failure */
  executeBackup(): Promise<BackupResult>;

  /** Check that the database and the storage destination are reachable */
  validateConfiguration(): Promise<boolean>;
}
