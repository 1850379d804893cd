/**
 * One compressed dump file on local disk
 */
export interface BackupArtifact {
  filePath: string;
  fileName: string;
  modifiedAt: Date;
}

export interface RetentionPolicy {
  /** Maximum number of artifacts kept locally; 0 evicts everything */
  maxRetained: number;
}

/**
 * Result of a retention pass over the backup directory
 */
export interface RetentionResult {
  /** Number of matching artifacts found before eviction */
  totalCount: number;

  /** Artifacts that were deleted, oldest first */
  evicted: BackupArtifact[];

  /** Number of artifacts left on disk */
  retainedCount: number;
}

/**
 * Interface for managing local backup rotation
 */
export interface RetentionManager {
  /** List the artifacts in the backup directory that follow the naming convention */
  listArtifacts(): Promise<BackupArtifact[]>;

  /** Delete every artifact beyond the retention cap, oldest first */
  enforceRetention(): Promise<RetentionResult>;
}
