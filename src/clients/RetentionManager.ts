import { Dirent, promises as fs } from 'fs';
import { join } from 'path';
import {
  BackupArtifact,
  RetentionManager as IRetentionManager,
  RetentionPolicy,
  RetentionResult,
} from '../interfaces/RetentionManager';
import { Logger } from '../interfaces/Logger';
import { FilesystemError, formatError, toError } from '../errors';

const ARTIFACT_NAME_PATTERN = /^backup-\d{14}\.sql\.gz$/;

/**
 * Whether a file name follows the backup-<YYYYMMDDHHMMSS>.sql.gz convention
 */
export function isBackupArtifactName(fileName: string): boolean {
  return ARTIFACT_NAME_PATTERN.test(fileName);
}

/**
 * Order artifacts oldest first. Equal timestamps fall back to the file name, then the
 * full path, so the order is total.
 */
export function compareArtifacts(a: BackupArtifact, b: BackupArtifact): number {
  const byTime = a.modifiedAt.getTime() - b.modifiedAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  if (a.fileName !== b.fileName) {
    return a.fileName < b.fileName ? -1 : 1;
  }
  if (a.filePath !== b.filePath) {
    return a.filePath < b.filePath ? -1 : 1;
  }
  return 0;
}

/**
 * Pick the artifacts to delete so that at most `keep` remain.
 * Returns the oldest `artifacts.length - keep` artifacts, oldest first. Pure: no I/O and
 * the input is left untouched.
 */
export function selectForEviction(
  artifacts: readonly BackupArtifact[],
  keep: number
): BackupArtifact[] {
  if (!Number.isInteger(keep) || keep < 0) {
    throw new RangeError(`Retention cap must be a non-negative integer, got ${keep}`);
  }

  if (artifacts.length <= keep) {
    return [];
  }

  const ordered = [...artifacts].sort(compareArtifacts);
  return ordered.slice(0, ordered.length - keep);
}

/**
 * RetentionManager implementation for the local backup directory.
 * Selection is delegated to selectForEviction; this class only lists and deletes.
 */
export class RetentionManager implements IRetentionManager {
  private backupDir: string;
  private policy: RetentionPolicy;
  private logger: Logger;

  constructor(backupDir: string, policy: RetentionPolicy, logger: Logger) {
    this.backupDir = backupDir;
    this.policy = policy;
    this.logger = logger;
  }

  async listArtifacts(): Promise<BackupArtifact[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.backupDir, { withFileTypes: true });
    } catch (error) {
      throw new FilesystemError(
        `Failed to list backup directory ${this.backupDir}: ${formatError(error)}`,
        this.backupDir,
        toError(error)
      );
    }

    const artifacts: BackupArtifact[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || !isBackupArtifactName(entry.name)) {
        continue;
      }

      const filePath = join(this.backupDir, entry.name);
      try {
        const stats = await fs.stat(filePath);
        artifacts.push({ filePath, fileName: entry.name, modifiedAt: stats.mtime });
      } catch (error) {
        throw new FilesystemError(
          `Failed to read backup file ${filePath}: ${formatError(error)}`,
          filePath,
          toError(error)
        );
      }
    }

    return artifacts;
  }

  async enforceRetention(): Promise<RetentionResult> {
    const artifacts = await this.listArtifacts();
    const evicted = selectForEviction(artifacts, this.policy.maxRetained);

    this.logger.debug('Retention pass selected artifacts', {
      operation: 'retention_select',
      backupDir: this.backupDir,
      totalCount: artifacts.length,
      maxRetained: this.policy.maxRetained,
      selected: evicted.map(artifact => artifact.fileName),
    });

    for (const artifact of evicted) {
      await this.deleteArtifact(artifact);
    }

    const result: RetentionResult = {
      totalCount: artifacts.length,
      evicted,
      retainedCount: artifacts.length - evicted.length,
    };

    this.logger.logRetentionCleanup(
      result.evicted.length,
      result.retainedCount,
      this.policy.maxRetained
    );

    return result;
  }

  private async deleteArtifact(artifact: BackupArtifact): Promise<void> {
    try {
      await fs.unlink(artifact.filePath);
      this.logger.info(`Deleted old backup: ${artifact.fileName}`, {
        operation: 'retention_delete',
        modifiedAt: artifact.modifiedAt.toISOString(),
      });
    } catch (error) {
      throw new FilesystemError(
        `Failed to delete old backup ${artifact.filePath}: ${formatError(error)}`,
        artifact.filePath,
        toError(error)
      );
    }
  }
}
