import { StorageProvider } from './BackupConfig';

/**
 * Result of uploading one artifact to remote storage
 */
export interface UploadResult {
  /** Identifier assigned by the storage service */
  id: string;

  /** Human-readable location, e.g. gdrive://<folder>/<name> or s3://<bucket>/<key> */
  location: string;
}

/**
 * Interface for remote storage destinations
 */
export interface StorageClient {
  readonly provider: StorageProvider;

  /** Upload a file under the given name into the configured destination */
  uploadFile(filePath: string, name: string): Promise<UploadResult>;

  /** Check that the destination exists and the credentials can reach it */
  testConnection(): Promise<boolean>;
}
