import { BackupConfig } from '../interfaces/BackupConfig';
import { StorageClient } from '../interfaces/StorageClient';
import { Logger } from '../interfaces/Logger';
import { GoogleDriveStorageClient } from './GoogleDriveStorageClient';
import { S3StorageClient } from './S3StorageClient';

/**
 * Build the storage client for the configured provider
 */
export function createStorageClient(config: BackupConfig, logger: Logger): StorageClient {
  switch (config.storageProvider) {
    case 'gdrive':
      return new GoogleDriveStorageClient(
        config.storageCredentials,
        config.storageDestination,
        logger
      );
    case 's3':
      return new S3StorageClient(config.storageCredentials, config.storageDestination, logger);
  }
}
