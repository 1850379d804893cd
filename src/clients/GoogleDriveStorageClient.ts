import { google, drive_v3 } from 'googleapis';
import { createReadStream } from 'fs';
import { StorageClient, UploadResult } from '../interfaces/StorageClient';
import { Logger } from '../interfaces/Logger';
import { ConfigurationError, UploadError, formatError, toError } from '../errors';

export const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive'];

/**
 * The fields of a service-account key file the Drive client needs
 */
export interface ServiceAccountKey {
  client_email: string;
  private_key: string;
}

/**
 * Check the parsed credential blob is a service-account key
 */
export function readServiceAccountKey(credentials: Record<string, unknown>): ServiceAccountKey {
  const { client_email, private_key } = credentials;
  if (typeof client_email !== 'string' || !client_email) {
    throw new ConfigurationError(
      'Service account key is missing "client_email"',
      'STORAGE_SERVICE_ACCOUNT_KEY'
    );
  }
  if (typeof private_key !== 'string' || !private_key) {
    throw new ConfigurationError(
      'Service account key is missing "private_key"',
      'STORAGE_SERVICE_ACCOUNT_KEY'
    );
  }
  return { client_email, private_key };
}

/**
 * Google Drive storage client authenticating with a service account
 */
export class GoogleDriveStorageClient implements StorageClient {
  readonly provider = 'gdrive' as const;

  private drive: drive_v3.Drive;
  private folderId: string;
  private logger: Logger;

  constructor(credentials: Record<string, unknown>, folderId: string, logger: Logger) {
    const key = readServiceAccountKey(credentials);
    const auth = new google.auth.GoogleAuth({
      credentials: { client_email: key.client_email, private_key: key.private_key },
      scopes: DRIVE_SCOPES,
    });

    this.drive = google.drive({ version: 'v3', auth });
    this.folderId = folderId;
    this.logger = logger;
  }

  async uploadFile(filePath: string, name: string): Promise<UploadResult> {
    try {
      const response = await this.drive.files.create({
        requestBody: {
          name,
          parents: [this.folderId],
        },
        media: {
          mimeType: 'application/gzip',
          body: createReadStream(filePath),
        },
        fields: 'id',
        supportsAllDrives: true,
      });

      const id = response.data.id;
      if (!id) {
        throw new Error('Drive API response did not include a file id');
      }

      this.logger.debug('Uploaded backup to Google Drive', { fileId: id, name });

      return { id, location: `gdrive://${this.folderId}/${name}` };
    } catch (error) {
      throw new UploadError(
        `Failed to upload ${name} to Google Drive folder ${this.folderId}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.drive.files.get({
        fileId: this.folderId,
        fields: 'id',
        supportsAllDrives: true,
      });
      return true;
    } catch (error) {
      this.logger.error('Google Drive connection test failed', toError(error), {
        folderId: this.folderId,
      });
      return false;
    }
  }
}
