import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  PutObjectCommand,
  HeadBucketCommand,
  PutObjectCommandInput,
} from '@aws-sdk/client-s3';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { StorageClient, UploadResult } from '../interfaces/StorageClient';
import { Logger } from '../interfaces/Logger';
import { ConfigurationError, UploadError, formatError, toError } from '../errors';

/**
 * Credential blob accepted for S3 and S3-compatible services
 */
export interface S3Credentials {
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  endpoint?: string;
  prefix: string;
}

/**
 * Read S3 credentials from the parsed credential blob
 */
export function readS3Credentials(credentials: Record<string, unknown>): S3Credentials {
  const { accessKeyId, secretAccessKey, region, endpoint, prefix } = credentials;

  if (typeof accessKeyId !== 'string' || !accessKeyId) {
    throw new ConfigurationError('S3 credentials are missing "accessKeyId"', 'STORAGE_SERVICE_ACCOUNT_KEY');
  }
  if (typeof secretAccessKey !== 'string' || !secretAccessKey) {
    throw new ConfigurationError(
      'S3 credentials are missing "secretAccessKey"',
      'STORAGE_SERVICE_ACCOUNT_KEY'
    );
  }

  const result: S3Credentials = {
    accessKeyId,
    secretAccessKey,
    region: typeof region === 'string' && region ? region : 'us-east-1',
    prefix: typeof prefix === 'string' ? normalizePrefix(prefix) : '',
  };
  if (typeof endpoint === 'string' && endpoint) {
    result.endpoint = endpoint;
  }
  return result;
}

function normalizePrefix(prefix: string): string {
  return prefix
    .replace(/^\/+/, '') // Remove leading slashes
    .replace(/\/+$/, ''); // Remove trailing slashes
}

/**
 * S3 storage client using AWS SDK v3
 */
export class S3StorageClient implements StorageClient {
  readonly provider = 's3' as const;

  private client: AWSS3Client;
  private bucket: string;
  private prefix: string;
  private logger: Logger;

  constructor(credentials: Record<string, unknown>, bucket: string, logger: Logger) {
    const s3Credentials = readS3Credentials(credentials);

    const clientConfig: S3ClientConfig = {
      region: s3Credentials.region,
      credentials: {
        accessKeyId: s3Credentials.accessKeyId,
        secretAccessKey: s3Credentials.secretAccessKey,
      },
    };

    // Use custom endpoint if provided (for S3-compatible services)
    if (s3Credentials.endpoint) {
      clientConfig.endpoint = s3Credentials.endpoint;
      clientConfig.forcePathStyle = true; // Required for MinIO and other S3-compatible services
    }

    this.client = new AWSS3Client(clientConfig);
    this.bucket = bucket;
    this.prefix = s3Credentials.prefix;
    this.logger = logger;
  }

  async uploadFile(filePath: string, name: string): Promise<UploadResult> {
    const key = this.prefix ? `${this.prefix}/${name}` : name;

    try {
      const fileStats = await stat(filePath);

      const uploadParams: PutObjectCommandInput = {
        Bucket: this.bucket,
        Key: key,
        Body: createReadStream(filePath),
        ContentLength: fileStats.size,
        ContentType: 'application/gzip',
      };

      const response = await this.client.send(new PutObjectCommand(uploadParams));

      this.logger.debug('Uploaded backup to S3', { location: `s3://${this.bucket}/${key}` });

      return {
        id: response.ETag ?? key,
        location: `s3://${this.bucket}/${key}`,
      };
    } catch (error) {
      throw new UploadError(
        `Failed to upload ${name} to s3://${this.bucket}/${key}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return true;
    } catch (error) {
      this.logger.error('S3 connection test failed', toError(error), { bucket: this.bucket });
      return false;
    }
  }
}
