import {
  BucketLocationConstraint,
  CreateBucketCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { BucketSetupResult, StorageGateway } from '../../domain/storage/index.js';
import { StorageError } from '../../domain/errors/index.js';
import { storageLogger as logger } from '../../shared/utils/logger.js';

export interface S3StorageOptions {
  region: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
}

// us-east-1 is the default location and must not be sent as a constraint
const DEFAULT_REGION = 'us-east-1';

function isBucketLocation(region: string): region is BucketLocationConstraint {
  return Object.values<string>(BucketLocationConstraint).includes(region);
}

function isNotFound(error: unknown): boolean {
  return error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404;
}

export class S3StorageGateway implements StorageGateway {
  readonly name = 's3';
  private readonly client: S3Client;
  private readonly region: string;

  constructor(options: S3StorageOptions) {
    this.region = options.region;
    this.client = new S3Client({
      region: options.region,
      endpoint: options.endpoint,
      forcePathStyle: options.forcePathStyle,
      credentials: options.credentials,
    });
    logger.info('S3 client initialized', {
      region: options.region,
      endpoint: options.endpoint,
    });
  }

  async listBuckets(): Promise<string[]> {
    try {
      const response = await this.client.send(new ListBucketsCommand({}));
      return (response.Buckets ?? []).flatMap((bucket) => (bucket.Name ? [bucket.Name] : []));
    } catch (error) {
      throw new StorageError('Failed to list buckets', undefined, error);
    }
  }

  async ensureBucket(bucket: string): Promise<BucketSetupResult> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return 'exists';
    } catch (error) {
      if (!isNotFound(error)) {
        throw new StorageError(`Failed to check bucket '${bucket}'`, { bucket }, error);
      }
    }

    try {
      await this.client.send(
        new CreateBucketCommand({
          Bucket: bucket,
          CreateBucketConfiguration:
            this.region !== DEFAULT_REGION && isBucketLocation(this.region)
              ? { LocationConstraint: this.region }
              : undefined,
        })
      );
    } catch (error) {
      throw new StorageError(`Failed to create bucket '${bucket}'`, { bucket }, error);
    }

    return 'created';
  }

  async clearPrefix(bucket: string, prefix: string): Promise<string[]> {
    const deleted: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const page = await this.client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          })
        );

        for (const object of page.Contents ?? []) {
          if (!object.Key) {
            continue;
          }
          await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: object.Key }));
          logger.info(`Deleted '${object.Key}'`, { bucket });
          deleted.push(object.Key);
        }

        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw new StorageError(`Failed to clear '${prefix}' in bucket '${bucket}'`, { bucket, prefix }, error);
    }

    return deleted;
  }

  async upload(bucket: string, key: string, body: Uint8Array, contentType: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        })
      );
    } catch (error) {
      throw new StorageError(`Failed to upload '${key}' to bucket '${bucket}'`, { bucket, key }, error);
    }
  }
}
