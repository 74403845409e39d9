import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import type { BucketSetupResult, StorageGateway } from '../../domain/storage/index.js';
import { StorageError } from '../../domain/errors/index.js';
import { storageLogger as logger } from '../../shared/utils/logger.js';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores buckets as directories under a root folder, keys as relative paths.
 * Used for local runs without cloud credentials.
 */
export class LocalStorageGateway implements StorageGateway {
  readonly name = 'local';
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async listBuckets(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.root, { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw new StorageError('Failed to list buckets', { root: this.root }, error);
    }
  }

  async ensureBucket(bucket: string): Promise<BucketSetupResult> {
    const bucketDir = this.bucketPath(bucket);

    try {
      const stats = await fs.stat(bucketDir);
      if (stats.isDirectory()) {
        return 'exists';
      }
      throw new StorageError(`'${bucketDir}' exists and is not a directory`, { bucket });
    } catch (error) {
      if (!isMissing(error)) {
        throw error instanceof StorageError
          ? error
          : new StorageError(`Failed to check bucket '${bucket}'`, { bucket }, error);
      }
    }

    await fs.mkdir(bucketDir, { recursive: true });
    return 'created';
  }

  async clearPrefix(bucket: string, prefix: string): Promise<string[]> {
    const bucketDir = this.bucketPath(bucket);

    try {
      const keys = (await this.listKeys(bucketDir, '')).filter((key) => key.startsWith(prefix));
      for (const key of keys) {
        await fs.rm(this.objectPath(bucket, key));
        logger.info(`Deleted '${key}'`, { bucket });
      }
      return keys;
    } catch (error) {
      throw new StorageError(`Failed to clear '${prefix}' in bucket '${bucket}'`, { bucket, prefix }, error);
    }
  }

  async upload(bucket: string, key: string, body: Uint8Array, contentType: string): Promise<void> {
    const target = this.objectPath(bucket, key);

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, body);
    } catch (error) {
      throw new StorageError(`Failed to upload '${key}' to bucket '${bucket}'`, { bucket, key }, error);
    }

    logger.debug('Stored object', { bucket, key, contentType, bytes: body.byteLength });
  }

  private bucketPath(bucket: string): string {
    if (bucket.length === 0 || bucket.includes('/') || bucket.includes('\\') || bucket.startsWith('.')) {
      throw new StorageError(`Invalid bucket name '${bucket}'`, { bucket });
    }
    return path.join(this.root, bucket);
  }

  private objectPath(bucket: string, key: string): string {
    const segments = key.split('/');
    if (segments.some((segment) => segment === '' || segment === '.' || segment === '..')) {
      throw new StorageError(`Invalid object key '${key}'`, { bucket, key });
    }
    return path.join(this.bucketPath(bucket), ...segments);
  }

  // Keys of all files below `dir`, '/'-separated and sorted
  private async listKeys(dir: string, keyPrefix: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    }

    const keys: string[] = [];
    for (const entry of entries) {
      const key = `${keyPrefix}${entry.name}`;
      if (entry.isDirectory()) {
        keys.push(...(await this.listKeys(path.join(dir, entry.name), `${key}/`)));
      } else if (entry.isFile()) {
        keys.push(key);
      }
    }
    return keys.sort();
  }
}
