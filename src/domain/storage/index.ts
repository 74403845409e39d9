export type BucketSetupResult = 'created' | 'exists';

/**
 * Object storage the pipeline writes its artifacts to.
 *
 * Keys are '/'-separated paths relative to the bucket root. Implementations
 * throw `StorageError` when the backend rejects an operation.
 */
export interface StorageGateway {
  /** Human-readable backend name for log lines */
  readonly name: string;

  listBuckets(): Promise<string[]>;

  /** Create the bucket unless it is already there */
  ensureBucket(bucket: string): Promise<BucketSetupResult>;

  /** Delete every object whose key starts with `prefix`, returning the deleted keys */
  clearPrefix(bucket: string, prefix: string): Promise<string[]>;

  upload(bucket: string, key: string, body: Uint8Array, contentType: string): Promise<void>;
}
