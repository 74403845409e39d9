import type { Env } from '../../config/env.js';
import type { StorageGateway } from '../../domain/storage/index.js';
import { LocalStorageGateway } from './local.storage.js';
import { S3StorageGateway } from './s3.storage.js';

export { LocalStorageGateway } from './local.storage.js';
export { S3StorageGateway } from './s3.storage.js';
export type { S3StorageOptions } from './s3.storage.js';

type StorageEnv = Pick<
  Env,
  | 'STORAGE_DRIVER'
  | 'LOCAL_STORAGE_ROOT'
  | 'AWS_REGION'
  | 'AWS_ACCESS_KEY_ID'
  | 'AWS_SECRET_ACCESS_KEY'
  | 'S3_ENDPOINT'
  | 'S3_FORCE_PATH_STYLE'
>;

export function createStorageGateway(source: StorageEnv): StorageGateway {
  switch (source.STORAGE_DRIVER) {
    case 's3':
      return new S3StorageGateway({
        region: source.AWS_REGION,
        endpoint: source.S3_ENDPOINT,
        forcePathStyle: source.S3_FORCE_PATH_STYLE,
        // Fall back to the SDK's default credential chain
        credentials:
          source.AWS_ACCESS_KEY_ID && source.AWS_SECRET_ACCESS_KEY
            ? {
                accessKeyId: source.AWS_ACCESS_KEY_ID,
                secretAccessKey: source.AWS_SECRET_ACCESS_KEY,
              }
            : undefined,
      });

    case 'local':
      return new LocalStorageGateway(source.LOCAL_STORAGE_ROOT);
  }
}
