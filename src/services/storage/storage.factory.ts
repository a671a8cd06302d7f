import type pino from 'pino';
import type { Environment } from '../../config/environment.js';
import { BlobStore } from './storage.interface.js';
import { LocalBlobStore } from './local-blob-store.js';
import { S3BlobStore } from './s3-blob-store.js';

/**
 * Factory function to create appropriate blob storage implementation
 * based on environment configuration
 */
export function createBlobStore(env: Environment, logger: pino.Logger): BlobStore {
  if (env.STORAGE_TYPE === 'local') {
    return new LocalBlobStore(env.LOCAL_STORAGE_PATH, env.WEATHER_BUCKET_NAME, logger);
  }

  return new S3BlobStore(
    {
      bucket: env.WEATHER_BUCKET_NAME,
      endpoint: env.STORAGE_S3_ENDPOINT,
      region: env.STORAGE_S3_REGION,
      accessKeyId: env.STORAGE_S3_ACCESS_KEY,
      secretAccessKey: env.STORAGE_S3_SECRET_KEY,
      forcePathStyle: env.STORAGE_S3_FORCE_PATH_STYLE,
      timeoutMs: env.STORAGE_TIMEOUT_MS,
    },
    logger,
  );
}
