import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  HeadBucketCommand,
  NotFound,
  S3ServiceException,
  paginateListObjectsV2,
} from '@aws-sdk/client-s3';
import type pino from 'pino';
import { BlobStore } from './storage.interface.js';

export interface S3BlobStoreConfig {
  bucket: string;
  endpoint: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle: boolean;
  timeoutMs: number;
}

/**
 * S3-compatible implementation of BlobStore
 * Compatible with AWS S3, Google Cloud Storage (interoperability endpoint with
 * HMAC keys), DigitalOcean Spaces and MinIO
 *
 * Blobs are stored flat at the bucket root: {file_name}
 */
export class S3BlobStore implements BlobStore {
  readonly location: string;
  private client: S3Client;
  private bucket: string;

  constructor(
    config: S3BlobStoreConfig,
    private readonly logger: pino.Logger,
    client?: S3Client,
  ) {
    this.bucket = config.bucket;
    this.location = `s3://${config.bucket}`;

    // Without explicit keys the SDK falls back to its default credential chain
    const credentials =
      config.accessKeyId && config.secretAccessKey
        ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
        : undefined;

    this.client =
      client ??
      new S3Client({
        endpoint: config.endpoint,
        region: config.region,
        credentials,
        forcePathStyle: config.forcePathStyle,
        // GCS interoperability rejects the newer default checksum headers
        requestChecksumCalculation: 'WHEN_REQUIRED',
        responseChecksumValidation: 'WHEN_REQUIRED',
        requestHandler: {
          connectionTimeout: config.timeoutMs,
          requestTimeout: config.timeoutMs,
        },
      });
  }

  async init(): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    this.logger.info({ bucket: this.bucket }, 'S3 blob storage initialized');
  }

  async write(name: string, content: Buffer, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: name,
        Body: content,
        ContentType: contentType,
      }),
    );

    this.logger.debug({ name, bucket: this.bucket }, 'Blob written to S3');
  }

  async *list(): AsyncIterable<string> {
    const pages = paginateListObjectsV2({ client: this.client }, { Bucket: this.bucket });

    for await (const page of pages) {
      for (const object of page.Contents ?? []) {
        if (object.Key) {
          yield object.Key;
        }
      }
    }
  }

  async exists(name: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: name }));
      return true;
    } catch (error) {
      // HeadObject reports a missing key as a bare 404
      if (
        error instanceof NotFound ||
        (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404)
      ) {
        return false;
      }
      throw error;
    }
  }

  async read(name: string): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: this.bucket, Key: name }),
    );

    if (!response.Body) {
      throw new Error('Empty response body from S3');
    }

    const bytes = await response.Body.transformToByteArray();
    this.logger.debug({ name, bucket: this.bucket }, 'Blob read from S3');

    return Buffer.from(bytes);
  }
}
