import fs from 'fs/promises';
import path from 'path';
import type pino from 'pino';
import { BlobStore } from './storage.interface.js';

/**
 * Local filesystem storage for weather files, for development without a bucket
 *
 * Path structure: {LOCAL_STORAGE_PATH}/{bucket}/{file_name}
 * Example: ./storage/your-bucket-name/weather_52.52_13.41_2024-01-01_2024-01-31_20240201120000.json
 */
export class LocalBlobStore implements BlobStore {
  readonly location: string;
  private root: string;

  constructor(
    basePath: string,
    bucket: string,
    private readonly logger: pino.Logger,
  ) {
    this.root = path.join(basePath, bucket);
    this.location = `file://${path.resolve(this.root)}`;
  }

  /**
   * Initialize storage directory
   */
  async init(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
    this.logger.info({ path: this.root }, 'Local blob storage initialized');
  }

  async write(name: string, content: Buffer, contentType: string): Promise<void> {
    if (!isFlatName(name)) {
      throw new Error(`Invalid blob name: ${name}`);
    }

    await fs.writeFile(path.join(this.root, name), content);
    this.logger.debug({ name, contentType }, 'Blob written');
  }

  async *list(): AsyncIterable<string> {
    const dir = await fs.opendir(this.root);

    for await (const entry of dir) {
      if (entry.isFile()) {
        yield entry.name;
      }
    }
  }

  async exists(name: string): Promise<boolean> {
    if (!isFlatName(name)) {
      return false;
    }

    try {
      await fs.access(path.join(this.root, name));
      return true;
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  async read(name: string): Promise<Buffer> {
    if (!isFlatName(name)) {
      throw new Error(`Invalid blob name: ${name}`);
    }

    return fs.readFile(path.join(this.root, name));
  }
}

// Names must stay inside the bucket directory
function isFlatName(name: string): boolean {
  return name.length > 0 && name !== '.' && name !== '..' && path.basename(name) === name;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
