import type pino from 'pino';
import type { NotFound, StorageFailure, StorageOperation } from '../../utils/errors.js';
import { err, ok, type Result } from '../../utils/result.js';
import { BlobStore } from './storage.interface.js';

/**
 * Write, list and read operations over one configured bucket.
 *
 * Backend exceptions are logged here and reduced to a StorageFailure; callers
 * only ever see the tagged result.
 */
export class ObjectStoreGateway {
  constructor(
    private readonly store: BlobStore,
    private readonly logger: pino.Logger,
  ) {}

  get location(): string {
    return this.store.location;
  }

  async writeBlob(
    name: string,
    content: string | Buffer,
    contentType: string,
  ): Promise<Result<void, StorageFailure>> {
    const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;

    try {
      await this.store.write(name, bytes, contentType);
      this.logger.info({ name, location: this.store.location }, 'Blob stored');
      return ok(undefined);
    } catch (error) {
      return err(this.failure('write', error, { name }));
    }
  }

  async listBlobs(): Promise<Result<string[], StorageFailure>> {
    const names: string[] = [];

    try {
      for await (const name of this.store.list()) {
        names.push(name);
      }
      return ok(names);
    } catch (error) {
      return err(this.failure('list', error));
    }
  }

  async readBlob(name: string): Promise<Result<Buffer, NotFound | StorageFailure>> {
    try {
      if (!(await this.store.exists(name))) {
        return err({ kind: 'NotFound' });
      }
      return ok(await this.store.read(name));
    } catch (error) {
      return err(this.failure('read', error, { name }));
    }
  }

  private failure(
    operation: StorageOperation,
    error: unknown,
    context: Record<string, string> = {},
  ): StorageFailure {
    const detail = error instanceof Error ? error.message : String(error);
    this.logger.error(
      { ...context, operation, error, location: this.store.location },
      `Blob ${operation} failed`,
    );
    return { kind: 'StorageFailure', operation, detail };
  }
}

/**
 * Process-wide storage state, fixed at startup.
 * An unavailable handle never reaches the backend.
 */
export type StorageHandle =
  | { state: 'ready'; gateway: ObjectStoreGateway }
  | { state: 'unavailable'; reason: string };

export async function initializeStorage(
  createStore: () => BlobStore,
  logger: pino.Logger,
): Promise<StorageHandle> {
  try {
    const store = createStore();
    await store.init();
    return { state: 'ready', gateway: new ObjectStoreGateway(store, logger) };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error({ error }, 'Error initializing object storage, storage endpoints disabled');
    return { state: 'unavailable', reason };
  }
}
