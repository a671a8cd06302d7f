/**
 * Swappable blob storage for stored weather files
 * Allows switching between S3-compatible object storage and the local filesystem
 */
export interface BlobStore {
  /**
   * Human-readable location, used in logs (e.g., "s3://weather-archive")
   */
  readonly location: string;

  /**
   * Check configuration and connectivity. Throws when the backend is unusable.
   */
  init(): Promise<void>;

  /**
   * Write a blob, replacing any existing blob with the same name
   */
  write(name: string, content: Buffer, contentType: string): Promise<void>;

  /**
   * Lazily yield every blob name in backend order. One pass per call.
   */
  list(): AsyncIterable<string>;

  exists(name: string): Promise<boolean>;

  /**
   * Read a blob's raw bytes. Callers check existence first.
   */
  read(name: string): Promise<Buffer>;
}
