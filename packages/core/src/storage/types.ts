/**
 * Blob namespace keyed by slash-separated path strings. All writes are
 * whole-object overwrites; there is no partial update or conditional write.
 */
export interface ObjectStore {
  /** Backend name used in logs and health output. */
  readonly kind: string;

  /** Object content, or undefined when nothing is stored at `path`. */
  get(path: string): Promise<Buffer | undefined>;

  put(path: string, data: Buffer | string, contentType?: string): Promise<void>;

  /** Full names of every object whose name starts with `prefix`. */
  list(prefix: string): Promise<string[]>;

  /** Returns true when an object was removed. */
  delete(path: string): Promise<boolean>;

  healthCheck(): Promise<boolean>;
}
