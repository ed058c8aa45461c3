import { type Bucket, Storage } from "@google-cloud/storage";
import type { Logger } from "tslog";
import { errorMessage, StorageError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import type { ObjectStore } from "./types.js";

export interface GcsObjectStoreOptions {
  bucketName: string;
  projectId?: string;
  logger?: Logger<unknown>;
}

/**
 * Object store on a Google Cloud Storage bucket. Credentials come from the
 * ambient Application Default Credentials.
 */
export class GcsObjectStore implements ObjectStore {
  readonly kind = "gcs";
  private readonly bucket: Bucket;
  private readonly logger: Logger<unknown>;

  constructor(bucket: Bucket, logger?: Logger<unknown>) {
    this.bucket = bucket;
    this.logger = logger ?? createLogger("gcs-store");
  }

  static fromOptions(options: GcsObjectStoreOptions): GcsObjectStore {
    const storage = new Storage(options.projectId ? { projectId: options.projectId } : {});
    return new GcsObjectStore(storage.bucket(options.bucketName), options.logger);
  }

  get bucketName(): string {
    return this.bucket.name;
  }

  /**
   * Create the bucket when it does not exist yet.
   */
  async ensureBucket(): Promise<void> {
    try {
      const [exists] = await this.bucket.exists();
      if (!exists) {
        this.logger.info(`Creating GCS bucket: ${this.bucket.name}`);
        await this.bucket.create();
      }
    } catch (err) {
      throw new StorageError(`Cannot access bucket ${this.bucket.name}`, "", err);
    }
  }

  async get(path: string): Promise<Buffer | undefined> {
    try {
      const [data] = await this.bucket.file(path).download();
      return data;
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw new StorageError(`Failed to download gs://${this.bucket.name}/${path}`, path, err);
    }
  }

  async put(path: string, data: Buffer | string, contentType?: string): Promise<void> {
    try {
      await this.bucket.file(path).save(data, {
        resumable: false,
        ...(contentType && { contentType }),
      });
    } catch (err) {
      throw new StorageError(`Failed to upload gs://${this.bucket.name}/${path}`, path, err);
    }
  }

  async list(prefix: string): Promise<string[]> {
    try {
      const [files] = await this.bucket.getFiles({ prefix });
      return files.map((file) => file.name);
    } catch (err) {
      throw new StorageError(`Failed to list gs://${this.bucket.name}/${prefix}`, prefix, err);
    }
  }

  async delete(path: string): Promise<boolean> {
    try {
      await this.bucket.file(path).delete();
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StorageError(`Failed to delete gs://${this.bucket.name}/${path}`, path, err);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const [exists] = await this.bucket.exists();
      return exists;
    } catch (err) {
      this.logger.warn(`GCS health check failed: ${errorMessage(err)}`);
      return false;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 404;
}
