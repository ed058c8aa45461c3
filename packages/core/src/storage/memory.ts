import type { ObjectStore } from "./types.js";

interface StoredObject {
  data: Buffer;
  contentType?: string;
}

/**
 * In-process object store. Backs tests and `STORAGE_BACKEND=memory` runs; nothing
 * survives the process.
 */
export class MemoryObjectStore implements ObjectStore {
  readonly kind = "memory";
  private readonly objects = new Map<string, StoredObject>();

  async get(path: string): Promise<Buffer | undefined> {
    const stored = this.objects.get(path);
    return stored ? Buffer.from(stored.data) : undefined;
  }

  async put(path: string, data: Buffer | string, contentType?: string): Promise<void> {
    this.objects.set(path, {
      data: typeof data === "string" ? Buffer.from(data, "utf-8") : Buffer.from(data),
      contentType,
    });
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((name) => name.startsWith(prefix)).sort();
  }

  async delete(path: string): Promise<boolean> {
    return this.objects.delete(path);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  contentTypeOf(path: string): string | undefined {
    return this.objects.get(path)?.contentType;
  }

  size(): number {
    return this.objects.size;
  }
}
