import { existsSync } from "node:fs";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, resolve, sep } from "node:path";
import { StorageError } from "../infra/errors.js";
import { listFiles } from "../workspace/files.js";
import type { ObjectStore } from "./types.js";

/**
 * Object store backed by a local directory. Object names map to relative
 * file paths; intended for development without a cloud bucket.
 */
export class LocalObjectStore implements ObjectStore {
  readonly kind = "local";
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  async get(path: string): Promise<Buffer | undefined> {
    const filePath = this.resolvePath(path);
    if (!existsSync(filePath)) return undefined;
    try {
      return await readFile(filePath);
    } catch (err) {
      throw new StorageError(`Failed to read object ${path}`, path, err);
    }
  }

  async put(path: string, data: Buffer | string): Promise<void> {
    const filePath = this.resolvePath(path);
    try {
      await mkdir(dirname(filePath), { recursive: true, mode: 0o700 });
      await writeFile(filePath, data, { mode: 0o600 });
    } catch (err) {
      throw new StorageError(`Failed to write object ${path}`, path, err);
    }
  }

  async list(prefix: string): Promise<string[]> {
    const names = await listFiles(this.rootDir);
    return names.filter((name) => name.startsWith(prefix));
  }

  async delete(path: string): Promise<boolean> {
    const filePath = this.resolvePath(path);
    if (!existsSync(filePath)) return false;
    await rm(filePath);
    return true;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await mkdir(this.rootDir, { recursive: true, mode: 0o700 });
      return true;
    } catch {
      return false;
    }
  }

  private resolvePath(path: string): string {
    const filePath = resolve(this.rootDir, path);
    if (!filePath.startsWith(this.rootDir + sep)) {
      throw new StorageError(`Object path escapes storage root: ${path}`, path);
    }
    return filePath;
  }
}
