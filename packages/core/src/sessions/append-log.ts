import type { Logger } from "tslog";
import type { z } from "zod";
import { errorMessage } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { sessionObjectPath } from "../storage/paths.js";
import type { ObjectStore } from "../storage/types.js";

export interface ReadOptions<T> {
  /** Keep only the most recent `limit` records. Zero or absent means all. */
  limit?: number;
  /** Applied before `limit`. */
  filter?: (record: T) => boolean;
}

/**
 * Newline-delimited JSON log stored as one object per session.
 *
 * Appends are read-modify-write with no concurrency control: two
 * overlapping appends to the same session can drop a record. Append and
 * read failures are logged and never thrown, so callers can treat the log
 * as a best-effort side channel.
 */
export class AppendOnlyLog<T> {
  private readonly store: ObjectStore;
  private readonly fileName: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly logger: Logger<unknown>;

  constructor(
    store: ObjectStore,
    fileName: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: { logger?: Logger<unknown> },
  ) {
    this.store = store;
    this.fileName = fileName;
    this.schema = schema;
    this.logger = options?.logger ?? createLogger("append-log");
  }

  /**
   * Append one record. Returns false when the write did not land.
   */
  async append(sessionKey: string, record: T): Promise<boolean> {
    const path = sessionObjectPath(sessionKey, this.fileName);
    try {
      const existing = (await this.store.get(path))?.toString("utf-8") ?? "";
      // A torn last line must not swallow the new record.
      const separator = existing.length > 0 && !existing.endsWith("\n") ? "\n" : "";
      const content = `${existing}${separator}${JSON.stringify(record)}\n`;

      await this.store.put(path, content, "application/x-ndjson");
      return true;
    } catch (err) {
      this.logger.error(
        `Error appending to ${this.fileName} for session ${sessionKey}: ${errorMessage(err)}`,
      );
      return false;
    }
  }

  /**
   * Records in append order. Lines that are not valid JSON or do not match
   * the record schema are skipped with a warning.
   */
  async read(sessionKey: string, options?: ReadOptions<T>): Promise<T[]> {
    const path = sessionObjectPath(sessionKey, this.fileName);

    let content: string;
    try {
      const data = await this.store.get(path);
      if (!data) return [];
      content = data.toString("utf-8");
    } catch (err) {
      this.logger.error(
        `Error reading ${this.fileName} for session ${sessionKey}: ${errorMessage(err)}`,
      );
      return [];
    }

    const records: T[] = [];
    const lines = content.split("\n");
    lines.forEach((line, index) => {
      if (!line.trim()) return;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (err) {
        this.logger.warn(
          `Skipping unparseable line ${index + 1} of ${path}: ${errorMessage(err)}`,
        );
        return;
      }

      const result = this.schema.safeParse(raw);
      if (!result.success) {
        this.logger.warn(`Skipping malformed record on line ${index + 1} of ${path}`);
        return;
      }
      if (options?.filter && !options.filter(result.data)) return;
      records.push(result.data);
    });

    const limit = options?.limit;
    if (limit && limit > 0 && records.length > limit) {
      return records.slice(-limit);
    }
    return records;
  }
}
