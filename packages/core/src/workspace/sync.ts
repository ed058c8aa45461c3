import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { Logger } from "tslog";
import { createLogger } from "../infra/logger.js";
import { sessionFilesPrefix } from "../storage/paths.js";
import type { ObjectStore } from "../storage/types.js";
import { listFiles, resolveInside } from "./files.js";

/**
 * Mirrors a session's workspace between a local directory and the
 * `sessions/<key>/files/` prefix of the object store.
 *
 * Both directions copy every file on every call. Pushing never deletes
 * remote objects, so files removed locally stay in the store.
 */
export class WorkspaceSynchronizer {
  private readonly store: ObjectStore;
  private readonly logger: Logger<unknown>;

  constructor(store: ObjectStore, options?: { logger?: Logger<unknown> }) {
    this.store = store;
    this.logger = options?.logger ?? createLogger("workspace-sync");
  }

  /**
   * Download every remote file of the session into `localDir`, overwriting
   * local copies. Returns the relative paths written.
   */
  async pullToLocal(localDir: string, sessionKey: string): Promise<string[]> {
    const prefix = sessionFilesPrefix(sessionKey);
    const names = await this.store.list(prefix);

    const pulled: string[] = [];
    for (const name of names) {
      const relativePath = name.slice(prefix.length);
      // Folder placeholders created by bucket consoles.
      if (relativePath.length === 0 || relativePath.endsWith("/")) continue;

      const target = resolveInside(localDir, relativePath);
      if (!target) {
        this.logger.warn(`Skipping remote file outside the workspace: ${name}`);
        continue;
      }

      const data = await this.store.get(name);
      if (!data) {
        this.logger.warn(`Remote file disappeared during sync: ${name}`);
        continue;
      }

      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, data);
      pulled.push(relativePath);
    }

    this.logger.info(`Pulled ${pulled.length} file(s) for session ${sessionKey}`);
    return pulled;
  }

  /**
   * Upload every regular file under `localDir`, overwriting remote objects
   * at the same relative path. Returns the relative paths uploaded.
   */
  async pushToRemote(localDir: string, sessionKey: string): Promise<string[]> {
    const prefix = sessionFilesPrefix(sessionKey);
    const files = await listFiles(localDir);

    for (const relativePath of files) {
      const data = await readFile(join(localDir, ...relativePath.split("/")));
      await this.store.put(`${prefix}${relativePath}`, data);
    }

    this.logger.info(`Pushed ${files.length} file(s) for session ${sessionKey}`);
    return files;
  }
}
