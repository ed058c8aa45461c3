import { existsSync } from "node:fs";
import { copyFile, mkdir, readdir } from "node:fs/promises";
import { dirname, join, posix, relative, resolve, sep } from "node:path";

/**
 * Relative POSIX paths of every regular file under `dir`, sorted.
 * Symlinks and other special entries are not followed or reported.
 * A missing directory yields an empty list.
 */
export async function listFiles(dir: string): Promise<string[]> {
  if (!existsSync(dir)) return [];

  const files: string[] = [];
  const pending = [dir];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(current, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile()) {
        files.push(toPosix(relative(dir, fullPath)));
      }
    }
  }
  return files.sort();
}

/**
 * Copy every regular file under `src` to the same relative path under
 * `dest`, overwriting. Returns the copied relative paths.
 */
export async function copyTree(src: string, dest: string): Promise<string[]> {
  const files = await listFiles(src);
  for (const file of files) {
    const target = join(dest, ...file.split("/"));
    await mkdir(dirname(target), { recursive: true });
    await copyFile(join(src, ...file.split("/")), target);
  }
  return files;
}

/**
 * Resolve a relative POSIX path under `root`. Returns undefined when the
 * result would land outside `root` (absolute paths, `..` segments).
 */
export function resolveInside(root: string, relativePath: string): string | undefined {
  const normalized = posix.normalize(relativePath);
  if (
    normalized === "." ||
    normalized.startsWith("../") ||
    normalized === ".." ||
    posix.isAbsolute(normalized)
  ) {
    return undefined;
  }
  const base = resolve(root);
  const target = resolve(base, ...normalized.split("/"));
  return target.startsWith(base + sep) ? target : undefined;
}

export function toPosix(path: string): string {
  return path.split(sep).join("/");
}
