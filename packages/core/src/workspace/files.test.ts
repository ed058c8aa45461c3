import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { copyTree, listFiles, resolveInside } from "./files.js";

describe("workspace files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tidewire-files-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("lists regular files recursively as sorted POSIX paths", async () => {
    mkdirSync(join(dir, "src", "deep"), { recursive: true });
    writeFileSync(join(dir, "z.txt"), "z");
    writeFileSync(join(dir, "src", "a.ts"), "a");
    writeFileSync(join(dir, "src", "deep", "b.ts"), "b");
    mkdirSync(join(dir, "empty"));

    expect(await listFiles(dir)).toEqual(["src/a.ts", "src/deep/b.ts", "z.txt"]);
  });

  it("lists nothing for a missing directory", async () => {
    expect(await listFiles(join(dir, "absent"))).toEqual([]);
  });

  it("copies a tree, overwriting existing files", async () => {
    const src = join(dir, "src");
    const dest = join(dir, "dest");
    mkdirSync(join(src, "notes"), { recursive: true });
    writeFileSync(join(src, "notes", "todo.md"), "new");
    mkdirSync(join(dest, "notes"), { recursive: true });
    writeFileSync(join(dest, "notes", "todo.md"), "old");
    writeFileSync(join(dest, "keep.md"), "keep");

    expect(await copyTree(src, dest)).toEqual(["notes/todo.md"]);
    expect(readFileSync(join(dest, "notes", "todo.md"), "utf-8")).toBe("new");
    expect(readFileSync(join(dest, "keep.md"), "utf-8")).toBe("keep");
  });
});

describe("resolveInside", () => {
  it("resolves nested relative paths", () => {
    expect(resolveInside("/ws", "a/b.txt")).toBe(resolve("/ws", "a", "b.txt"));
    expect(resolveInside("/ws", "a/../b.txt")).toBe(resolve("/ws", "b.txt"));
  });

  it("rejects escapes, absolute paths and the root itself", () => {
    expect(resolveInside("/ws", "../etc/passwd")).toBeUndefined();
    expect(resolveInside("/ws", "a/../../x")).toBeUndefined();
    expect(resolveInside("/ws", "/etc/passwd")).toBeUndefined();
    expect(resolveInside("/ws", ".")).toBeUndefined();
  });
});
