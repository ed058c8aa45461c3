import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { resolveInside } from "../workspace/files.js";
import type { AgentTool } from "./types.js";

const MAX_READ_LENGTH = 16_000;

const ReadArgs = z.object({ path: z.string().min(1) });
const WriteArgs = z.object({ path: z.string().min(1), content: z.string() });
const ListArgs = z.object({ path: z.string().optional() });

/**
 * Resolve a tool-supplied path against the workspace. Absolute paths and
 * anything climbing out of the workspace are refused.
 */
export function resolveWorkspacePath(workspaceDir: string, path: string | undefined): string {
  if (path === undefined || path === "" || path === "." || path === "./") {
    return resolve(workspaceDir);
  }
  const target = resolveInside(workspaceDir, path);
  if (!target) {
    throw new Error(`Path is outside the workspace: ${path}`);
  }
  return target;
}

/**
 * File tools bound to one workspace directory.
 */
export function createWorkspaceTools(workspaceDir: string): AgentTool[] {
  const fileRead: AgentTool = {
    name: "file_read",
    description: "Read a file from the session workspace and return it as text.",
    parameters: {
      type: "object",
      properties: {
        path: { type: "string", description: "Path relative to the workspace" },
      },
      required: ["path"],
    },
    async execute(args) {
      const { path } = ReadArgs.parse(args);
      const content = await readFile(resolveWorkspacePath(workspaceDir, path), "utf-8");
      if (content.length > MAX_READ_LENGTH) {
        return `${content.slice(0, MAX_READ_LENGTH)}\n\n[Truncated, ${content.length} chars total]`;
      }
      return content;
    },
  };

  const fileWrite: AgentTool = {
    name: "file_write",
    description:
      "Write content to a file in the session workspace, creating it if it does not exist. " +
      "Files written here are kept for later conversations.",
    parameters: {
      type: "object",
      properties: {
        path: { type: "string", description: "Path relative to the workspace" },
        content: { type: "string", description: "Content to write" },
      },
      required: ["path", "content"],
    },
    async execute(args) {
      const { path, content } = WriteArgs.parse(args);
      const target = resolveWorkspacePath(workspaceDir, path);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, { mode: 0o600 });
      return `Wrote ${Buffer.byteLength(content)} bytes to ${path}`;
    },
  };

  const fileList: AgentTool = {
    name: "file_list",
    description: "List files and directories in the session workspace.",
    parameters: {
      type: "object",
      properties: {
        path: {
          type: "string",
          description: "Directory relative to the workspace (default: workspace root)",
        },
      },
    },
    async execute(args) {
      const { path } = ListArgs.parse(args);
      const dir = resolveWorkspacePath(workspaceDir, path);
      const entries = (await readdir(dir)).sort();
      const lines: string[] = [];
      for (const entry of entries) {
        const info = await stat(join(dir, entry));
        lines.push(
          info.isDirectory() ? `dir\t${entry}` : `file\t${entry} (${info.size} bytes)`,
        );
      }
      return lines.join("\n") || "(empty directory)";
    },
  };

  return [fileRead, fileWrite, fileList];
}
