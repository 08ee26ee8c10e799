import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve } from "node:path";
import { z } from "zod";
import { createLogger } from "../logging.js";
import { truncate } from "../utils.js";
import { defineTool } from "./tool-registry.js";
import type { ToolDefinition } from "./tool-registry.js";

const log = createLogger("file-tools");

const MAX_READ_CHARS = 100_000;

export type FileToolsOptions = {
  /** Every path the model passes is resolved against, and confined to, this directory. */
  root: string;
  maxReadChars?: number;
};

/** Resolves `path` under `root`; throws when it would escape. */
export function resolveInsideRoot(root: string, path: string): string {
  const base = resolve(root);
  const target = resolve(base, path);
  const rel = relative(base, target);
  if (rel === ".." || rel.startsWith("../") || rel.startsWith("..\\") || isAbsolute(rel)) {
    throw new Error(`path "${path}" is outside the workspace`);
  }
  return target;
}

export function createFileTools(options: FileToolsOptions): ToolDefinition[] {
  const { root } = options;
  const maxReadChars = options.maxReadChars ?? MAX_READ_CHARS;

  const readFileTool = defineTool({
    name: "read_file",
    description: "Read a UTF-8 text file from the workspace.",
    inputSchema: z.object({
      path: z.string().min(1).describe("Path relative to the workspace root"),
    }),
    async execute({ path }) {
      const target = resolveInsideRoot(root, path);
      const content = await readFile(target, "utf-8");
      return truncate(content, maxReadChars);
    },
  });

  const writeFileTool = defineTool({
    name: "write_file",
    description: "Write a UTF-8 text file in the workspace, creating parent directories and replacing any existing file.",
    inputSchema: z.object({
      path: z.string().min(1).describe("Path relative to the workspace root"),
      content: z.string(),
    }),
    async execute({ path, content }) {
      const target = resolveInsideRoot(root, path);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, "utf-8");
      const bytes = Buffer.byteLength(content, "utf-8");
      log.debug(`wrote ${bytes} bytes to ${target}`);
      return `wrote ${bytes} bytes to ${path}`;
    },
  });

  const listDirTool = defineTool({
    name: "list_dir",
    description: "List the entries of a workspace directory, one per line. Directories end with /.",
    inputSchema: z.object({
      path: z.string().default(".").describe("Directory relative to the workspace root"),
    }),
    async execute({ path }) {
      const target = resolveInsideRoot(root, path);
      const entries = await readdir(target, { withFileTypes: true });
      const names = entries
        .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
        .sort();
      return names.length > 0 ? names.join("\n") : "(empty directory)";
    },
  });

  return [readFileTool, writeFileTool, listDirTool];
}
