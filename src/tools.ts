import path from "node:path";
import fs from "node:fs/promises";
import fsSync from "node:fs";
import { ConfigurationError } from "./errors.js";
import type { ToolName, ToolPaths } from "./types.js";

const WINDOWS_SUFFIXES = [".exe", ".cmd", ".bat"];

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    if (process.platform !== "win32") {
      await fs.access(candidate, fsSync.constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Looks for an executable in `binDir` first, then on PATH.
 * Returns the absolute path, or undefined when not found.
 */
export async function findExecutable(
  name: string,
  binDir?: string,
  envPath: string = process.env.PATH ?? "",
): Promise<string | undefined> {
  const dirs = envPath.split(path.delimiter).filter((dir) => dir.length > 0);
  if (binDir) dirs.unshift(binDir);

  const names = process.platform === "win32"
    ? [name, ...WINDOWS_SUFFIXES.map((suffix) => `${name}${suffix}`)]
    : [name];

  for (const dir of dirs) {
    for (const candidate of names) {
      const full = path.resolve(dir, candidate);
      if (await isExecutable(full)) return full;
    }
  }
  return undefined;
}

export async function locateTools(
  tools: readonly ToolName[],
  binDir?: string,
  envPath?: string,
): Promise<ToolPaths> {
  const located: ToolPaths = {};
  const missing: ToolName[] = [];

  for (const tool of tools) {
    const found = await findExecutable(tool, binDir, envPath);
    if (found) {
      located[tool] = found;
    } else {
      missing.push(tool);
    }
  }

  if (missing.length > 0) {
    const where = binDir ? `${binDir} or PATH` : "PATH";
    throw new ConfigurationError(
      `Cannot locate required executable${missing.length > 1 ? "s" : ""} ${missing.join(", ")} in ${where}`,
    );
  }

  return located;
}
