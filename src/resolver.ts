import path from "node:path";
import fs from "node:fs/promises";
import { DiscoveryError, EmptyDiscoveryError } from "./errors.js";
import { SOURCE_EXTENSIONS } from "./formats.js";
import { hasExtension } from "./utils.js";
import type { DiscoveredFile, SourceFormat } from "./types.js";

function compareRelative(a: DiscoveredFile, b: DiscoveredFile): number {
  if (a.relativePath < b.relativePath) return -1;
  if (a.relativePath > b.relativePath) return 1;
  return 0;
}

async function walk(root: string, dir: string, recursive: boolean, extension: string, found: DiscoveredFile[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    let isFile = entry.isFile();
    let isDir = entry.isDirectory();

    // Linked files are followed, linked folders are not, so cycles can't form.
    if (entry.isSymbolicLink()) {
      const target = await fs.stat(full).catch(() => undefined);
      isFile = target?.isFile() ?? false;
      isDir = false;
    }

    if (isDir) {
      if (recursive) await walk(root, full, recursive, extension, found);
      continue;
    }

    if (isFile && hasExtension(entry.name, extension)) {
      found.push({ sourcePath: full, relativePath: path.relative(root, full) });
    }
  }
}

/**
 * Lists the source files under `inpath` in relative-path order.
 * A single matching file yields one entry with an empty relative path.
 */
export async function resolveSources(
  inpath: string,
  recursive: boolean,
  sourceFormat: SourceFormat,
): Promise<DiscoveredFile[]> {
  const root = path.resolve(inpath);
  const extension = SOURCE_EXTENSIONS[sourceFormat];

  let stat;
  try {
    stat = await fs.stat(root);
  } catch {
    throw new DiscoveryError(`Input path does not exist: ${inpath}`, inpath);
  }

  if (stat.isFile()) {
    if (!hasExtension(root, extension)) {
      throw new EmptyDiscoveryError(inpath, extension);
    }
    return [{ sourcePath: root, relativePath: "" }];
  }

  if (!stat.isDirectory()) {
    throw new DiscoveryError(`Input is neither a file nor a folder: ${inpath}`, inpath);
  }

  const found: DiscoveredFile[] = [];
  await walk(root, root, recursive, extension, found);

  if (found.length === 0) {
    throw new EmptyDiscoveryError(inpath, extension);
  }

  return found.sort(compareRelative);
}
