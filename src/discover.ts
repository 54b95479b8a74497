import path from "node:path";
import fs from "node:fs/promises";
import type { Dirent, Stats } from "node:fs";
import { DiscoveryError, InvalidInputError, NotFoundError, errorMessage, isNotFound, isUnresolvable } from "./errors.js";
import { comparePaths, hasHeifExtension } from "./utils.js";

/**
 * True when `filePath` is a regular file (symlinks followed) with a
 * .heic/.heif extension in any case. Dangling and looping links are not
 * eligible; any other stat failure is a DiscoveryError.
 */
export async function isEligible(filePath: string): Promise<boolean> {
  if (!hasHeifExtension(filePath)) return false;

  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (err) {
    if (isUnresolvable(err)) return false;
    throw new DiscoveryError(filePath, errorMessage(err));
  }
}

/**
 * Lists the HEIC/HEIF files to convert under `root`, sorted by full path.
 * A file root is returned as-is; a directory root is listed, and walked
 * when `recursive` is set. Symlinked directories are never descended into.
 */
export async function discover(root: string, recursive: boolean): Promise<string[]> {
  let stats: Stats;
  try {
    stats = await fs.stat(root);
  } catch (err) {
    if (isNotFound(err)) throw new NotFoundError(root);
    throw err;
  }

  if (stats.isFile()) {
    if (!hasHeifExtension(root)) {
      throw new InvalidInputError(root, "Input file must be a HEIC/HEIF file");
    }
    return [root];
  }

  if (!stats.isDirectory()) {
    throw new InvalidInputError(root, "Input is neither a file nor a directory");
  }

  const files = await walk(root, recursive);
  return files.sort(comparePaths);
}

async function walk(dir: string, recursive: boolean): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new DiscoveryError(dir, errorMessage(err));
  }

  const found: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (recursive) {
        found.push(...(await walk(fullPath, true)));
      }
      continue;
    }

    if (await isEligible(fullPath)) {
      found.push(fullPath);
    }
  }

  return found;
}
