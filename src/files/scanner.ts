/**
 * Recursive discovery of archive files under the root folder.
 */
import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";

import { FileOperationError, errorMessage } from "../core/exceptions.js";
import type { Logger } from "../logger.js";

export interface ScanOptions {
  /** File extension to match, case-insensitively (e.g. ".zip") */
  extension: string;
  /** Directory names that are never descended into */
  skipDirectories?: string[];
}

/**
 * Walk `root` depth-first in name order and return the path of every file
 * ending with the archive extension. Throws FileOperationError when the root
 * is missing, not a directory, or unreadable; unreadable subfolders are
 * logged and skipped.
 */
export async function scanForArchives(
  root: string,
  logger: Logger,
  options: ScanOptions,
): Promise<string[]> {
  try {
    const s = await stat(root);
    if (!s.isDirectory()) {
      throw new FileOperationError(root, "Root folder is not a directory");
    }
  } catch (err) {
    throw FileOperationError.from(root, "Reading root folder", err);
  }

  const extension = options.extension.toLowerCase();
  const skip = new Set(options.skipDirectories ?? []);
  const archives: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (dir === root) throw FileOperationError.from(dir, "Reading root folder", err);
      logger.warn(`Skipped unreadable folder ${dir}: ${errorMessage(err)}`);
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (skip.has(entry.name)) continue;
        await walk(full);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(extension)) {
        logger.info(`Found archive: ${full}`);
        archives.push(full);
      }
    }
  };

  await walk(root);

  if (archives.length === 0) {
    logger.warn(`No ${options.extension} files found under ${root}`);
  }
  return archives;
}
