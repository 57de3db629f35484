/**
 * Content comparison between an extracted entry and its destination.
 */
import { createHash } from "node:crypto";
import { createReadStream, type Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";

import { FileOperationError } from "../core/exceptions.js";
import { statOrNull } from "./paths.js";

/** SHA-256 of a single file, streamed. */
export async function hashFile(path: string): Promise<string> {
  const hash = createHash("sha256");
  try {
    for await (const chunk of createReadStream(path)) {
      hash.update(chunk);
    }
  } catch (err) {
    throw FileOperationError.from(path, "read", err);
  }
  return hash.digest("hex");
}

/**
 * Digest of a directory tree: every relative path in sorted order, each
 * followed by the file digest ("dir" for subdirectories).
 */
export async function hashTree(root: string): Promise<string> {
  const hash = createHash("sha256");

  const walk = async (dir: string, prefix: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw FileOperationError.from(dir, "read directory", err);
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        hash.update(`${rel}\0dir\n`);
        await walk(full, rel);
      } else {
        hash.update(`${rel}\0${await hashFile(full)}\n`);
      }
    }
  };

  await walk(root, "");
  return hash.digest("hex");
}

async function digest(path: string, isDirectory: boolean): Promise<string> {
  return isDirectory ? `tree:${await hashTree(path)}` : `file:${await hashFile(path)}`;
}

/**
 * True when the destination is missing or its content differs from the
 * source. Read failures propagate.
 */
export async function shouldOverwrite(sourcePath: string, destPath: string): Promise<boolean> {
  const dest = await statOrNull(destPath);
  if (!dest) return true;

  const source = await statOrNull(sourcePath);
  if (!source) {
    throw new FileOperationError(sourcePath, "Source disappeared before comparison");
  }
  if (source.isDirectory() !== dest.isDirectory()) return true;

  const [a, b] = await Promise.all([
    digest(sourcePath, source.isDirectory()),
    digest(destPath, dest.isDirectory()),
  ]);
  return a !== b;
}
