/**
 * Small filesystem helpers shared by the comparator, relocator and processor.
 */
import { lstat } from "node:fs/promises";
import type { Stats } from "node:fs";

import { FileOperationError } from "../core/exceptions.js";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** lstat that resolves to null for a missing path. */
export async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await lstat(path);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw FileOperationError.from(path, "stat", err);
  }
}

export async function pathExists(path: string): Promise<boolean> {
  return (await statOrNull(path)) !== null;
}
