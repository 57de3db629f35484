/**
 * Moves one extracted entry into its account folder.
 */
import { cp, rename, rm } from "node:fs/promises";

import { FileOperationError } from "../core/exceptions.js";
import type { Logger } from "../logger.js";
import { pathExists } from "./paths.js";

export type RelocateResult = "moved" | "skipped-existing";

async function moveAcrossDevices(sourcePath: string, destPath: string): Promise<void> {
  try {
    await cp(sourcePath, destPath, { recursive: true, errorOnExist: true, force: false });
  } catch (err) {
    // A partial copy would read as "already exists" on the next attempt
    await rm(destPath, { recursive: true, force: true });
    throw err;
  }
  await rm(sourcePath, { recursive: true, force: true });
}

/**
 * Move `sourcePath` to `destPath` unless the destination already exists.
 * Never overwrites; failures are raised for the caller to retry.
 */
export async function relocate(
  sourcePath: string,
  destPath: string,
  logger: Logger,
): Promise<RelocateResult> {
  if (await pathExists(destPath)) {
    logger.info(`Skipped ${destPath}: already exists`);
    return "skipped-existing";
  }

  try {
    await rename(sourcePath, destPath);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EXDEV") {
      try {
        await moveAcrossDevices(sourcePath, destPath);
      } catch (copyErr) {
        throw FileOperationError.from(sourcePath, "move", copyErr);
      }
    } else {
      throw FileOperationError.from(sourcePath, "move", err);
    }
  }

  logger.info(`Moved ${sourcePath} -> ${destPath}`);
  return "moved";
}
