import { basename, dirname, join, resolve } from "node:path";

import type { RunConfiguration } from "../config.js";
import type { WorkItem } from "./types.js";

/** Derive the account and temp paths for one discovered archive. */
export function createWorkItem(
  archivePath: string,
  config: Pick<RunConfiguration, "tempFolderName" | "contentFolderName">,
): WorkItem {
  const absolute = resolve(archivePath);
  const accountFolder = dirname(absolute);
  const tempRoot = join(accountFolder, config.tempFolderName);
  return Object.freeze({
    archivePath: absolute,
    accountFolder,
    accountName: basename(accountFolder),
    tempRoot,
    contentFolder: join(tempRoot, config.contentFolderName),
  });
}
