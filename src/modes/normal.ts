/**
 * Normal mode: move changed entries into the account folder.
 */
import type { MergeEntry, MergePolicy } from "../core/merge.js";
import type { MergeAction } from "../core/types.js";
import { shouldOverwrite } from "../files/comparator.js";
import { relocate } from "../files/relocator.js";
import type { Logger } from "../logger.js";

export class NormalMergePolicy implements MergePolicy {
  readonly mode = "normal" as const;
  readonly consumesArchive = true;

  async mergeEntry(entry: MergeEntry, logger: Logger): Promise<MergeAction> {
    if (!(await shouldOverwrite(entry.sourcePath, entry.destPath))) {
      logger.info(`Skipped ${entry.destPath}: no change`);
      return "skipped-unchanged";
    }
    return relocate(entry.sourcePath, entry.destPath, logger);
  }
}
