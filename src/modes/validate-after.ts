/**
 * Validate-after mode: list the entries a normal run would move.
 *
 * Nothing is moved in this mode; candidates stay in the temp folder for
 * inspection.
 */
import type { MergeEntry, MergePolicy } from "../core/merge.js";
import type { MergeAction } from "../core/types.js";
import { shouldOverwrite } from "../files/comparator.js";
import type { Logger } from "../logger.js";

export class ValidateAfterMergePolicy implements MergePolicy {
  readonly mode = "validate-after" as const;
  readonly consumesArchive = false;

  async mergeEntry(entry: MergeEntry, logger: Logger): Promise<MergeAction> {
    if (await shouldOverwrite(entry.sourcePath, entry.destPath)) {
      logger.info(`Would validate ${entry.destPath}`);
      return "pending-validation";
    }
    logger.info(`Skipped ${entry.destPath}: no change`);
    return "skipped-unchanged";
  }
}
