/**
 * Validate-only mode: report every entry, touch nothing.
 */
import type { MergeEntry, MergePolicy } from "../core/merge.js";
import type { MergeAction } from "../core/types.js";
import type { Logger } from "../logger.js";

export class ValidateOnlyMergePolicy implements MergePolicy {
  readonly mode = "validate-only" as const;
  readonly consumesArchive = false;

  async mergeEntry(entry: MergeEntry, logger: Logger): Promise<MergeAction> {
    logger.info(`Validation only: skipped ${entry.destPath}`);
    return "validation-skipped";
  }
}
