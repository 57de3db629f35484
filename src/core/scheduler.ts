/**
 * Batch Scheduler – dispatches work items in barrier-synchronised batches.
 */
import type { Logger } from "../logger.js";
import { ArchiveProcessingError, errorMessage } from "./exceptions.js";
import type { ItemProcessor } from "./processor.js";
import type { ItemOutcome, RunSummary, WorkItem } from "./types.js";

export interface BatchSchedulerOptions {
  /** Maximum concurrently running workers */
  maxParallel: number;
  /** Cap on dispatched items; 0 means unlimited */
  testModeLimit: number;
}

export class BatchScheduler {
  private processor: ItemProcessor;
  private logger: Logger;
  private maxParallel: number;
  private testModeLimit: number;

  constructor(processor: ItemProcessor, logger: Logger, options: BatchSchedulerOptions) {
    this.processor = processor;
    this.logger = logger;
    this.maxParallel = Math.max(1, Math.floor(options.maxParallel));
    this.testModeLimit = Math.max(0, Math.floor(options.testModeLimit));
  }

  /**
   * Process `items` in discovery order, at most `maxParallel` at a time. Each
   * batch finishes completely before the next one starts.
   */
  async run(items: readonly WorkItem[]): Promise<RunSummary> {
    const summary: RunSummary = {
      discovered: items.length,
      dispatched: 0,
      notDispatched: 0,
      completed: 0,
      failed: 0,
      outcomes: [],
    };

    if (items.length === 0) {
      this.logger.info("No archives found to process");
      return summary;
    }

    const limited = this.testModeLimit > 0 && this.testModeLimit < items.length;
    const selected = limited ? items.slice(0, this.testModeLimit) : items;
    const batchCount = Math.ceil(selected.length / this.maxParallel);

    for (let start = 0; start < selected.length; start += this.maxParallel) {
      const batch = selected.slice(start, start + this.maxParallel);
      this.logger.debug(
        `Starting batch ${start / this.maxParallel + 1}/${batchCount} (${batch.length} archives)`,
      );
      summary.dispatched += batch.length;

      const settled = await Promise.allSettled(batch.map((item) => this.processor.process(item)));
      settled.forEach((result, i) => {
        const outcome =
          result.status === "fulfilled" ? result.value : this.rejectedOutcome(batch[i], result.reason);
        summary.outcomes.push(outcome);
        if (outcome.status === "completed") summary.completed++;
        else summary.failed++;
      });
    }

    summary.notDispatched = items.length - summary.dispatched;
    if (limited) {
      this.logger.warn(
        `Test mode: stopped after ${summary.dispatched} of ${items.length} archives`,
      );
    }

    this.logger.info("All files processed", {
      completed: summary.completed,
      failed: summary.failed,
      notDispatched: summary.notDispatched,
    });
    return summary;
  }

  private rejectedOutcome(item: WorkItem, reason: unknown): ItemOutcome {
    const error = new ArchiveProcessingError(
      `Worker for ${item.archivePath} crashed: ${errorMessage(reason)}`,
      { cause: reason },
    );
    this.logger.error(error.message, reason, { account: item.accountName });
    return {
      item,
      status: "failed",
      entries: [],
      errors: [error.message],
      archiveDeleted: false,
    };
  }
}
