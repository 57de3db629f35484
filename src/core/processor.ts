/**
 * Archive Unit Processor – the per-archive clean → extract → merge → delete
 * sequence.
 */
import { readdir, rm } from "node:fs/promises";
import { basename, join } from "node:path";

import { extractZip, type ArchiveExtractor } from "../archive/unzip.js";
import type { RunConfiguration } from "../config.js";
import type { Logger } from "../logger.js";
import { getMergePolicy } from "../modes/registry.js";
import { errorMessage } from "./exceptions.js";
import type { MergeEntry, MergePolicy } from "./merge.js";
import { RetryExecutor } from "./retry.js";
import type { ItemOutcome, ProcessingStage, WorkItem } from "./types.js";

/** Anything the scheduler can hand a work item to. */
export interface ItemProcessor {
  process(item: WorkItem): Promise<ItemOutcome>;
}

export interface ArchiveUnitProcessorOptions {
  /** Defaults to the fflate zip extractor */
  extractor?: ArchiveExtractor;
}

interface ExtractedContent {
  folder: string;
  names: string[];
}

export class ArchiveUnitProcessor implements ItemProcessor {
  private config: RunConfiguration;
  private logger: Logger;
  private policy: MergePolicy;
  private extractor: ArchiveExtractor;

  constructor(config: RunConfiguration, logger: Logger, options: ArchiveUnitProcessorOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.policy = getMergePolicy(config.mode);
    this.extractor = options.extractor ?? extractZip;
  }

  /**
   * Process one archive. Failures are recorded in the outcome and the log;
   * the returned promise does not reject for filesystem or extraction errors.
   */
  async process(item: WorkItem): Promise<ItemOutcome> {
    const log = this.logger.child({ account: item.accountName });
    const retry = new RetryExecutor(log, { delayMs: this.config.retryDelayMs });
    const outcome: ItemOutcome = {
      item,
      status: "completed",
      entries: [],
      errors: [],
      archiveDeleted: false,
    };

    log.info(`Processing ${item.archivePath}`);

    if ((await this.cleanTemp(item, retry, outcome)) && (await this.extract(item, retry, outcome))) {
      const merged = await this.merge(item, retry, log, outcome);
      if (merged && this.config.deleteArchives && this.policy.consumesArchive) {
        const leftBehind = outcome.entries
          .filter((e) => e.action === "skipped-existing")
          .map((e) => e.name);
        if (leftBehind.length > 0) {
          log.warn(
            `Kept archive ${item.archivePath}: not merged because the destination differs: ${leftBehind.join(", ")}`,
          );
        } else {
          await this.deleteArchive(item, retry, log, outcome);
        }
      }
    }

    if (outcome.status === "completed") {
      log.info(`Finished ${item.archivePath}`, { entries: outcome.entries.length });
    } else {
      log.error(`Failed ${item.archivePath} during ${outcome.failedStage ?? "processing"}`, undefined, {
        errors: outcome.errors,
      });
    }
    return outcome;
  }

  // ------------------------------------------------------------------
  // Steps
  // ------------------------------------------------------------------

  private async cleanTemp(item: WorkItem, retry: RetryExecutor, outcome: ItemOutcome): Promise<boolean> {
    const result = await retry.execute(
      {
        name: `Clean temp folder ${item.tempRoot}`,
        run: () => rm(item.tempRoot, { recursive: true, force: true }),
      },
      this.config.maxRetries,
    );
    if (!result.ok) this.fail(outcome, "clean", result.error);
    return result.ok;
  }

  private async extract(item: WorkItem, retry: RetryExecutor, outcome: ItemOutcome): Promise<boolean> {
    const result = await retry.execute(
      {
        name: `Extract ${item.archivePath}`,
        run: () => this.extractor(item.archivePath, item.tempRoot),
      },
      this.config.maxRetries,
    );
    if (!result.ok) this.fail(outcome, "extract", result.error);
    return result.ok;
  }

  /** Returns true when every entry merged without failure. */
  private async merge(
    item: WorkItem,
    retry: RetryExecutor,
    log: Logger,
    outcome: ItemOutcome,
  ): Promise<boolean> {
    const listed = await retry.execute(
      {
        name: `List extracted content of ${item.archivePath}`,
        run: () => this.readContent(item),
      },
      this.config.maxRetries,
    );
    if (!listed.ok) {
      this.fail(outcome, "merge", listed.error);
      return false;
    }
    if (!listed.value) {
      log.info(`No ${basename(item.contentFolder)} folder in ${item.archivePath}; nothing to merge`);
      return true;
    }

    const { folder, names } = listed.value;
    let clean = true;
    for (const name of names) {
      const entry: MergeEntry = {
        name,
        sourcePath: join(folder, name),
        destPath: join(item.accountFolder, name),
      };
      const result = await retry.execute(
        {
          name: `Merge ${entry.sourcePath}`,
          run: () => this.policy.mergeEntry(entry, log),
        },
        this.config.maxRetries,
      );
      if (result.ok) {
        outcome.entries.push({ name, destPath: entry.destPath, action: result.value });
      } else {
        this.fail(outcome, "merge", result.error);
        clean = false;
      }
    }
    return clean;
  }

  private async deleteArchive(
    item: WorkItem,
    retry: RetryExecutor,
    log: Logger,
    outcome: ItemOutcome,
  ): Promise<void> {
    const result = await retry.execute(
      {
        name: `Delete archive ${item.archivePath}`,
        run: () => rm(item.archivePath),
      },
      this.config.maxRetries,
    );
    if (result.ok) {
      outcome.archiveDeleted = true;
      log.info(`Deleted archive ${item.archivePath}`);
    } else {
      this.fail(outcome, "delete", result.error);
    }
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  /**
   * Locate the content folder inside the temp root (exact name first, then
   * case-insensitive) and list its entries in name order.
   */
  private async readContent(item: WorkItem): Promise<ExtractedContent | null> {
    const wanted = basename(item.contentFolder);
    const children = await readdir(item.tempRoot, { withFileTypes: true });
    const dirs = children.filter((c) => c.isDirectory()).map((c) => c.name);
    const match =
      dirs.find((name) => name === wanted) ??
      dirs.find((name) => name.toLowerCase() === wanted.toLowerCase());
    if (match === undefined) return null;

    const folder = join(item.tempRoot, match);
    const names = (await readdir(folder)).sort();
    return { folder, names };
  }

  private fail(outcome: ItemOutcome, stage: ProcessingStage, error: unknown): void {
    outcome.status = "failed";
    outcome.failedStage ??= stage;
    outcome.errors.push(errorMessage(error));
  }
}
