/**
 * takeout-merge – extract per-account export archives and merge them into
 * their account folders.
 */
import { MAX_PARALLEL_WORKERS, parseConfig, type RunConfiguration } from "./config.js";
import { ArchiveUnitProcessor, type ArchiveUnitProcessorOptions } from "./core/processor.js";
import { BatchScheduler } from "./core/scheduler.js";
import type { RunSummary, WorkItem } from "./core/types.js";
import { createWorkItem } from "./core/work-item.js";
import { scanForArchives } from "./files/scanner.js";
import { nullLogger, type Logger } from "./logger.js";

export { parseConfig, ConfigSchema, MAX_PARALLEL_WORKERS } from "./config.js";
export type { ConfigInput, RunConfiguration } from "./config.js";
export * from "./core/exceptions.js";
export { PROCESSING_MODES } from "./core/types.js";
export type {
  EntryResult,
  ItemOutcome,
  MergeAction,
  ProcessingMode,
  ProcessingStage,
  RunSummary,
  WorkItem,
} from "./core/types.js";
export { ArchiveUnitProcessor, type ItemProcessor } from "./core/processor.js";
export { BatchScheduler } from "./core/scheduler.js";
export { RetryExecutor, type RetryableAction, type RetryResult } from "./core/retry.js";
export { shouldOverwrite } from "./files/comparator.js";
export { relocate } from "./files/relocator.js";
export { scanForArchives } from "./files/scanner.js";
export { createLogger, nullLogger } from "./logger.js";
export type { Logger, LogContext } from "./logger.js";

export class ArchiveMerger {
  private config: RunConfiguration;
  private logger: Logger;
  private processorOptions: ArchiveUnitProcessorOptions;

  constructor(
    config: RunConfiguration,
    logger: Logger = nullLogger,
    processorOptions: ArchiveUnitProcessorOptions = {},
  ) {
    this.config = config;
    this.logger = logger;
    this.processorOptions = processorOptions;
  }

  /** Construct from a raw configuration object (validates with Zod). */
  static fromConfig(raw: unknown, logger?: Logger): ArchiveMerger {
    return new ArchiveMerger(parseConfig(raw), logger);
  }

  /**
   * Scan the root folder and derive one work item per archive. Rejects with
   * FileOperationError when the root cannot be read.
   */
  async discover(): Promise<WorkItem[]> {
    const paths = await scanForArchives(this.config.rootFolder, this.logger, {
      extension: this.config.archiveExtension,
      skipDirectories: [this.config.tempFolderName],
    });
    const items = paths.map((p) => createWorkItem(p, this.config));

    const seen = new Map<string, string>();
    for (const item of items) {
      const other = seen.get(item.accountFolder);
      if (other) {
        this.logger.warn(
          `${item.archivePath} shares account folder ${item.accountFolder} with ${other}; both use the same temp folder`,
        );
      } else {
        seen.set(item.accountFolder, item.archivePath);
      }
    }
    return items;
  }

  /** Discover archives and process them all. */
  async run(): Promise<RunSummary> {
    this.logger.info(`Scanning ${this.config.rootFolder} (mode: ${this.config.mode})`);
    const items = await this.discover();

    const processor = new ArchiveUnitProcessor(this.config, this.logger, this.processorOptions);
    const scheduler = new BatchScheduler(processor, this.logger, {
      maxParallel: MAX_PARALLEL_WORKERS,
      testModeLimit: this.config.testModeLimit,
    });
    return scheduler.run(items);
  }
}
