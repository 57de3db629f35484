/**
 * Merge policy interface – one implementation per processing mode.
 */
import type { Logger } from "../logger.js";
import type { MergeAction, ProcessingMode } from "./types.js";

/** One entry found directly inside an archive's content folder. */
export interface MergeEntry {
  name: string;
  sourcePath: string;
  /** Same name, inside the account folder */
  destPath: string;
}

/**
 * Decides what happens to an extracted entry. Implementations may raise; the
 * processor retries each entry through the Retry Executor.
 */
export interface MergePolicy {
  readonly mode: ProcessingMode;
  /** Whether the source archive may be deleted after a clean merge. */
  readonly consumesArchive: boolean;
  mergeEntry(entry: MergeEntry, logger: Logger): Promise<MergeAction>;
}
