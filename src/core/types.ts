/**
 * Work item, outcome and summary types shared by the processor and scheduler.
 */

export const PROCESSING_MODES = ["normal", "validate-only", "validate-after"] as const;

/** Run-wide merge policy. */
export type ProcessingMode = (typeof PROCESSING_MODES)[number];

/** One archive and the paths derived from it at discovery time. */
export interface WorkItem {
  readonly archivePath: string;
  /** Directory holding the archive; extracted entries are merged into it. */
  readonly accountFolder: string;
  readonly accountName: string;
  /** Private extraction area, derived from the account folder. */
  readonly tempRoot: string;
  /** Where the archive's content tree is expected after extraction. */
  readonly contentFolder: string;
}

/** What a merge policy did with one extracted entry. */
export type MergeAction =
  | "moved"
  | "skipped-existing"
  | "skipped-unchanged"
  | "pending-validation"
  | "validation-skipped";

export interface EntryResult {
  name: string;
  destPath: string;
  action: MergeAction;
}

export type ProcessingStage = "clean" | "extract" | "merge" | "delete";

/** Result of one Archive Unit Processor invocation. */
export interface ItemOutcome {
  item: WorkItem;
  status: "completed" | "failed";
  /** First stage that failed, when status is "failed". */
  failedStage?: ProcessingStage;
  entries: EntryResult[];
  errors: string[];
  archiveDeleted: boolean;
}

/** Aggregate returned by the Batch Scheduler. */
export interface RunSummary {
  discovered: number;
  dispatched: number;
  notDispatched: number;
  completed: number;
  failed: number;
  outcomes: ItemOutcome[];
}
