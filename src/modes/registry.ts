/**
 * Mode registry – maps ProcessingMode values to merge policy classes.
 */
import type { MergePolicy } from "../core/merge.js";
import type { ProcessingMode } from "../core/types.js";
import { NormalMergePolicy } from "./normal.js";
import { ValidateAfterMergePolicy } from "./validate-after.js";
import { ValidateOnlyMergePolicy } from "./validate-only.js";

export const MODE_REGISTRY: Record<ProcessingMode, new () => MergePolicy> = {
  normal: NormalMergePolicy,
  "validate-only": ValidateOnlyMergePolicy,
  "validate-after": ValidateAfterMergePolicy,
};

export function getMergePolicy(mode: ProcessingMode): MergePolicy {
  return new MODE_REGISTRY[mode]();
}
