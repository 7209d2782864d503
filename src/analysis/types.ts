import type { AbortReason } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { AnalysisBudgetOptions, AnalysisLimits } from "./budget.js";
import type { ClassificationStore } from "./store.js";

/** Options shared by both classifiers. */
export interface ClassifierOptions extends AnalysisBudgetOptions {
  readonly limits?: AnalysisLimits;
  readonly logger?: StructuredLogger;
}

/**
 * Result of a classification pass. An aborted pass still hands back the
 * records it settled; callers that need the full state space should check
 * `status` or go through `requireComplete`.
 */
export type AnalysisOutcome =
  | { readonly status: "complete"; readonly store: ClassificationStore; readonly elapsedMs: number }
  | {
      readonly status: "aborted";
      readonly reason: AbortReason;
      readonly store: ClassificationStore;
      readonly elapsedMs: number;
    };
