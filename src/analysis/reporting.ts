import type { StructuredLogger } from "../logger.js";
import type { BooleanNetwork, UpdateMode } from "../network/model.js";
import type { AnalysisBudget } from "./budget.js";
import type { ClassificationWriter } from "./store.js";
import type { AnalysisOutcome } from "./types.js";

export function logAnalysisStart(logger: StructuredLogger | undefined, mode: UpdateMode, network: BooleanNetwork): void {
  logger?.info("state_space_analysis_started", {
    mode,
    nodes: network.nodeCount,
    states: network.stateCount,
  });
}

/** Seals the writer and turns the budget state into an outcome, logging either way. */
export function finishOutcome(
  logger: StructuredLogger | undefined,
  writer: ClassificationWriter,
  budget: AnalysisBudget,
): AnalysisOutcome {
  const store = writer.finish();
  const elapsedMs = budget.elapsedMs();
  const reason = budget.abortReason;

  if (reason !== null) {
    logger?.warn("state_space_analysis_aborted", {
      mode: store.mode,
      reason,
      classified: store.classifiedCount,
      states: store.stateCount,
      attractors: store.attractorCount,
      duration_ms: elapsedMs,
    });
    return { status: "aborted", reason, store, elapsedMs };
  }

  logger?.info("state_space_analysis_completed", {
    mode: store.mode,
    states: store.stateCount,
    attractors: store.attractorCount,
    duration_ms: elapsedMs,
  });
  return { status: "complete", store, elapsedMs };
}
