import type { AnalysisConfig } from "../config/analysis.js";
import { ClassificationAbortedError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { BooleanNetwork, UpdateMode } from "../network/model.js";
import { classifyAsynchronous } from "./asynchronous.js";
import type { ClassificationStore } from "./store.js";
import { classifySynchronous } from "./synchronous.js";
import type { AnalysisOutcome, ClassifierOptions } from "./types.js";

/** Runs the classifier matching `mode`. */
export function analyseNetwork(
  network: BooleanNetwork,
  mode: UpdateMode,
  options: ClassifierOptions = {},
): AnalysisOutcome {
  return mode === "synchronous" ? classifySynchronous(network, options) : classifyAsynchronous(network, options);
}

/** Returns the store of a complete outcome and refuses partial ones. */
export function requireComplete(outcome: AnalysisOutcome): ClassificationStore {
  if (outcome.status === "aborted") {
    throw new ClassificationAbortedError(outcome.reason, outcome.store.classifiedCount, outcome.store.stateCount);
  }
  return outcome.store;
}

/** Maps a resolved configuration onto classifier options. */
export function classifierOptionsFromConfig(config: AnalysisConfig, logger?: StructuredLogger): ClassifierOptions {
  return {
    limits: { maxStates: config.maxStates, timeMs: config.timeLimitMs },
    checkInterval: config.checkInterval,
    ...(logger ? { logger } : {}),
  };
}
