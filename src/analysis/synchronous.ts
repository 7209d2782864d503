import type { StructuredLogger } from "../logger.js";
import type { BooleanNetwork } from "../network/model.js";
import { AnalysisBudget } from "./budget.js";
import { ClassificationWriter } from "./store.js";
import { finishOutcome, logAnalysisStart } from "./reporting.js";
import type { AnalysisOutcome, ClassifierOptions } from "./types.js";

/**
 * Classifies every state of the synchronous (functional) state graph.
 *
 * Each unclassified start state is walked forward until the walk either meets
 * a state classified by an earlier walk, in which case the earlier verdict is
 * propagated backwards with increasing distance, or revisits a state of its
 * own path, in which case the revisited suffix is a new attractor cycle.
 * Every edge of the functional graph is followed at most once over the whole
 * pass.
 */
export function classifySynchronous(network: BooleanNetwork, options: ClassifierOptions = {}): AnalysisOutcome {
  const budget = new AnalysisBudget(network.stateCount, options.limits, options);
  const writer = new ClassificationWriter("synchronous", network.nodeCount, !budget.exhausted);
  const logger = options.logger;
  logAnalysisStart(logger, "synchronous", network);

  for (let start = 0; start < network.stateCount && !budget.exhausted; start += 1) {
    if (!writer.isClassified(start)) {
      walk(network, writer, budget, start, logger);
    }
  }

  return finishOutcome(logger, writer, budget);
}

/** Walks one orbit. Returns without writing anything if the budget runs out. */
function walk(
  network: BooleanNetwork,
  writer: ClassificationWriter,
  budget: AnalysisBudget,
  start: number,
  logger: StructuredLogger | undefined,
): void {
  const path: number[] = [];
  const positions = new Map<number, number>();
  let current = start;

  for (;;) {
    if (writer.isClassified(current)) {
      propagate(writer, path, current);
      return;
    }
    const seenAt = positions.get(current);
    if (seenAt !== undefined) {
      closeCycle(writer, path, seenAt, logger);
      return;
    }
    if (!budget.checkpoint()) {
      return;
    }
    positions.set(current, path.length);
    path.push(current);
    current = network.synchronousSuccessor(current);
  }
}

/** The walk ran into a settled state: inherit its attractor, one step further away each. */
function propagate(writer: ClassificationWriter, path: readonly number[], known: number): void {
  const attractorId = writer.attractorIdAt(known);
  const knownDistance = writer.distanceAt(known);
  for (let index = path.length - 1; index >= 0; index -= 1) {
    writer.markTransient(path[index], attractorId, knownDistance + (path.length - index));
  }
}

/** The walk looped back onto itself at `cycleStart`: everything from there on is a new attractor. */
function closeCycle(
  writer: ClassificationWriter,
  path: readonly number[],
  cycleStart: number,
  logger: StructuredLogger | undefined,
): void {
  const attractorId = writer.allocateAttractor();
  for (let index = cycleStart; index < path.length; index += 1) {
    writer.markAttractor(path[index], attractorId);
  }
  for (let index = cycleStart - 1; index >= 0; index -= 1) {
    writer.markTransient(path[index], attractorId, cycleStart - index);
  }
  logger?.debug("attractor_discovered", {
    mode: "synchronous",
    attractor_id: attractorId,
    size: path.length - cycleStart,
  });
}
