import type { AbortReason } from "../errors.js";

/**
 * Ceilings applied to one classification pass. A `null` or missing limit is
 * unbounded.
 */
export interface AnalysisLimits {
  /** Largest state space (2^N) the pass agrees to explore. */
  maxStates?: number | null;
  /** Wall-clock budget in milliseconds. */
  timeMs?: number | null;
}

export interface AnalysisBudgetOptions {
  /** Monotonic clock override, mostly for tests. */
  clock?: () => number;
  /** Checkpoints between two clock reads. */
  checkInterval?: number;
}

export const DEFAULT_CHECK_INTERVAL = 1024;

function normaliseLimit(value: number | null | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : null;
}

/**
 * Tracks the ceilings of a single pass. Classifiers call {@link checkpoint}
 * once per newly visited state and stop as soon as it returns `false`; the
 * reason stays available through {@link abortReason}.
 */
export class AnalysisBudget {
  private readonly maxStates: number | null;
  private readonly timeMs: number | null;
  private readonly clock: () => number;
  private readonly checkInterval: number;
  private readonly startedAt: number;
  private visited = 0;
  private reason: AbortReason | null = null;

  constructor(stateCount: number, limits: AnalysisLimits = {}, options: AnalysisBudgetOptions = {}) {
    this.clock = typeof options.clock === "function" ? options.clock : () => performance.now();
    this.maxStates = normaliseLimit(limits.maxStates);
    this.timeMs = normaliseLimit(limits.timeMs);
    this.checkInterval = Math.max(1, Math.floor(options.checkInterval ?? DEFAULT_CHECK_INTERVAL));
    this.startedAt = this.clock();
    if (this.maxStates !== null && stateCount > this.maxStates) {
      this.reason = "states";
    }
  }

  get abortReason(): AbortReason | null {
    return this.reason;
  }

  get exhausted(): boolean {
    return this.reason !== null;
  }

  get visitedCount(): number {
    return this.visited;
  }

  /** Milliseconds since the pass started, read from the injected clock. */
  elapsedMs(): number {
    return this.clock() - this.startedAt;
  }

  /** Accounts for one more visited state. Returns `false` once a ceiling is hit. */
  checkpoint(): boolean {
    if (this.reason !== null) {
      return false;
    }
    this.visited += 1;
    if (this.timeMs !== null && this.visited % this.checkInterval === 0) {
      if (this.clock() - this.startedAt > this.timeMs) {
        this.reason = "time";
        return false;
      }
    }
    return true;
  }
}
