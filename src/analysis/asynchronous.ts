import { InvariantViolationError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { BooleanNetwork } from "../network/model.js";
import { AnalysisBudget } from "./budget.js";
import { finishOutcome, logAnalysisStart } from "./reporting.js";
import { ClassificationWriter } from "./store.js";
import type { AnalysisOutcome, ClassifierOptions } from "./types.js";

const UNVISITED = -1;

/**
 * Tarjan bookkeeping for one pass, held in dense arrays indexed by state.
 * The asynchronous graph itself is never materialised: the DFS path keeps,
 * per depth, the state being expanded and the next node to try flipping, and
 * successors are generated one at a time from that cursor.
 */
class TarjanTraversal {
  private readonly discovery: Int32Array;
  private readonly lowLink: Int32Array;
  private readonly onStack: Uint8Array;
  private readonly component: Int32Array;
  private readonly stack: Int32Array;
  private readonly frameStates: Int32Array;
  private readonly frameCursors: Int32Array;
  private stackSize = 0;
  private depth = 0;
  private counter = 0;
  private componentCount = 0;

  constructor(
    private readonly network: BooleanNetwork,
    private readonly writer: ClassificationWriter,
    private readonly budget: AnalysisBudget,
    private readonly logger: StructuredLogger | undefined,
  ) {
    const size = network.stateCount;
    this.discovery = new Int32Array(size).fill(UNVISITED);
    this.lowLink = new Int32Array(size);
    this.onStack = new Uint8Array(size);
    this.component = new Int32Array(size).fill(UNVISITED);
    this.stack = new Int32Array(size);
    this.frameStates = new Int32Array(size);
    this.frameCursors = new Int32Array(size);
  }

  isVisited(state: number): boolean {
    return this.discovery[state] !== UNVISITED;
  }

  /** Explores everything reachable from `root`. Returns `false` when the budget ran out. */
  run(root: number): boolean {
    if (!this.budget.checkpoint()) {
      return false;
    }
    this.enter(root);

    while (this.depth > 0) {
      const top = this.depth - 1;
      const state = this.frameStates[top];
      const node = this.network.nextChangingNode(state, this.frameCursors[top]);
      if (node !== null) {
        this.frameCursors[top] = node + 1;
        const next = state ^ (1 << node);
        if (this.discovery[next] === UNVISITED) {
          if (!this.budget.checkpoint()) {
            return false;
          }
          this.enter(next);
        } else if (this.onStack[next] === 1) {
          this.lowLink[state] = Math.min(this.lowLink[state], this.discovery[next]);
        }
        continue;
      }

      this.depth = top;
      if (this.lowLink[state] === this.discovery[state]) {
        this.emitComponent(state);
      }
      if (top > 0) {
        const parent = this.frameStates[top - 1];
        this.lowLink[parent] = Math.min(this.lowLink[parent], this.lowLink[state]);
      }
    }
    return true;
  }

  private enter(state: number): void {
    this.discovery[state] = this.counter;
    this.lowLink[state] = this.counter;
    this.counter += 1;
    this.stack[this.stackSize] = state;
    this.stackSize += 1;
    this.onStack[state] = 1;
    this.frameStates[this.depth] = state;
    this.frameCursors[this.depth] = 0;
    this.depth += 1;
  }

  /** Whether every asynchronous successor of every member lies in component `componentIndex`. */
  private isClosed(members: readonly number[], componentIndex: number): boolean {
    for (const member of members) {
      for (
        let node = this.network.nextChangingNode(member, 0);
        node !== null;
        node = this.network.nextChangingNode(member, node + 1)
      ) {
        if (this.component[member ^ (1 << node)] !== componentIndex) {
          return false;
        }
      }
    }
    return true;
  }

  /**
   * Pops the component rooted at `root` and writes its records. The component
   * is an attractor when none of its members has a successor outside it; a
   * member without successors trivially satisfies that.
   */
  private emitComponent(root: number): void {
    const componentIndex = this.componentCount;
    this.componentCount += 1;
    const members: number[] = [];

    for (;;) {
      if (this.stackSize === 0) {
        throw new InvariantViolationError(`tarjan stack underflow while popping component of ${root}`, { root });
      }
      this.stackSize -= 1;
      const member = this.stack[this.stackSize];
      this.onStack[member] = 0;
      this.component[member] = componentIndex;
      members.push(member);
      if (member === root) {
        break;
      }
    }

    if (!this.isClosed(members, componentIndex)) {
      for (const member of members) {
        this.writer.markTransient(member, null, null);
      }
      return;
    }

    const attractorId = this.writer.allocateAttractor();
    for (const member of members) {
      this.writer.markAttractor(member, attractorId);
    }
    this.logger?.debug("attractor_discovered", {
      mode: "asynchronous",
      attractor_id: attractorId,
      size: members.length,
    });
  }
}

/**
 * Classifies every state of the asynchronous state graph, where each step
 * updates exactly one node. Attractors are the terminal strongly connected
 * components, numbered in the order Tarjan's algorithm completes them.
 * Transient states carry no attractor id and no distance.
 */
export function classifyAsynchronous(network: BooleanNetwork, options: ClassifierOptions = {}): AnalysisOutcome {
  const budget = new AnalysisBudget(network.stateCount, options.limits, options);
  const writer = new ClassificationWriter("asynchronous", network.nodeCount, !budget.exhausted);
  logAnalysisStart(options.logger, "asynchronous", network);

  if (!budget.exhausted) {
    const traversal = new TarjanTraversal(network, writer, budget, options.logger);
    for (let state = 0; state < network.stateCount; state += 1) {
      if (!traversal.isVisited(state) && !traversal.run(state)) {
        break;
      }
    }
  }

  return finishOutcome(options.logger, writer, budget);
}
