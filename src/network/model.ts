import { OutOfRangeError, ValidationError, type NetworkViolation } from "../errors.js";
import { MAX_NODE_COUNT, bitAt, decodeState, encodeState, stateSpaceSize, withBit } from "./codec.js";

/** Update discipline applied when computing successors. */
export type UpdateMode = "synchronous" | "asynchronous";

export const UPDATE_MODES: readonly UpdateMode[] = ["synchronous", "asynchronous"];

/**
 * Definition of a single node: the ordered parents feeding its Boolean
 * function, and the function itself as a truth table indexed by the
 * little-endian encoding of the parents' values.
 */
export interface NodeSpec {
  readonly parents: readonly number[];
  readonly truthTable: readonly boolean[];
}

/** Compiled form of a node used on the hot path. */
interface CompiledNode {
  readonly parents: Int32Array;
  readonly table: Uint8Array;
}

/** Collects every structural problem of a node list. */
function collectNetworkViolations(nodes: readonly NodeSpec[]): NetworkViolation[] {
  const violations: NetworkViolation[] = [];
  const nodeCount = nodes.length;

  if (nodeCount < 1 || nodeCount > MAX_NODE_COUNT) {
    violations.push({
      path: "/nodes",
      message: `network must declare between 1 and ${MAX_NODE_COUNT} nodes, got ${nodeCount}`,
    });
    return violations;
  }

  nodes.forEach((node, nodeIndex) => {
    const seen = new Set<number>();
    node.parents.forEach((parent, parentIndex) => {
      const path = `/nodes/${nodeIndex}/parents/${parentIndex}`;
      if (!Number.isInteger(parent) || parent < 0 || parent >= nodeCount) {
        violations.push({
          path,
          message: `parent ${parent} is outside [0, ${nodeCount})`,
          hint: "parents must reference existing node indices",
        });
        return;
      }
      if (seen.has(parent)) {
        violations.push({ path, message: `parent ${parent} is listed more than once` });
        return;
      }
      seen.add(parent);
    });

    const expected = 2 ** node.parents.length;
    if (node.truthTable.length !== expected) {
      violations.push({
        path: `/nodes/${nodeIndex}/truthTable`,
        message: `truth table has ${node.truthTable.length} entries, expected ${expected}`,
        hint: "a node with k parents needs 2^k entries",
      });
    }
    node.truthTable.forEach((entry, entryIndex) => {
      if (typeof entry !== "boolean") {
        violations.push({
          path: `/nodes/${nodeIndex}/truthTable/${entryIndex}`,
          message: `truth table entry must be a boolean, got ${typeof entry}`,
        });
      }
    });
  });

  return violations;
}

/**
 * Immutable Boolean network over `nodeCount` nodes. States are integers in
 * `[0, 2^nodeCount)` encoded little-endian (see `codec.ts`).
 */
export class BooleanNetwork {
  readonly nodeCount: number;
  readonly stateCount: number;
  private readonly specs: readonly NodeSpec[];
  private readonly compiled: readonly CompiledNode[];

  private constructor(specs: readonly NodeSpec[]) {
    this.specs = specs;
    this.nodeCount = specs.length;
    this.stateCount = stateSpaceSize(specs.length);
    this.compiled = specs.map((spec) => ({
      parents: Int32Array.from(spec.parents),
      table: Uint8Array.from(spec.truthTable, (entry) => (entry ? 1 : 0)),
    }));
  }

  /** Validates and freezes a node list. Throws {@link ValidationError}. */
  static create(nodes: readonly NodeSpec[]): BooleanNetwork {
    const violations = collectNetworkViolations(nodes);
    if (violations.length > 0) {
      throw new ValidationError(violations);
    }
    const frozen = Object.freeze(
      nodes.map((node) =>
        Object.freeze({
          parents: Object.freeze([...node.parents]),
          truthTable: Object.freeze([...node.truthTable]),
        }),
      ),
    );
    return new BooleanNetwork(frozen);
  }

  get nodes(): readonly NodeSpec[] {
    return this.specs;
  }

  node(index: number): NodeSpec {
    const spec = this.specs[index];
    if (!spec) {
      throw new RangeError(`node ${index} is outside [0, ${this.nodeCount})`);
    }
    return spec;
  }

  encode(bits: readonly boolean[]): number {
    if (bits.length !== this.nodeCount) {
      throw new RangeError(`expected ${this.nodeCount} bits, got ${bits.length}`);
    }
    return encodeState(bits);
  }

  decode(state: number): boolean[] {
    this.assertState(state);
    return decodeState(state, this.nodeCount);
  }

  /**
   * Next value of one node given the current bit vector. A parentless node
   * keeps its current value.
   */
  nextNodeValue(nodeIndex: number, currentBits: readonly boolean[]): boolean {
    const node = this.compiled[nodeIndex];
    if (!node) {
      throw new RangeError(`node ${nodeIndex} is outside [0, ${this.nodeCount})`);
    }
    return this.evaluate(nodeIndex, node, encodeState(currentBits));
  }

  nextState(state: number, mode: "synchronous"): number;
  nextState(state: number, mode: "asynchronous"): number[];
  nextState(state: number, mode: UpdateMode): number | number[];
  nextState(state: number, mode: UpdateMode): number | number[] {
    return mode === "synchronous" ? this.synchronousSuccessor(state) : this.asynchronousSuccessors(state);
  }

  /** Successors as a list in both modes; the synchronous list has one entry. */
  successors(state: number, mode: UpdateMode): number[] {
    return mode === "synchronous" ? [this.synchronousSuccessor(state)] : this.asynchronousSuccessors(state);
  }

  /** All nodes update against the same snapshot. */
  synchronousSuccessor(state: number): number {
    this.assertState(state);
    let next = 0;
    for (let index = 0; index < this.nodeCount; index += 1) {
      if (this.evaluate(index, this.compiled[index], state)) {
        next |= 1 << index;
      }
    }
    return next;
  }

  /**
   * One successor per node whose update changes its value, in node order.
   * Flipping distinct nodes always yields distinct states, and no-op updates
   * produce no edge.
   */
  asynchronousSuccessors(state: number): number[] {
    const successors: number[] = [];
    for (let node = this.nextChangingNode(state, 0); node !== null; node = this.nextChangingNode(state, node + 1)) {
      successors.push(withBit(state, node, !bitAt(state, node)));
    }
    return successors;
  }

  /**
   * First node at or after `fromNode` whose update changes its value in
   * `state`, or `null` when there is none. Lets traversals walk asynchronous
   * successors one at a time without materialising them.
   */
  nextChangingNode(state: number, fromNode: number): number | null {
    this.assertState(state);
    for (let index = Math.max(0, fromNode); index < this.nodeCount; index += 1) {
      if (this.evaluate(index, this.compiled[index], state) !== bitAt(state, index)) {
        return index;
      }
    }
    return null;
  }

  toDescriptor(): { nodes: Array<{ parents: number[]; truthTable: boolean[] }> } {
    return {
      nodes: this.specs.map((spec) => ({ parents: [...spec.parents], truthTable: [...spec.truthTable] })),
    };
  }

  private assertState(state: number): void {
    if (!Number.isInteger(state) || state < 0 || state >= this.stateCount) {
      throw new OutOfRangeError(state, this.stateCount);
    }
  }

  private evaluate(nodeIndex: number, node: CompiledNode, state: number): boolean {
    const parentCount = node.parents.length;
    if (parentCount === 0) {
      return bitAt(state, nodeIndex);
    }
    let row = 0;
    for (let position = 0; position < parentCount; position += 1) {
      if (bitAt(state, node.parents[position])) {
        row |= 1 << position;
      }
    }
    return node.table[row] === 1;
  }
}
