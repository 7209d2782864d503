import {
  InvariantViolationError,
  ModeMismatchError,
  OutOfRangeError,
  UnclassifiedStateError,
  UnknownAttractorError,
} from "../errors.js";
import type { UpdateMode } from "../network/model.js";

/** Classification of one state. `distance` is only computed in synchronous mode. */
export interface ClassificationRecord {
  readonly isAttractor: boolean;
  readonly attractorId: number | null;
  readonly distance: number | null;
}

/** Compact digest of a store, used by the CLI and by logs. */
export interface ClassificationSummary {
  readonly mode: UpdateMode;
  readonly nodeCount: number;
  readonly stateCount: number;
  readonly classifiedCount: number;
  readonly complete: boolean;
  readonly attractorCount: number;
  readonly attractorSizes: number[];
  readonly maxDistance: number | null;
}

/** Serialised form returned by {@link ClassificationStore.toJSON}. */
export interface ClassificationStoreJson {
  mode: UpdateMode;
  nodeCount: number;
  stateCount: number;
  complete: boolean;
  classifiedCount: number;
  attractors: number[][];
  records: Array<{ state: number; isAttractor: boolean; attractorId: number | null; distance?: number }>;
}

const UNCLASSIFIED = 0;
const TRANSIENT = 1;
const ATTRACTOR = 2;

/** Columns of a refused pass are empty; every state reads as unclassified. */
function flagAt(flags: Uint8Array, state: number): number {
  return state < flags.length ? flags[state] : UNCLASSIFIED;
}

/** Dense columns shared by the writer and the sealed store. */
interface StoreColumns {
  readonly mode: UpdateMode;
  readonly nodeCount: number;
  readonly stateCount: number;
  readonly flags: Uint8Array;
  readonly attractorIds: Int32Array;
  readonly distances: Int32Array | null;
  readonly attractors: readonly (readonly number[])[];
  readonly classifiedCount: number;
}

/**
 * Write-once builder used by the classifiers. Each state receives exactly one
 * record; a second write is a defect and raises
 * {@link InvariantViolationError}.
 */
export class ClassificationWriter {
  readonly mode: UpdateMode;
  readonly nodeCount: number;
  readonly stateCount: number;
  private readonly flags: Uint8Array;
  private readonly attractorIds: Int32Array;
  private readonly distances: Int32Array | null;
  private readonly attractors: number[][] = [];
  private classified = 0;
  private sealed = false;

  /**
   * `allocate: false` builds an empty writer without columns, for passes that
   * are refused before visiting any state.
   */
  constructor(mode: UpdateMode, nodeCount: number, allocate = true) {
    this.mode = mode;
    this.nodeCount = nodeCount;
    this.stateCount = 2 ** nodeCount;
    const capacity = allocate ? this.stateCount : 0;
    this.flags = new Uint8Array(capacity);
    this.attractorIds = new Int32Array(capacity).fill(-1);
    this.distances = mode === "synchronous" ? new Int32Array(capacity).fill(-1) : null;
  }

  get classifiedCount(): number {
    return this.classified;
  }

  get attractorCount(): number {
    return this.attractors.length;
  }

  isClassified(state: number): boolean {
    return flagAt(this.flags, state) !== UNCLASSIFIED;
  }

  /** Attractor id of an already written state, `-1` when none. */
  attractorIdAt(state: number): number {
    return this.attractorIds[state];
  }

  /** Distance of an already written synchronous state. */
  distanceAt(state: number): number {
    if (!this.distances) {
      throw new ModeMismatchError(this.mode, "distanceAt");
    }
    return this.distances[state];
  }

  /** Reserves the next attractor id (discovery order, starting at 0). */
  allocateAttractor(): number {
    this.attractors.push([]);
    return this.attractors.length - 1;
  }

  markAttractor(state: number, attractorId: number): void {
    const members = this.attractors[attractorId];
    if (!members) {
      throw new InvariantViolationError(`attractor ${attractorId} was never allocated`, { state, attractorId });
    }
    this.write(state, ATTRACTOR, attractorId, 0);
    members.push(state);
  }

  /** Records a transient state; `distance` is ignored by asynchronous writers. */
  markTransient(state: number, attractorId: number | null, distance: number | null): void {
    this.write(state, TRANSIENT, attractorId ?? -1, distance);
  }

  /** Seals the columns into a read-only store. The writer is unusable afterwards. */
  finish(): ClassificationStore {
    if (this.sealed) {
      throw new InvariantViolationError("classification writer finished twice");
    }
    this.sealed = true;
    return new ClassificationStore({
      mode: this.mode,
      nodeCount: this.nodeCount,
      stateCount: this.stateCount,
      flags: this.flags,
      attractorIds: this.attractorIds,
      distances: this.distances,
      attractors: this.attractors.map((members) => [...members].sort((left, right) => left - right)),
      classifiedCount: this.classified,
    });
  }

  private write(state: number, flag: number, attractorId: number, distance: number | null): void {
    if (this.sealed) {
      throw new InvariantViolationError("write after the classification store was sealed", { state });
    }
    if (state >= this.flags.length) {
      throw new InvariantViolationError(`state ${state} written to an unallocated store`, { state });
    }
    if (this.flags[state] !== UNCLASSIFIED) {
      throw new InvariantViolationError(`state ${state} was classified twice`, { state });
    }
    this.flags[state] = flag;
    this.attractorIds[state] = attractorId;
    if (this.distances) {
      if (distance === null || distance < 0) {
        throw new InvariantViolationError(`synchronous record for state ${state} has no distance`, { state });
      }
      this.distances[state] = distance;
    }
    this.classified += 1;
  }
}

/**
 * Read-only classification of a state space, indexed directly by state
 * integer. Stores produced by an aborted pass are partial: `complete` is
 * `false` and queries on unsettled states raise
 * {@link UnclassifiedStateError}.
 */
export class ClassificationStore {
  readonly mode: UpdateMode;
  readonly nodeCount: number;
  readonly stateCount: number;
  readonly classifiedCount: number;
  private readonly flags: Uint8Array;
  private readonly attractorIds: Int32Array;
  private readonly distances: Int32Array | null;
  private readonly attractorLists: readonly (readonly number[])[];
  private attractorSets: ReadonlyArray<ReadonlySet<number>> | null = null;

  constructor(columns: StoreColumns) {
    this.mode = columns.mode;
    this.nodeCount = columns.nodeCount;
    this.stateCount = columns.stateCount;
    this.classifiedCount = columns.classifiedCount;
    this.flags = columns.flags;
    this.attractorIds = columns.attractorIds;
    this.distances = columns.distances;
    this.attractorLists = columns.attractors;
  }

  get complete(): boolean {
    return this.classifiedCount === this.stateCount;
  }

  get attractorCount(): number {
    return this.attractorLists.length;
  }

  /** `true` when the state has a record; never throws for in-range states. */
  isClassified(state: number): boolean {
    this.assertInRange(state);
    return flagAt(this.flags, state) !== UNCLASSIFIED;
  }

  /** Record of a state, or `undefined` when a partial store never settled it. */
  get(state: number): ClassificationRecord | undefined {
    this.assertInRange(state);
    const flag = flagAt(this.flags, state);
    if (flag === UNCLASSIFIED) {
      return undefined;
    }
    const attractorId = this.attractorIds[state];
    return {
      isAttractor: flag === ATTRACTOR,
      attractorId: attractorId < 0 ? null : attractorId,
      distance: this.distances ? this.distances[state] : null,
    };
  }

  recordOf(state: number): ClassificationRecord {
    const record = this.get(state);
    if (!record) {
      throw new UnclassifiedStateError(state);
    }
    return record;
  }

  isAttractor(state: number): boolean {
    return this.recordOf(state).isAttractor;
  }

  attractorIdOf(state: number): number | null {
    return this.recordOf(state).attractorId;
  }

  /** Steps to the first attractor state. Synchronous stores only. */
  distanceOf(state: number): number {
    const distances = this.requireDistances("distanceOf");
    this.recordOf(state);
    return distances[state];
  }

  attractorMembers(attractorId: number): ReadonlySet<number> {
    const sets = this.allAttractors();
    const members = Number.isInteger(attractorId) ? sets[attractorId] : undefined;
    if (!members) {
      throw new UnknownAttractorError(attractorId, sets.length);
    }
    return members;
  }

  /** Attractors ordered by id. */
  allAttractors(): ReadonlyArray<ReadonlySet<number>> {
    if (!this.attractorSets) {
      this.attractorSets = Object.freeze(this.attractorLists.map((members) => new Set(members)));
    }
    return this.attractorSets;
  }

  /**
   * Every state whose orbit ends in the given attractor, attractor states
   * included, in ascending order. Synchronous stores only.
   */
  basinOf(attractorId: number): number[] {
    this.requireDistances("basinOf");
    this.attractorMembers(attractorId);
    const basin: number[] = [];
    for (let state = 0; state < this.stateCount; state += 1) {
      if (flagAt(this.flags, state) !== UNCLASSIFIED && this.attractorIds[state] === attractorId) {
        basin.push(state);
      }
    }
    return basin;
  }

  /** States grouped by distance, keys ascending. Synchronous stores only. */
  statesByDistance(): Map<number, number[]> {
    const distances = this.requireDistances("statesByDistance");
    const groups = new Map<number, number[]>();
    for (let state = 0; state < this.stateCount; state += 1) {
      if (flagAt(this.flags, state) === UNCLASSIFIED) {
        continue;
      }
      const distance = distances[state];
      const bucket = groups.get(distance);
      if (bucket) {
        bucket.push(state);
      } else {
        groups.set(distance, [state]);
      }
    }
    return new Map([...groups.entries()].sort(([left], [right]) => left - right));
  }

  /** Classified states in ascending order. */
  *records(): IterableIterator<[number, ClassificationRecord]> {
    if (this.classifiedCount === 0) {
      return;
    }
    for (let state = 0; state < this.stateCount; state += 1) {
      const record = this.get(state);
      if (record) {
        yield [state, record];
      }
    }
  }

  summary(): ClassificationSummary {
    let maxDistance: number | null = null;
    if (this.distances && this.classifiedCount > 0) {
      for (let state = 0; state < this.stateCount; state += 1) {
        if (flagAt(this.flags, state) !== UNCLASSIFIED && (maxDistance === null || this.distances[state] > maxDistance)) {
          maxDistance = this.distances[state];
        }
      }
    }
    return {
      mode: this.mode,
      nodeCount: this.nodeCount,
      stateCount: this.stateCount,
      classifiedCount: this.classifiedCount,
      complete: this.complete,
      attractorCount: this.attractorCount,
      attractorSizes: this.attractorLists.map((members) => members.length),
      maxDistance,
    };
  }

  toJSON(): ClassificationStoreJson {
    const records: ClassificationStoreJson["records"] = [];
    for (const [state, record] of this.records()) {
      records.push({
        state,
        isAttractor: record.isAttractor,
        attractorId: record.attractorId,
        ...(record.distance === null ? {} : { distance: record.distance }),
      });
    }
    return {
      mode: this.mode,
      nodeCount: this.nodeCount,
      stateCount: this.stateCount,
      complete: this.complete,
      classifiedCount: this.classifiedCount,
      attractors: this.attractorLists.map((members) => [...members]),
      records,
    };
  }

  private requireDistances(operation: string): Int32Array {
    if (!this.distances) {
      throw new ModeMismatchError(this.mode, operation);
    }
    return this.distances;
  }

  private assertInRange(state: number): void {
    if (!Number.isInteger(state) || state < 0 || state >= this.stateCount) {
      throw new OutOfRangeError(state, this.stateCount);
    }
  }
}
