/**
 * Little-endian state codec: bit `i` of a state integer is the value of node
 * `i`, so node 0 contributes weight 1, node 1 weight 2, and so on.
 */

/** Largest node count whose state space still fits dense typed arrays and 31-bit integers. */
export const MAX_NODE_COUNT = 30;

/** Encodes a bit vector as a state integer. */
export function encodeState(bits: readonly boolean[]): number {
  let state = 0;
  for (let index = 0; index < bits.length; index += 1) {
    if (bits[index]) {
      state |= 1 << index;
    }
  }
  return state;
}

/** Decodes a state integer into a bit vector of the requested width. */
export function decodeState(state: number, width: number): boolean[] {
  const bits = new Array<boolean>(width);
  for (let index = 0; index < width; index += 1) {
    bits[index] = ((state >>> index) & 1) === 1;
  }
  return bits;
}

/** Reads the value of a single node straight from the state integer. */
export function bitAt(state: number, index: number): boolean {
  return ((state >>> index) & 1) === 1;
}

/** Returns `state` with node `index` forced to `value`. */
export function withBit(state: number, index: number, value: boolean): number {
  return value ? state | (1 << index) : state & ~(1 << index);
}

/** Number of states of an `width`-node network. */
export function stateSpaceSize(width: number): number {
  return 2 ** width;
}

/** Renders a state as its little-endian bit list, e.g. `[1, 0, 1]`. */
export function formatState(state: number, width: number): string {
  return `[${decodeState(state, width)
    .map((bit) => (bit ? "1" : "0"))
    .join(", ")}]`;
}
