/**
 * @module primitives/neighbor-windower
 * @description Attaches each state in a token sequence to a fixed-radius
 * window of contextual neighbours.
 *
 * For index `i` in a sequence of `n`, the neighbours are the states at
 * `[max(0, i - r), min(n, i + r))`, minus `i` itself: up to `r`
 * predecessors and `r - 1` successors. Links are ids, never object
 * references.
 */

import type { ParallelState } from "../types/state.js";
import type { StateId } from "../types/branded.js";

/** Default window radius. */
export const DEFAULT_NEIGHBOR_RADIUS = 5;

/**
 * Indices of the neighbours of `index` in a sequence of `length`.
 */
export function neighborIndices(
  index: number,
  length: number,
  radius: number = DEFAULT_NEIGHBOR_RADIUS
): number[] {
  assertRadius(radius);
  const start = Math.max(0, index - radius);
  const end = Math.min(length, index + radius);
  const out: number[] = [];
  for (let j = start; j < end; j++) {
    if (j !== index) out.push(j);
  }
  return out;
}

/**
 * Returns copies of `states` with `neighbors` recomputed from their order.
 * Pure: the input array and its states are left untouched.
 */
export function attachNeighbors(
  states: readonly ParallelState[],
  radius: number = DEFAULT_NEIGHBOR_RADIUS
): ParallelState[] {
  assertRadius(radius);
  const ids = states.map((s) => s.id);
  return states.map((state, i) => ({
    ...state,
    neighbors: neighborIndices(i, ids.length, radius).flatMap((j) => {
      const id: StateId | undefined = ids[j];
      return id === undefined ? [] : [id];
    }),
  }));
}

function assertRadius(radius: number): void {
  if (!Number.isInteger(radius) || radius < 0) {
    throw new RangeError(`window radius must be a non-negative integer, got ${radius}`);
  }
}
