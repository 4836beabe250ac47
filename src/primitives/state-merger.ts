/**
 * @module primitives/state-merger
 * @description Implementation of the IStateMerger interface.
 *
 * Merge algorithm:
 *   1. start from the identity vector;
 *   2. combine the running vector with each input in turn, recording the
 *      running vector's reality score after every step;
 *   3. reality score = EMA of those step scores;
 *   4. confidence = 1 / (1 + variance of the coherence deltas between
 *      consecutive inputs).
 */

import type { IStateMerger } from "../interfaces/state-merger.js";
import type { AggregateResult } from "../types/vector.js";
import { STATE_DIMENSION } from "../types/vector.js";
import { StateVector } from "./state-vector.js";
import { DEFAULT_EMA_ALPHA, deltas, ema, variance } from "./statistics.js";

/** Share of the incoming vector in each pairwise combination. */
export const DEFAULT_MERGE_WEIGHT = 0.5;

export interface StateMergerOptions {
  /** EMA smoothing factor. Default: 0.1 */
  alpha?: number;
  /** Dimension of the identity the fold starts from. Default: 4 */
  dimension?: number;
  /** Share of the incoming vector per step. Default: 0.5 */
  weight?: number;
}

/**
 * StateMerger — order-sensitive aggregation of state vectors.
 *
 * @example
 * ```ts
 * const merger = new StateMerger();
 * const result = merger.merge([StateVector.of(1, 0, 0, 0), StateVector.of(0, 1, 0, 0)]);
 * result.mergedVector.coherence; // ≈ 0.7071
 * ```
 */
export class StateMerger implements IStateMerger {
  readonly alpha: number;
  readonly dimension: number;
  readonly weight: number;

  constructor(options: StateMergerOptions = {}) {
    this.alpha = options.alpha ?? DEFAULT_EMA_ALPHA;
    this.dimension = options.dimension ?? STATE_DIMENSION;
    this.weight = options.weight ?? DEFAULT_MERGE_WEIGHT;

    if (!(this.alpha > 0 && this.alpha <= 1)) {
      throw new RangeError(`alpha must be in (0, 1], got ${this.alpha}`);
    }
  }

  merge(vectors: readonly StateVector[]): AggregateResult {
    let merged = StateVector.identity(this.dimension);

    if (vectors.length === 0) {
      return aggregate(merged, 1.0, 0.0);
    }

    const scores: number[] = [];
    for (const vector of vectors) {
      merged = this.combine(merged, vector);
      scores.push(merged.realityScore);
    }

    const coherenceDeltas = deltas(vectors.map((v) => v.coherence));
    return aggregate(
      merged,
      ema(scores, this.alpha),
      1 / (1 + variance(coherenceDeltas))
    );
  }

  combine(accumulated: StateVector, next: StateVector): StateVector {
    return accumulated.merge(next, this.weight);
  }
}

function aggregate(
  mergedVector: StateVector,
  realityScore: number,
  confidence: number
): AggregateResult {
  return Object.freeze({ mergedVector, realityScore, confidence });
}
