/**
 * @module interfaces/state-merger
 * @description IStateMerger — folds an ordered sequence of vectors into one
 * aggregate vector with a reality score and a confidence.
 *
 * The reality score is an exponential moving average over the per-step
 * scores, so the result depends on input order.
 */

import type { StateVector } from "../primitives/state-vector.js";
import type { AggregateResult } from "../types/vector.js";

/**
 * @interface IStateMerger
 */
export interface IStateMerger {
  /**
   * @description Folds `vectors` in order, starting from the identity.
   *
   * @returns For an empty sequence: the identity, realityScore 1.0,
   *   confidence 0.0.
   * @throws {VectorError} code=DIMENSION_MISMATCH if any vector's dimension
   *   differs from the identity's.
   */
  merge(vectors: readonly StateVector[]): AggregateResult;

  /**
   * @description The pairwise step `merge` applies at every position.
   * @throws {VectorError} code=DIMENSION_MISMATCH
   */
  combine(accumulated: StateVector, next: StateVector): StateVector;
}
