/**
 * @module interfaces/state-vector
 * @description IStateVector — the small fixed-dimension numeric vector every
 * other component trades in.
 *
 * Vectors are immutable: every operation returns a new vector and the
 * caller threads it forward. Binary operations demand equal dimensions and
 * never pad or truncate.
 */

/**
 * Errors that may be thrown by vector construction and vector arithmetic.
 */
export class VectorError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "DIMENSION_MISMATCH"
      | "INVALID_DIMENSION"
      | "INVALID_COMPONENT"
  ) {
    super(message);
    this.name = "VectorError";
  }
}

/**
 * @interface IStateVector
 * @description Read and combine operations over a 1–4 component vector.
 */
export interface IStateVector {
  /** Number of components, fixed at construction. */
  readonly dimension: number;

  /** First component. Decays while cached; used as the eviction signal. */
  readonly coherence: number;

  /** Euclidean norm of the first two components. */
  readonly amplitude: number;

  /** `coherence × amplitude`. */
  readonly realityScore: number;

  /** Euclidean norm over all components. */
  readonly norm: number;

  /**
   * Component at `index`, or 0 past the end.
   */
  component(index: number): number;

  /**
   * @description Inner product.
   * @throws {VectorError} code=DIMENSION_MISMATCH
   */
  overlap(other: IStateVector): number;

  /**
   * @description Pairwise combination used by the merger:
   * `(1 - weight)·this + weight·other`, scaled to unit norm.
   * A zero sum stays the zero vector.
   * @param weight - Share of `other` in the sum. [0.0, 1.0], default 0.5.
   * @throws {VectorError} code=DIMENSION_MISMATCH
   */
  merge(other: IStateVector, weight?: number): IStateVector;

  /**
   * @description Euclidean distance.
   * @throws {VectorError} code=DIMENSION_MISMATCH
   */
  distance(other: IStateVector): number;

  /** Components as a fresh array. */
  toArray(): number[];
}
