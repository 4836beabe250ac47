/**
 * @module types/vector
 * @description Vector-level data types: component tuples, named transform
 * operations, and the immutable aggregate returned by the merger.
 */

import type { StateVector } from "../primitives/state-vector.js";

/** Maximum number of components a StateVector may carry. */
export const MAX_DIMENSION = 4;

/** Default dimension of token vectors and of the merge identity. */
export const STATE_DIMENSION = 4;

// ─── Transform Operations ───────────────────────────────────────────

/**
 * Named operations understood by every transform stage.
 *
 * - `identity`: returns the vector unchanged.
 * - `normalize`: scales to unit norm (zero vector stays zero).
 * - `hadamard`: `[c0, c1] → [(c0 + c1)/√2, (c0 - c1)/√2]`.
 * - `pauliX`: swaps the first two components.
 * - `pauliY`: `[c0, c1] → [-c1, c0]`, the real part of the Y gate up to a factor of i.
 * - `pauliZ`: negates the second component.
 * - `phase`: `diag(1, cos angle)`, the real projection of a phase shift.
 * - `rotate`: planar rotation of the first two components by `angle` radians.
 *
 * Gates act on the first two components; the rest pass through.
 */
export type TransformOperation =
  | { readonly kind: "identity" }
  | { readonly kind: "normalize" }
  | { readonly kind: "hadamard" }
  | { readonly kind: "pauliX" }
  | { readonly kind: "pauliY" }
  | { readonly kind: "pauliZ" }
  | { readonly kind: "phase"; readonly angle: number }
  | { readonly kind: "rotate"; readonly angle: number };

export type TransformKind = TransformOperation["kind"];

/** Render an operation for logs and events. */
export function describeOperation(operation: TransformOperation): string {
  return operation.kind === "rotate" || operation.kind === "phase"
    ? `${operation.kind}(${operation.angle})`
    : operation.kind;
}

// ─── Aggregate ──────────────────────────────────────────────────────

/**
 * Terminal value of a merge. Frozen on construction.
 */
export interface AggregateResult {
  /** Pairwise-combined vector, unit norm unless every input cancelled out. */
  readonly mergedVector: StateVector;
  /** EMA of the per-step reality scores. 1.0 for an empty merge. */
  readonly realityScore: number;
  /** `1 / (1 + variance(Δcoherence))`. 0.0 for an empty merge. */
  readonly confidence: number;
}
