/**
 * @module types/design
 * @description Types for the iterative design (convergence) loop.
 */

import type { StateVector } from "../primitives/state-vector.js";
import type { TransformOperation } from "./vector.js";

/** In-progress optimisation candidate. */
export type DesignVector = StateVector;

export interface DesignOptions {
  /** Iteration budget. Default: 100 */
  readonly maxIterations?: number;
  /** Convergence bound on the per-iteration distance. Default: 1e-6 */
  readonly convergenceThreshold?: number;
  /** Size of each history window compared by the oscillation check. Default: 3 */
  readonly oscillationWindow?: number;
  /** Starting vector. Default: `[cos π/8, sin π/8, 0, 0]`, the hadamard-stable seed */
  readonly initial?: DesignVector;
  /** Operation applied through the transform stage. Default: hadamard */
  readonly operation?: TransformOperation;
  /** Weight of the history velocity in the optimisation step. Default: 0.1 */
  readonly momentum?: number;
  /** Aborts the loop between iterations. */
  readonly signal?: AbortSignal;
}

/**
 * Converged outcome of `iterativeDesign`.
 */
export interface DesignResult {
  readonly designVector: DesignVector;
  /** 1-based iteration on which convergence was accepted. */
  readonly iterations: number;
  /** `1 / (1 + variance(consecutive history distances))`, in (0, 1]. */
  readonly confidence: number;
}
