/**
 * @module interfaces/optimizer
 * @description IConvergenceOptimizer — the budgeted fixed-point search.
 *
 * State machine:
 *   ITERATING → ITERATING  (difference ≥ threshold, or a repeating history)
 *   ITERATING → CONVERGED  (difference < threshold and not oscillating)
 *   ITERATING → FAILED     (iteration budget exhausted, or cancelled)
 */

import type { DesignOptions, DesignResult } from "../types/design.js";
import type { IParallelEmitter } from "./event-emitter.js";

/**
 * Errors that may be thrown by IConvergenceOptimizer operations.
 */
export class ConvergenceError extends Error {
  constructor(
    message: string,
    public readonly code: "CONVERGENCE_FAILURE" | "CANCELLED",
    /** Iterations run before giving up. */
    public readonly iterations: number
  ) {
    super(message);
    this.name = "ConvergenceError";
  }
}

/**
 * @interface IConvergenceOptimizer
 */
export interface IConvergenceOptimizer extends IParallelEmitter {
  /**
   * @command
   * @description Repeatedly transforms a design vector until the step size
   * drops below the threshold without the history repeating itself.
   *
   * @postcondition Emits DESIGN_ITERATION per iteration and exactly one of
   *               DESIGN_CONVERGED / DESIGN_FAILED.
   * @throws {ConvergenceError} code=CONVERGENCE_FAILURE with
   *   `iterations = maxIterations` when the budget runs out.
   * @throws {ConvergenceError} code=CANCELLED when `signal` aborts.
   * @throws {RangeError} for a non-positive budget, window or threshold.
   */
  iterativeDesign(options?: DesignOptions): Promise<DesignResult>;
}
