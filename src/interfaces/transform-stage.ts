/**
 * @module interfaces/transform-stage
 * @description ITransformStage — applies a named operation to a vector.
 *
 * The hardware-accelerated stage is supplied by the host and may be absent
 * or refuse work at any time. Callers wrap it in a fallback stage that
 * computes the same operation in software, so an accelerator outage never
 * reaches them.
 */

import type { StateVector } from "../primitives/state-vector.js";
import type { TransformOperation } from "../types/vector.js";

/**
 * Errors that may be thrown by ITransformStage implementations.
 */
export class TransformError extends Error {
  constructor(
    message: string,
    public readonly code: "ACCELERATOR_UNAVAILABLE" | "UNSUPPORTED_OPERATION"
  ) {
    super(message);
    this.name = "TransformError";
  }
}

/**
 * @interface ITransformStage
 */
export interface ITransformStage {
  /**
   * @description Applies `operation` and returns a new vector of the same
   * dimension. May block on an accelerator; treat as long-running.
   *
   * @throws {TransformError} code=ACCELERATOR_UNAVAILABLE when the hardware
   *   path cannot be used (hardware stages only).
   * @throws {TransformError} code=UNSUPPORTED_OPERATION for unknown operations.
   */
  apply(vector: StateVector, operation: TransformOperation): Promise<StateVector>;
}
