/**
 * @module backends/software-transform
 * @description Pure-software implementation of every TransformOperation.
 *
 * Gates are real 2×2 matrices over the first two components; the remaining
 * components pass through. A one-component vector is treated as `[c0, 0]`
 * and keeps its single component.
 */

import type { ITransformStage } from "../interfaces/transform-stage.js";
import { TransformError } from "../interfaces/transform-stage.js";
import { StateVector } from "../primitives/state-vector.js";
import type { TransformOperation } from "../types/vector.js";

type Matrix2 = readonly [number, number, number, number];

const SQRT1_2 = Math.SQRT1_2;

const GATES: Record<"hadamard" | "pauliX" | "pauliY" | "pauliZ", Matrix2> = {
  hadamard: [SQRT1_2, SQRT1_2, SQRT1_2, -SQRT1_2],
  pauliX: [0, 1, 1, 0],
  pauliY: [0, -1, 1, 0],
  pauliZ: [1, 0, 0, -1],
};

function phase(angle: number): Matrix2 {
  return [1, 0, 0, Math.cos(angle)];
}

function rotation(angle: number): Matrix2 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return [c, -s, s, c];
}

/** Apply a 2×2 matrix to the first two components. */
export function applyGate(vector: StateVector, [a, b, c, d]: Matrix2): StateVector {
  const x = vector.component(0);
  const y = vector.component(1);
  const out = vector.toArray();
  out[0] = a * x + b * y;
  if (out.length > 1) out[1] = c * x + d * y;
  return new StateVector(out);
}

/**
 * Synchronous core shared by the software stage and by callers that
 * cannot await.
 */
export function transformSync(
  vector: StateVector,
  operation: TransformOperation
): StateVector {
  switch (operation.kind) {
    case "identity":
      return vector;
    case "normalize":
      return vector.normalize();
    case "hadamard":
    case "pauliX":
    case "pauliY":
    case "pauliZ":
      return applyGate(vector, GATES[operation.kind]);
    case "phase":
      return applyGate(vector, phase(operation.angle));
    case "rotate":
      return applyGate(vector, rotation(operation.angle));
    default:
      return unsupported(operation);
  }
}

function unsupported(operation: never): never {
  throw new TransformError(
    `Unsupported transform operation: ${JSON.stringify(operation)}`,
    "UNSUPPORTED_OPERATION"
  );
}

/**
 * SoftwareTransformStage — reference implementation used whenever the
 * accelerator is missing.
 */
export class SoftwareTransformStage implements ITransformStage {
  async apply(vector: StateVector, operation: TransformOperation): Promise<StateVector> {
    return transformSync(vector, operation);
  }
}
