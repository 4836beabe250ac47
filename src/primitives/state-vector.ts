/**
 * @module primitives/state-vector
 * @description Immutable implementation of IStateVector.
 *
 * Holds up to four finite components. The derived scalars are plain
 * arithmetic: coherence is the first component, amplitude the norm of the
 * first two, and the reality score their product.
 */

import type { IStateVector } from "../interfaces/state-vector.js";
import { VectorError } from "../interfaces/state-vector.js";
import { MAX_DIMENSION, STATE_DIMENSION } from "../types/vector.js";

/**
 * StateVector — fixed-dimension numeric state.
 *
 * @example
 * ```ts
 * const a = StateVector.of(1, 0, 0, 0);
 * const b = StateVector.of(0, 1, 0, 0);
 * const m = a.merge(b);            // [0.7071, 0.7071, 0, 0]
 * console.log(m.realityScore);     // ≈ 0.7071
 * ```
 */
export class StateVector implements IStateVector {
  private readonly components: readonly number[];

  constructor(components: readonly number[]) {
    if (components.length === 0 || components.length > MAX_DIMENSION) {
      throw new VectorError(
        `StateVector takes 1 to ${MAX_DIMENSION} components, got ${components.length}`,
        "INVALID_DIMENSION"
      );
    }
    for (const c of components) {
      if (!Number.isFinite(c)) {
        throw new VectorError(
          `StateVector components must be finite, got ${c}`,
          "INVALID_COMPONENT"
        );
      }
    }
    this.components = Object.freeze([...components]);
  }

  static of(...components: number[]): StateVector {
    return new StateVector(components);
  }

  /** Unit first component, all others zero. */
  static identity(dimension: number = STATE_DIMENSION): StateVector {
    return new StateVector(
      Array.from({ length: dimension }, (_, i) => (i === 0 ? 1 : 0))
    );
  }

  static zero(dimension: number = STATE_DIMENSION): StateVector {
    return new StateVector(new Array<number>(dimension).fill(0));
  }

  // ─── Derived Scalars ────────────────────────────────────────────

  get dimension(): number {
    return this.components.length;
  }

  get coherence(): number {
    return this.component(0);
  }

  get amplitude(): number {
    return Math.hypot(this.component(0), this.component(1));
  }

  get realityScore(): number {
    return this.coherence * this.amplitude;
  }

  get norm(): number {
    return Math.hypot(...this.components);
  }

  component(index: number): number {
    return this.components[index] ?? 0;
  }

  // ─── Binary Operations ──────────────────────────────────────────

  overlap(other: StateVector): number {
    this.assertSameDimension(other, "overlap");
    let sum = 0;
    for (let i = 0; i < this.dimension; i++) {
      sum += this.component(i) * other.component(i);
    }
    return sum;
  }

  merge(other: StateVector, weight = 0.5): StateVector {
    this.assertSameDimension(other, "merge");
    const w = Math.min(1, Math.max(0, weight));
    return this.scale(1 - w).add(other.scale(w)).normalize();
  }

  distance(other: StateVector): number {
    return this.subtract(other).norm;
  }

  add(other: StateVector): StateVector {
    this.assertSameDimension(other, "add");
    return this.map((c, i) => c + other.component(i));
  }

  subtract(other: StateVector): StateVector {
    this.assertSameDimension(other, "subtract");
    return this.map((c, i) => c - other.component(i));
  }

  // ─── Unary Operations ───────────────────────────────────────────

  scale(factor: number): StateVector {
    return this.map((c) => c * factor);
  }

  /** Unit-norm copy. The zero vector is returned unchanged. */
  normalize(): StateVector {
    const n = this.norm;
    return n === 0 ? this : this.scale(1 / n);
  }

  /** Copy with the first component replaced. */
  withCoherence(value: number): StateVector {
    return this.map((c, i) => (i === 0 ? value : c));
  }

  equals(other: StateVector, tolerance = 0): boolean {
    if (other.dimension !== this.dimension) return false;
    for (let i = 0; i < this.dimension; i++) {
      if (Math.abs(this.component(i) - other.component(i)) > tolerance) {
        return false;
      }
    }
    return true;
  }

  toArray(): number[] {
    return [...this.components];
  }

  toString(): string {
    return `[${this.components.map((c) => c.toFixed(4)).join(", ")}]`;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private map(fn: (component: number, index: number) => number): StateVector {
    return new StateVector(this.components.map(fn));
  }

  private assertSameDimension(other: StateVector, operation: string): void {
    if (other.dimension !== this.dimension) {
      throw new VectorError(
        `${operation}: dimension ${this.dimension} vs ${other.dimension}`,
        "DIMENSION_MISMATCH"
      );
    }
  }
}
