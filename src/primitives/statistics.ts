/**
 * @module primitives/statistics
 * @description Scalar helpers shared by the merger and the optimizer:
 * mean, population variance, EMA, and the history analyses behind
 * convergence confidence and oscillation detection.
 */

import type { StateVector } from "./state-vector.js";

/** Default EMA smoothing factor. */
export const DEFAULT_EMA_ALPHA = 0.1;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Population variance. Empty input has variance 0.
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let sum = 0;
  for (const v of values) sum += (v - m) ** 2;
  return sum / values.length;
}

/**
 * Exponential moving average seeded with the first score.
 * `ema = alpha·s + (1 - alpha)·ema` for each later score.
 * An empty list yields 1.0.
 */
export function ema(
  scores: readonly number[],
  alpha: number = DEFAULT_EMA_ALPHA
): number {
  const [first, ...rest] = scores;
  if (first === undefined) return 1.0;
  let value = first;
  for (const s of rest) {
    value = alpha * s + (1 - alpha) * value;
  }
  return value;
}

/** Signed differences between consecutive values. */
export function deltas(values: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    const curr = values[i];
    if (prev !== undefined && curr !== undefined) out.push(curr - prev);
  }
  return out;
}

/** Distances between consecutive vectors. */
export function consecutiveDistances(history: readonly StateVector[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < history.length; i++) {
    const prev = history[i - 1];
    const curr = history[i];
    if (prev && curr) out.push(curr.distance(prev));
  }
  return out;
}

/**
 * `1 / (1 + variance)` of the step sizes along a history. Steady progress
 * (including no progress at all) scores 1.
 */
export function historyConfidence(history: readonly StateVector[]): number {
  return 1 / (1 + variance(consecutiveDistances(history)));
}

/**
 * Compare the last `window` entries with the `window` entries right before
 * them. A total pairwise distance below `threshold` means the history is
 * repeating itself rather than settling.
 */
export function isOscillating(
  history: readonly StateVector[],
  window: number,
  threshold: number
): boolean {
  if (window < 1 || history.length < window * 2) return false;

  const recent = history.slice(-window);
  const previous = history.slice(-window * 2, -window);

  let total = 0;
  for (let k = 0; k < window; k++) {
    const r = recent[k];
    const p = previous[k];
    if (r && p) total += r.distance(p);
  }
  return total < threshold;
}

/**
 * Component-wise mean of equal-dimension vectors.
 * @returns `undefined` for an empty list.
 */
export function centroid(vectors: readonly StateVector[]): StateVector | undefined {
  const [first, ...rest] = vectors;
  if (!first) return undefined;
  let sum = first;
  for (const v of rest) sum = sum.add(v);
  return sum.scale(1 / vectors.length);
}
