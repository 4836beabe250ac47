/**
 * @module primitives
 * @description Core implementations: vector, cache, windower, merger,
 * optimizer, plus the base event emitter and shared statistics.
 */

export { ParallelEmitter } from "./base-emitter.js";
export { SerialExecutor } from "./serial-executor.js";
export { StateVector } from "./state-vector.js";
export {
  StateCache,
  decayFactorFor,
  DEFAULT_CACHE_CAPACITY,
  DEFAULT_DECAY_INTERVAL_MS,
  DEFAULT_COHERENCE_FLOOR,
} from "./state-cache.js";
export type { StateCacheOptions } from "./state-cache.js";
export {
  attachNeighbors,
  neighborIndices,
  DEFAULT_NEIGHBOR_RADIUS,
} from "./neighbor-windower.js";
export { StateMerger, DEFAULT_MERGE_WEIGHT } from "./state-merger.js";
export type { StateMergerOptions } from "./state-merger.js";
export {
  ConvergenceOptimizer,
  momentumStep,
  DEFAULT_DESIGN_SEED,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_CONVERGENCE_THRESHOLD,
  DEFAULT_OSCILLATION_WINDOW,
  DEFAULT_MOMENTUM,
} from "./convergence-optimizer.js";
export type { ConvergenceOptimizerOptions } from "./convergence-optimizer.js";
export * from "./statistics.js";
