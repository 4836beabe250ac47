/**
 * @module primitives/convergence-optimizer
 * @description Implementation of the IConvergenceOptimizer interface.
 *
 * Each iteration:
 *   1. transform the current design through the stage;
 *   2. momentum step from the last `2·window` history entries;
 *   3. measure the distance to the previous design;
 *   4. record the design, keeping at most `maxIterations / 2` entries;
 *   5. accept when the distance is below the threshold and the last two
 *      history windows are not repeats of each other.
 */

import { ParallelEmitter } from "./base-emitter.js";
import { StateVector } from "./state-vector.js";
import { historyConfidence, isOscillating } from "./statistics.js";
import type { IConvergenceOptimizer } from "../interfaces/optimizer.js";
import { ConvergenceError } from "../interfaces/optimizer.js";
import type { ITransformStage } from "../interfaces/transform-stage.js";
import type { DesignOptions, DesignResult, DesignVector } from "../types/design.js";
import type { TransformOperation } from "../types/vector.js";
import { systemClock, type Clock } from "../types/branded.js";
import { componentLogger, type Logger } from "../logger.js";

export const DEFAULT_MAX_ITERATIONS = 100;
export const DEFAULT_CONVERGENCE_THRESHOLD = 1e-6;
export const DEFAULT_OSCILLATION_WINDOW = 3;
export const DEFAULT_MOMENTUM = 0.1;

const DEFAULT_OPERATION: TransformOperation = { kind: "hadamard" };

/** Seed on the hadamard gate's invariant line. */
export const DEFAULT_DESIGN_SEED = StateVector.of(
  Math.cos(Math.PI / 8),
  Math.sin(Math.PI / 8),
  0,
  0
);

/**
 * History-aware step. The velocity is the mean displacement from the oldest
 * entry of the recent window to `current`; the candidate is pushed along it
 * and rescaled to the norm of `current`. An empty history leaves `current`
 * unchanged, as does a window that ends where it started.
 */
export function momentumStep(
  current: DesignVector,
  history: readonly DesignVector[],
  window: number,
  momentum: number
): DesignVector {
  const recent = history.slice(-window * 2);
  const anchor = recent[0];
  if (!anchor || momentum === 0) return current;

  const velocity = current.subtract(anchor).scale(1 / recent.length);
  const candidate = current.add(velocity.scale(momentum));
  const norm = candidate.norm;
  return norm === 0 ? current : candidate.scale(current.norm / norm);
}

export interface ConvergenceOptimizerOptions {
  /** Transform stage used in step 1. */
  stage: ITransformStage;
  clock?: Clock;
  logger?: Logger;
}

/**
 * ConvergenceOptimizer — budgeted loop with oscillation detection.
 *
 * @example
 * ```ts
 * const optimizer = new ConvergenceOptimizer({ stage: new FallbackTransformStage() });
 * const { designVector, iterations, confidence } = await optimizer.iterativeDesign();
 * ```
 */
export class ConvergenceOptimizer extends ParallelEmitter implements IConvergenceOptimizer {
  private readonly stage: ITransformStage;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: ConvergenceOptimizerOptions) {
    super(options.logger);
    this.stage = options.stage;
    this.clock = options.clock ?? systemClock;
    this.log = componentLogger("optimizer", options.logger);
  }

  async iterativeDesign(options: DesignOptions = {}): Promise<DesignResult> {
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    const threshold = options.convergenceThreshold ?? DEFAULT_CONVERGENCE_THRESHOLD;
    const window = options.oscillationWindow ?? DEFAULT_OSCILLATION_WINDOW;
    const momentum = options.momentum ?? DEFAULT_MOMENTUM;
    const operation = options.operation ?? DEFAULT_OPERATION;
    const historyLimit = Math.max(1, Math.floor(maxIterations / 2));

    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }
    if (!Number.isInteger(window) || window < 1) {
      throw new RangeError(`oscillationWindow must be a positive integer, got ${window}`);
    }
    if (!(threshold > 0)) {
      throw new RangeError(`convergenceThreshold must be positive, got ${threshold}`);
    }

    let current: DesignVector = options.initial ?? DEFAULT_DESIGN_SEED;
    let history: DesignVector[] = [];

    for (let iteration = 0; iteration < maxIterations; iteration++) {
      if (options.signal?.aborted) {
        this.fail("CANCELLED", iteration);
        throw new ConvergenceError(
          `iterativeDesign cancelled after ${iteration} iterations`,
          "CANCELLED",
          iteration
        );
      }

      const previous = current;
      current = await this.stage.apply(current, operation);
      current = momentumStep(current, history, window, momentum);

      const difference = current.distance(previous);

      history.push(current);
      if (history.length > historyLimit) {
        history = history.slice(history.length - historyLimit);
      }

      const converging = difference < threshold;
      const oscillating = converging && isOscillating(history, window, threshold);

      this.emit({
        type: "DESIGN_ITERATION",
        iteration: iteration + 1,
        difference,
        oscillating,
        timestamp: this.clock(),
      });

      if (converging && !oscillating) {
        const result: DesignResult = {
          designVector: current,
          iterations: iteration + 1,
          confidence: historyConfidence(history),
        };
        this.log.info(
          { evt: "optimizer.converged", iterations: result.iterations, confidence: result.confidence },
          "optimizer.converged"
        );
        this.emit({
          type: "DESIGN_CONVERGED",
          iterations: result.iterations,
          confidence: result.confidence,
          timestamp: this.clock(),
        });
        return result;
      }
    }

    this.fail("CONVERGENCE_FAILURE", maxIterations);
    throw new ConvergenceError(
      `No stable convergence within ${maxIterations} iterations`,
      "CONVERGENCE_FAILURE",
      maxIterations
    );
  }

  private fail(reason: "CONVERGENCE_FAILURE" | "CANCELLED", iterations: number): void {
    this.log.warn({ evt: "optimizer.failed", reason, iterations }, "optimizer.failed");
    this.emit({
      type: "DESIGN_FAILED",
      iterations,
      reason,
      timestamp: this.clock(),
    });
  }
}
