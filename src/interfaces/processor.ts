/**
 * @module interfaces/processor
 * @description IParallelProcessor — the caller-facing surface of the
 * subsystem.
 */

import type { DesignOptions, DesignResult } from "../types/design.js";
import type { InputKind, ProcessingResult } from "../types/processing.js";
import type { IParallelEmitter } from "./event-emitter.js";

/**
 * Errors that may be thrown by IParallelProcessor operations.
 *
 * REALITY_TOO_LOW is a legitimate negative answer, not a fault: the full
 * result is attached so callers can inspect what was rejected.
 */
export class ProcessingError extends Error {
  constructor(
    message: string,
    public readonly code: "REALITY_TOO_LOW",
    public readonly result: ProcessingResult,
    public readonly floor: number
  ) {
    super(message);
    this.name = "ProcessingError";
  }
}

/**
 * @interface IParallelProcessor
 */
export interface IParallelProcessor extends IParallelEmitter {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description tokenize → window → cache → contextual transform → merge.
   *
   * @postcondition One state per token is cached. Emits INPUT_PROCESSED,
   *               or RESULT_REJECTED before throwing.
   * @throws {ProcessingError} code=REALITY_TOO_LOW when the aggregate
   *   reality score is below the configured floor.
   * @throws {VectorError} code=DIMENSION_MISMATCH if the encoder produces
   *   vectors of a different dimension than the merger's identity.
   */
  processInput(input: string, kind: InputKind): Promise<ProcessingResult>;

  /**
   * @command
   * @description Runs the convergence loop through the processor's
   * transform stage.
   * @throws {ConvergenceError}
   */
  iterativeDesign(options?: DesignOptions): Promise<DesignResult>;

  /**
   * @command
   * @description Starts the cache's recurring decay sweep.
   */
  start(): void;

  /**
   * @command
   * @description Stops background work. The cache keeps its entries.
   */
  shutdown(): void;
}
