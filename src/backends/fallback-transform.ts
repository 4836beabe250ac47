/**
 * @module backends/fallback-transform
 * @description Routes operations to the hardware stage and recovers from
 * accelerator outages with the software stage.
 *
 * `ACCELERATOR_UNAVAILABLE` stops here. Any other error from the hardware
 * stage propagates unchanged.
 */

import { ParallelEmitter } from "../primitives/base-emitter.js";
import type { ITransformStage } from "../interfaces/transform-stage.js";
import { TransformError } from "../interfaces/transform-stage.js";
import type { StateVector } from "../primitives/state-vector.js";
import type { TransformOperation } from "../types/vector.js";
import { describeOperation } from "../types/vector.js";
import { systemClock, type Clock } from "../types/branded.js";
import { SoftwareTransformStage } from "./software-transform.js";
import { componentLogger, type Logger } from "../logger.js";

export interface FallbackTransformOptions {
  /** Accelerated stage. Absent means software only. */
  hardware?: ITransformStage;
  /** Default: SoftwareTransformStage */
  software?: ITransformStage;
  clock?: Clock;
  logger?: Logger;
}

/**
 * FallbackTransformStage — hardware first, software on outage.
 *
 * @example
 * ```ts
 * const stage = new FallbackTransformStage({ hardware: gpuStage });
 * stage.on("ACCELERATOR_FALLBACK", (e) => console.warn(e.reason));
 * const out = await stage.apply(vector, { kind: "hadamard" });
 * ```
 */
export class FallbackTransformStage extends ParallelEmitter implements ITransformStage {
  private readonly hardware: ITransformStage | undefined;
  private readonly software: ITransformStage;
  private readonly clock: Clock;
  private readonly log: Logger;
  private fallbacks = 0;

  constructor(options: FallbackTransformOptions = {}) {
    super(options.logger);
    this.hardware = options.hardware;
    this.software = options.software ?? new SoftwareTransformStage();
    this.clock = options.clock ?? systemClock;
    this.log = componentLogger("transform", options.logger);
  }

  async apply(vector: StateVector, operation: TransformOperation): Promise<StateVector> {
    if (!this.hardware) {
      return this.software.apply(vector, operation);
    }

    try {
      return await this.hardware.apply(vector, operation);
    } catch (error) {
      if (!(error instanceof TransformError) || error.code !== "ACCELERATOR_UNAVAILABLE") {
        throw error;
      }

      this.fallbacks++;
      const name = describeOperation(operation);
      this.log.warn(
        { evt: "transform.fallback", operation: name, reason: error.message },
        "transform.fallback"
      );
      this.emit({
        type: "ACCELERATOR_FALLBACK",
        operation: name,
        reason: error.message,
        timestamp: this.clock(),
      });

      return this.software.apply(vector, operation);
    }
  }

  /** Whether a hardware stage was supplied. */
  get hasAccelerator(): boolean {
    return this.hardware !== undefined;
  }

  /** Number of calls served by software after a hardware outage. */
  get fallbackCount(): number {
    return this.fallbacks;
  }
}
