/**
 * @module processor
 * @description ParallelProcessor — the orchestrator that wires the
 * primitives together.
 *
 * A ParallelProcessor owns:
 * - the StateCache (per-token states, LRU + decay eviction)
 * - the transform stage (hardware when supplied, software fallback)
 * - the StateMerger (EMA aggregation)
 * - the ConvergenceOptimizer (on-demand fixed-point search)
 *
 * The tokenizer and token encoder are injectable; defaults are the regex
 * BasicTokenizer and the SHA-256 HashTokenEncoder.
 *
 * @example
 * ```ts
 * const processor = new ParallelProcessor({ config: { realityFloor: 0.4 } });
 * processor.start();
 *
 * const result = await processor.processInput("list changed files", "text");
 * console.log(result.aggregate.realityScore);
 *
 * processor.shutdown();
 * ```
 */

import { ParallelEmitter } from "./primitives/base-emitter.js";
import { StateCache } from "./primitives/state-cache.js";
import { StateMerger } from "./primitives/state-merger.js";
import { ConvergenceOptimizer } from "./primitives/convergence-optimizer.js";
import { attachNeighbors } from "./primitives/neighbor-windower.js";
import { centroid } from "./primitives/statistics.js";
import type { StateVector } from "./primitives/state-vector.js";
import { FallbackTransformStage } from "./backends/fallback-transform.js";
import { BasicTokenizer } from "./backends/basic-tokenizer.js";
import { HashTokenEncoder } from "./backends/token-encoder.js";
import type { IParallelProcessor } from "./interfaces/processor.js";
import { ProcessingError } from "./interfaces/processor.js";
import type { ITokenEncoder, ITokenizer } from "./interfaces/tokenizer.js";
import type { ITransformStage } from "./interfaces/transform-stage.js";
import { resolveConfig, type ProcessorConfig, type ProcessorConfigInput } from "./config.js";
import { componentLogger, createLogger, type Logger } from "./logger.js";
import { createStateId, systemClock, type Clock } from "./types/branded.js";
import type { DesignOptions, DesignResult } from "./types/design.js";
import type { ParallelEventType } from "./types/events.js";
import type { InputKind, ProcessingResult } from "./types/processing.js";
import type { ParallelState } from "./types/state.js";
import type { TransformOperation } from "./types/vector.js";

// ─── Configuration ────────────────────────────────────────────────

export interface ParallelProcessorOptions {
  /** Validated with ProcessorConfigSchema; missing keys take defaults. */
  config?: ProcessorConfigInput;
  /** Accelerated transform stage. Absent means software only. */
  hardware?: ITransformStage;
  tokenizer?: ITokenizer;
  encoder?: ITokenEncoder;
  /** Operation applied to every contextualised state. Default: normalize */
  operation?: TransformOperation;
  clock?: Clock;
  logger?: Logger;
}

const RELAYED_EVENTS: readonly ParallelEventType[] = [
  "STATE_CACHED",
  "STATE_EVICTED",
  "DECAY_SWEEP_COMPLETED",
  "ACCELERATOR_FALLBACK",
  "DESIGN_ITERATION",
  "DESIGN_CONVERGED",
  "DESIGN_FAILED",
];

// ─── Orchestrator ──────────────────────────────────────────────────

export class ParallelProcessor extends ParallelEmitter implements IParallelProcessor {
  readonly config: ProcessorConfig;
  readonly cache: StateCache;
  readonly stage: FallbackTransformStage;
  readonly merger: StateMerger;
  readonly optimizer: ConvergenceOptimizer;

  private readonly tokenizer: ITokenizer;
  private readonly encoder: ITokenEncoder;
  private readonly operation: TransformOperation;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly detachRelays: Array<() => void> = [];

  constructor(options: ParallelProcessorOptions = {}) {
    const config = resolveConfig(options.config ?? {});
    const logger = options.logger ?? createLogger({ level: config.logLevel });
    super(logger);
    this.config = config;
    this.clock = options.clock ?? systemClock;
    this.log = componentLogger("processor", logger);

    this.cache = new StateCache({
      capacity: this.config.cacheCapacity,
      clock: this.clock,
      logger,
    });
    this.stage = new FallbackTransformStage({
      hardware: options.hardware,
      clock: this.clock,
      logger,
    });
    this.merger = new StateMerger({ alpha: this.config.emaAlpha });
    this.optimizer = new ConvergenceOptimizer({
      stage: this.stage,
      clock: this.clock,
      logger,
    });

    this.tokenizer = options.tokenizer ?? new BasicTokenizer();
    this.encoder = options.encoder ?? new HashTokenEncoder();
    this.operation = options.operation ?? { kind: "normalize" };

    for (const source of [this.cache, this.stage, this.optimizer]) {
      this.detachRelays.push(this.relay(source, RELAYED_EVENTS));
    }
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  start(): void {
    this.cache.startDecay(this.config.decayIntervalMs, this.config.coherenceFloor);
  }

  shutdown(): void {
    this.cache.stopDecay();
  }

  /**
   * Stop background work, let queued cache operations finish, then detach
   * from the owned primitives.
   */
  async dispose(): Promise<void> {
    this.shutdown();
    await this.cache.settled();
    for (const detach of this.detachRelays.splice(0)) detach();
  }

  get isRunning(): boolean {
    return this.cache.isDecaying;
  }

  // ─── Processing ─────────────────────────────────────────────────

  async processInput(input: string, kind: InputKind): Promise<ProcessingResult> {
    const startedAt = this.clock();
    const tokens = this.tokenizer.tokenize(input, kind);

    const states = attachNeighbors(
      tokens.map(
        (token, position): ParallelState => ({
          id: createStateId(),
          token,
          vector: this.encoder.encode(token, position, tokens.length),
          neighbors: [],
          position,
          lastAccessed: startedAt,
        })
      ),
      this.config.neighborRadius
    );

    await Promise.all(states.map((state) => this.cache.add(state)));

    const transformed = await this.transformInBatches(states);
    const aggregate = this.merger.merge(transformed);

    const result: ProcessingResult = {
      input,
      kind,
      tokens,
      stateIds: states.map((s) => s.id),
      aggregate,
      durationMs: this.clock() - startedAt,
    };

    const floor = this.config.realityFloor;
    if (aggregate.realityScore < floor) {
      this.log.info(
        { evt: "processor.result_rejected", realityScore: aggregate.realityScore, floor },
        "processor.result_rejected"
      );
      this.emit({
        type: "RESULT_REJECTED",
        realityScore: aggregate.realityScore,
        floor,
        timestamp: this.clock(),
      });
      throw new ProcessingError(
        `Reality score ${aggregate.realityScore.toFixed(4)} below floor ${floor}`,
        "REALITY_TOO_LOW",
        result,
        floor
      );
    }

    this.log.info(
      {
        evt: "processor.input_processed",
        tokens: tokens.length,
        realityScore: aggregate.realityScore,
        confidence: aggregate.confidence,
        durationMs: result.durationMs,
      },
      "processor.input_processed"
    );
    this.emit({
      type: "INPUT_PROCESSED",
      tokenCount: tokens.length,
      realityScore: aggregate.realityScore,
      confidence: aggregate.confidence,
      timestamp: this.clock(),
    });

    return result;
  }

  iterativeDesign(options?: DesignOptions): Promise<DesignResult> {
    return this.optimizer.iterativeDesign(options);
  }

  // ─── Internal ───────────────────────────────────────────────────

  /**
   * Fan out one transform per state, `transformConcurrency` at a time.
   * Results come back in token order regardless of completion order.
   */
  private async transformInBatches(
    states: readonly ParallelState[]
  ): Promise<StateVector[]> {
    const size = this.config.transformConcurrency;
    const results: StateVector[] = [];

    for (let i = 0; i < states.length; i += size) {
      const batch = states.slice(i, i + size);
      results.push(...(await Promise.all(batch.map((s) => this.transformState(s)))));
    }

    return results;
  }

  /**
   * Blend a state with the mean of its still-cached neighbours, then apply
   * the configured operation.
   */
  private async transformState(state: ParallelState): Promise<StateVector> {
    let vector = state.vector;

    const weight = this.config.contextWeight;
    if (weight > 0) {
      const neighbors = await this.cache.resolveNeighbors(state.id);
      const context = centroid(neighbors.map((n) => n.vector));
      if (context) vector = vector.merge(context, weight);
    }

    return this.stage.apply(vector, this.operation);
  }
}
