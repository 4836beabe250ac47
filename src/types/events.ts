/**
 * @module types/events
 * @description Event catalog for the parallel state subsystem.
 *
 * Primitives emit typed events so the orchestrator and host application can
 * observe cache pressure, accelerator fallbacks and optimizer progress
 * without reaching into component internals.
 */

import type { StateId, UnixMillis } from "./branded.js";
import type { EvictionReason } from "./state.js";

// ─── Cache Events ───────────────────────────────────────────────────

/** Emitted after a state is inserted or replaced. */
export interface StateCachedEvent {
  readonly type: "STATE_CACHED";
  readonly stateId: StateId;
  readonly size: number;
  readonly timestamp: UnixMillis;
}

/** Emitted for every entry that leaves the cache. */
export interface StateEvictedEvent {
  readonly type: "STATE_EVICTED";
  readonly stateId: StateId;
  readonly reason: EvictionReason;
  /** Coherence at the moment of eviction (post-decay for DECAY). */
  readonly coherence: number;
  readonly timestamp: UnixMillis;
}

/** Emitted once per decay sweep. */
export interface DecaySweepCompletedEvent {
  readonly type: "DECAY_SWEEP_COMPLETED";
  readonly examined: number;
  readonly evicted: number;
  readonly remaining: number;
  readonly timestamp: UnixMillis;
}

// ─── Transform Events ───────────────────────────────────────────────

/** Emitted when the hardware stage is unavailable and software took over. */
export interface AcceleratorFallbackEvent {
  readonly type: "ACCELERATOR_FALLBACK";
  readonly operation: string;
  readonly reason: string;
  readonly timestamp: UnixMillis;
}

// ─── Optimizer Events ───────────────────────────────────────────────

/** Emitted at the end of every optimizer iteration. */
export interface DesignIterationEvent {
  readonly type: "DESIGN_ITERATION";
  /** 1-based. */
  readonly iteration: number;
  readonly difference: number;
  readonly oscillating: boolean;
  readonly timestamp: UnixMillis;
}

export interface DesignConvergedEvent {
  readonly type: "DESIGN_CONVERGED";
  readonly iterations: number;
  readonly confidence: number;
  readonly timestamp: UnixMillis;
}

export interface DesignFailedEvent {
  readonly type: "DESIGN_FAILED";
  readonly iterations: number;
  readonly reason: "CONVERGENCE_FAILURE" | "CANCELLED";
  readonly timestamp: UnixMillis;
}

// ─── Processor Events ───────────────────────────────────────────────

export interface InputProcessedEvent {
  readonly type: "INPUT_PROCESSED";
  readonly tokenCount: number;
  readonly realityScore: number;
  readonly confidence: number;
  readonly timestamp: UnixMillis;
}

/** Emitted when an aggregate falls below the reality floor. */
export interface ResultRejectedEvent {
  readonly type: "RESULT_REJECTED";
  readonly realityScore: number;
  readonly floor: number;
  readonly timestamp: UnixMillis;
}

// ─── Union Types ────────────────────────────────────────────────────

export type CacheEvent =
  | StateCachedEvent
  | StateEvictedEvent
  | DecaySweepCompletedEvent;

export type TransformEvent = AcceleratorFallbackEvent;

export type DesignEvent =
  | DesignIterationEvent
  | DesignConvergedEvent
  | DesignFailedEvent;

export type ProcessorEvent = InputProcessedEvent | ResultRejectedEvent;

/** Union of all subsystem events. */
export type ParallelEvent =
  | CacheEvent
  | TransformEvent
  | DesignEvent
  | ProcessorEvent;

/**
 * Extract the event type string literal from a ParallelEvent.
 */
export type ParallelEventType = ParallelEvent["type"];

/**
 * Map from event type string to the corresponding event interface.
 */
export type ParallelEventMap = {
  STATE_CACHED: StateCachedEvent;
  STATE_EVICTED: StateEvictedEvent;
  DECAY_SWEEP_COMPLETED: DecaySweepCompletedEvent;
  ACCELERATOR_FALLBACK: AcceleratorFallbackEvent;
  DESIGN_ITERATION: DesignIterationEvent;
  DESIGN_CONVERGED: DesignConvergedEvent;
  DESIGN_FAILED: DesignFailedEvent;
  INPUT_PROCESSED: InputProcessedEvent;
  RESULT_REJECTED: ResultRejectedEvent;
};

/** Narrow an event to the member named by `type`. */
export function isEventOfType<T extends ParallelEventType>(
  event: ParallelEvent,
  type: T
): event is ParallelEventMap[T] {
  return event.type === type;
}
