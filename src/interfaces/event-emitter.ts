/**
 * @module interfaces/event-emitter
 * @description Subscription surface shared by the cache, the optimizer,
 * the transform fallback and the processor.
 *
 * Listener parameters are looked up in `ParallelEventMap` by event type,
 * so `on("STATE_EVICTED", (e) => e.reason)` needs no narrowing. Delivery is
 * synchronous and in registration order. A throwing listener is logged at
 * error level and skipped; the emitting operation carries on.
 */

import type { ParallelEventMap, ParallelEventType } from "../types/events.js";

export type EventListener<T extends ParallelEventType> = (
  event: ParallelEventMap[T]
) => void;

export interface IParallelEmitter {
  on<T extends ParallelEventType>(eventType: T, listener: EventListener<T>): void;

  /** Like `on`, but the listener is dropped before its first call. */
  once<T extends ParallelEventType>(eventType: T, listener: EventListener<T>): void;

  /** No-op when `listener` was never registered for `eventType`. */
  off<T extends ParallelEventType>(eventType: T, listener: EventListener<T>): void;

  emit<T extends ParallelEventType>(event: ParallelEventMap[T]): void;
}
