/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * All primitives extend this to gain event capabilities.
 *
 * A listener that throws is logged and skipped; the remaining listeners
 * still run and `emit()` itself never throws.
 */

import type {
  IParallelEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type {
  ParallelEvent,
  ParallelEventMap,
  ParallelEventType,
} from "../types/events.js";
import { isEventOfType } from "../types/events.js";
import { componentLogger, type Logger } from "../logger.js";

type Dispatch = (event: ParallelEvent) => void;

/**
 * Concrete typed event emitter.
 * Each registered listener is stored behind a narrowing dispatcher, keyed by
 * the caller's listener so `off()` can find it in O(1).
 */
export class ParallelEmitter implements IParallelEmitter {
  private readonly listeners = new Map<
    ParallelEventType,
    Map<unknown, Dispatch>
  >();
  private readonly emitterLog: Logger;

  constructor(logger?: Logger) {
    this.emitterLog = componentLogger("emitter", logger);
  }

  on<T extends ParallelEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Map();
      this.listeners.set(eventType, set);
    }
    set.set(listener, (event) => {
      if (isEventOfType(event, eventType)) listener(event);
    });
  }

  once<T extends ParallelEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends ParallelEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const set = this.listeners.get(eventType);
    if (set) {
      set.delete(listener);
      if (set.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit<T extends ParallelEventType>(event: ParallelEventMap[T]): void {
    const set = this.listeners.get(event.type);
    if (set) {
      for (const dispatch of [...set.values()]) {
        try {
          dispatch(event);
        } catch (error) {
          this.emitterLog.error(
            { evt: "emitter.listener_failed", eventType: event.type, error: String(error) },
            "emitter.listener_failed"
          );
        }
      }
    }
  }

  /**
   * Re-emit every event of `source` from this emitter.
   * @returns Function that detaches the relay.
   */
  protected relay<T extends ParallelEventType>(
    source: IParallelEmitter,
    eventTypes: readonly T[]
  ): () => void {
    const detach: Array<() => void> = [];
    for (const eventType of eventTypes) {
      const forward: EventListener<T> = (event) => this.emit(event);
      source.on(eventType, forward);
      detach.push(() => source.off(eventType, forward));
    }
    return () => {
      for (const fn of detach) fn();
    };
  }
}
