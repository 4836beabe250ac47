/**
 * @module primitives/state-cache
 * @description Implementation of the IStateCache interface.
 *
 * Entries live in a Map keyed by StateId. Every operation is funnelled
 * through a SerialExecutor, so reads, writes and decay sweeps behave as if
 * they ran on one dedicated queue: a sweep sees each entry either fully
 * before or fully after a concurrent `add`.
 *
 * Two eviction paths:
 *   - capacity: on `add` of a new id at capacity, the entry with the
 *     oldest `lastAccessed` goes (ties: lowest LRU sequence).
 *   - decay: the recurring sweep scales coherence down and drops entries
 *     that reach the floor.
 *
 * Events are emitted only after an operation has finished mutating the map.
 */

import { ParallelEmitter } from "./base-emitter.js";
import { SerialExecutor } from "./serial-executor.js";
import type { IStateCache } from "../interfaces/state-cache.js";
import type {
  CacheEntry,
  DecaySweepReport,
  EvictionReason,
  ParallelState,
} from "../types/state.js";
import { systemClock } from "../types/branded.js";
import type { Clock, StateId } from "../types/branded.js";
import { componentLogger, type Logger } from "../logger.js";

/** Default maximum number of cached states. */
export const DEFAULT_CACHE_CAPACITY = 1000;

/** Default decay sweep interval (milliseconds). */
export const DEFAULT_DECAY_INTERVAL_MS = 100;

/** Default coherence floor for decay eviction. */
export const DEFAULT_COHERENCE_FLOOR = 0.1;

/** Per-sweep multiplier for a sweep interval: `exp(-seconds)`. */
export function decayFactorFor(intervalMs: number): number {
  return Math.exp(-intervalMs / 1000);
}

export interface StateCacheOptions {
  /** Default: 1000 */
  capacity?: number;
  /** Default: Date.now */
  clock?: Clock;
  logger?: Logger;
}

/**
 * StateCache — bounded LRU store with coherence decay.
 *
 * @example
 * ```ts
 * const cache = new StateCache({ capacity: 500 });
 * await cache.add(state);
 * cache.startDecay(100, 0.1);
 * const hit = await cache.get(state.id); // undefined once decayed away
 * cache.stopDecay();
 * ```
 */
export class StateCache extends ParallelEmitter implements IStateCache {
  readonly capacity: number;

  private readonly entries = new Map<StateId, CacheEntry>();
  private readonly executor = new SerialExecutor();
  private readonly clock: Clock;
  private readonly log: Logger;
  private sequence = 0;
  private decayTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: StateCacheOptions = {}) {
    super(options.logger);
    const capacity = options.capacity ?? DEFAULT_CACHE_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.clock = options.clock ?? systemClock;
    this.log = componentLogger("state-cache", options.logger);
  }

  // ─── Commands ───────────────────────────────────────────────────

  add(state: ParallelState): Promise<void> {
    return this.executor.run(() => {
      const victim =
        !this.entries.has(state.id) && this.entries.size >= this.capacity
          ? this.evictLeastRecent()
          : undefined;

      this.entries.set(state.id, this.touch(state));

      if (victim) {
        this.announceEviction(victim.state.id, "CAPACITY", victim.state.vector.coherence);
      }
      this.emit({
        type: "STATE_CACHED",
        stateId: state.id,
        size: this.entries.size,
        timestamp: this.clock(),
      });
    });
  }

  decaySweep(decayFactor: number, threshold: number): Promise<DecaySweepReport> {
    return this.executor.run(() => {
      const examined = this.entries.size;
      const evicted: StateId[] = [];
      const finalCoherence: number[] = [];

      for (const [id, entry] of this.entries) {
        const vector = entry.state.vector;
        const coherence = vector.coherence * decayFactor;

        if (coherence <= threshold) {
          this.entries.delete(id);
          evicted.push(id);
          finalCoherence.push(coherence);
          continue;
        }

        this.entries.set(id, {
          ...entry,
          state: { ...entry.state, vector: vector.withCoherence(coherence) },
        });
      }

      evicted.forEach((id, i) => {
        this.announceEviction(id, "DECAY", finalCoherence[i] ?? 0);
      });

      const report: DecaySweepReport = {
        examined,
        evicted,
        remaining: this.entries.size,
      };

      this.log.debug(
        { evt: "cache.decay_sweep", examined, evicted: evicted.length, remaining: report.remaining },
        "cache.decay_sweep"
      );
      this.emit({
        type: "DECAY_SWEEP_COMPLETED",
        examined,
        evicted: evicted.length,
        remaining: report.remaining,
        timestamp: this.clock(),
      });

      return report;
    });
  }

  startDecay(
    intervalMs: number = DEFAULT_DECAY_INTERVAL_MS,
    threshold: number = DEFAULT_COHERENCE_FLOOR
  ): void {
    if (!(intervalMs > 0)) {
      throw new RangeError(`decay interval must be positive, got ${intervalMs}`);
    }
    this.stopDecay();

    const factor = decayFactorFor(intervalMs);
    this.decayTimer = setInterval(() => {
      this.decaySweep(factor, threshold).catch((error: unknown) => {
        this.log.error(
          { evt: "cache.decay_sweep_failed", error: String(error) },
          "cache.decay_sweep_failed"
        );
      });
    }, intervalMs);
    this.decayTimer.unref();
  }

  stopDecay(): void {
    if (this.decayTimer) {
      clearInterval(this.decayTimer);
      this.decayTimer = null;
    }
  }

  /** Resolves once every operation queued so far has finished. */
  settled(): Promise<void> {
    return this.executor.drain();
  }

  clear(): Promise<void> {
    return this.executor.run(() => {
      this.entries.clear();
    });
  }

  // ─── Queries ────────────────────────────────────────────────────

  get(id: StateId): Promise<ParallelState | undefined> {
    return this.executor.run(() => {
      const entry = this.entries.get(id);
      if (!entry) return undefined;
      const refreshed = this.touch(entry.state);
      this.entries.set(id, refreshed);
      return refreshed.state;
    });
  }

  peek(id: StateId): Promise<ParallelState | undefined> {
    return this.executor.run(() => this.entries.get(id)?.state);
  }

  resolveNeighbors(id: StateId): Promise<ParallelState[]> {
    return this.executor.run(() => {
      const entry = this.entries.get(id);
      if (!entry) return [];
      const resolved: ParallelState[] = [];
      for (const neighborId of entry.state.neighbors) {
        const neighbor = this.entries.get(neighborId);
        if (neighbor) resolved.push(neighbor.state);
      }
      return resolved;
    });
  }

  snapshot(): Promise<ParallelState[]> {
    return this.executor.run(() =>
      [...this.entries.values()].sort(compareRecency).map((e) => e.state)
    );
  }

  has(id: StateId): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  get isDecaying(): boolean {
    return this.decayTimer !== null;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private touch(state: ParallelState): CacheEntry {
    return {
      state: { ...state, lastAccessed: this.clock() },
      sequence: ++this.sequence,
    };
  }

  /** Removes and returns the least recent entry. Announcing it is the caller's job. */
  private evictLeastRecent(): CacheEntry | undefined {
    let victim: CacheEntry | undefined;
    for (const entry of this.entries.values()) {
      if (!victim || compareRecency(entry, victim) < 0) victim = entry;
    }
    if (victim) this.entries.delete(victim.state.id);
    return victim;
  }

  private announceEviction(
    stateId: StateId,
    reason: EvictionReason,
    coherence: number
  ): void {
    this.log.debug({ evt: "cache.evicted", stateId, reason, coherence }, "cache.evicted");
    this.emit({
      type: "STATE_EVICTED",
      stateId,
      reason,
      coherence,
      timestamp: this.clock(),
    });
  }
}

/** Older `lastAccessed` first; the LRU sequence breaks ties. */
function compareRecency(a: CacheEntry, b: CacheEntry): number {
  return a.state.lastAccessed - b.state.lastAccessed || a.sequence - b.sequence;
}
