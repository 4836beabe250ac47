/**
 * @module interfaces/state-cache
 * @description IStateCache — the bounded, decaying store of ParallelStates.
 *
 * The cache is the subsystem's only shared mutable resource. Capacity
 * pressure is absorbed by LRU eviction and proactive coherence decay, so
 * none of its operations fail: a lookup racing an eviction simply misses.
 */

import type { StateId } from "../types/branded.js";
import type { ParallelState, DecaySweepReport } from "../types/state.js";
import type { IParallelEmitter } from "./event-emitter.js";

/**
 * @interface IStateCache
 * @description Serialized key-value store keyed by `ParallelState.id`.
 */
export interface IStateCache extends IParallelEmitter {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Inserts or replaces the entry for `state.id`.
   *
   * If inserting a new id would push the size past capacity, exactly one
   * entry is evicted first: the one least recently accessed.
   *
   * @postcondition `lastAccessed` is stamped with the cache clock.
   *               Emits STATE_EVICTED (reason CAPACITY) when an entry is
   *               displaced, then STATE_CACHED.
   */
  add(state: ParallelState): Promise<void>;

  /**
   * @command
   * @description Multiplies every entry's coherence by `decayFactor` and
   * removes entries whose coherence ends at or below `threshold`.
   *
   * @postcondition Emits STATE_EVICTED (reason DECAY) per removal and
   *               DECAY_SWEEP_COMPLETED once.
   */
  decaySweep(decayFactor: number, threshold: number): Promise<DecaySweepReport>;

  /**
   * @command
   * @description Starts the recurring decay sweep with
   * `decayFactor = exp(-intervalMs / 1000)`. Restarts if already running.
   */
  startDecay(intervalMs: number, threshold: number): void;

  /**
   * @command
   * @description Stops the recurring decay sweep.
   */
  stopDecay(): void;

  /**
   * @command
   * @description Removes every entry.
   */
  clear(): Promise<void>;

  /**
   * @query
   * @description Resolves once every operation queued so far has finished.
   */
  settled(): Promise<void>;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Returns the state and refreshes its LRU position and
   * `lastAccessed`.
   * @returns The state, or `undefined` when absent.
   */
  get(id: StateId): Promise<ParallelState | undefined>;

  /**
   * @query
   * @description Reads a state without touching LRU bookkeeping.
   */
  peek(id: StateId): Promise<ParallelState | undefined>;

  /**
   * @query
   * @description Resolves the neighbour back-links of a cached state.
   * Neighbours no longer cached are skipped; order is preserved.
   * Does not refresh the neighbours' LRU positions.
   */
  resolveNeighbors(id: StateId): Promise<ParallelState[]>;

  /**
   * @query
   * @description Every cached state, least recently accessed first.
   */
  snapshot(): Promise<ParallelState[]>;

  /** Whether an entry exists for `id`. */
  has(id: StateId): boolean;

  /** Number of entries. */
  readonly size: number;

  /** Maximum number of entries. */
  readonly capacity: number;

  /** Whether the recurring decay sweep is running. */
  readonly isDecaying: boolean;
}
