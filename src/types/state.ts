/**
 * @module types/state
 * @description ParallelState — the per-token unit of work held by the cache.
 *
 * A ParallelState is created once per token, linked to its contextual
 * neighbours by id, and owned by the StateCache from then on. Callers only
 * ever see snapshots; the cache hands out fresh objects on every read.
 */

import type { StateId, UnixMillis } from "./branded.js";
import type { Token } from "./processing.js";
import type { StateVector } from "../primitives/state-vector.js";

// ─── Parallel State ─────────────────────────────────────────────────

export interface ParallelState {
  /** Cache key; also the target of neighbour back-links. */
  readonly id: StateId;
  /** Token this state was derived from. */
  readonly token: Token;
  /** Current numeric state. Coherence (`c[0]`) decays while cached. */
  readonly vector: StateVector;
  /**
   * Ids of the contextual neighbours, in token order. Back-links only:
   * resolve them through the cache, never hold the neighbour objects.
   */
  readonly neighbors: readonly StateId[];
  /** Index of the token within its input. */
  readonly position: number;
  /** Last cache read or write. Drives LRU eviction. */
  readonly lastAccessed: UnixMillis;
}

// ─── Cache Bookkeeping ──────────────────────────────────────────────

/**
 * Internal wrapper around a cached state.
 */
export interface CacheEntry {
  readonly state: ParallelState;
  /** Monotonic stamp of the last touch; orders entries with equal timestamps. */
  readonly sequence: number;
}

/** Why an entry left the cache. */
export type EvictionReason = "CAPACITY" | "DECAY";

/**
 * Outcome of one decay sweep.
 */
export interface DecaySweepReport {
  /** Entries visited. */
  readonly examined: number;
  /** Ids removed because their coherence fell to or below the threshold. */
  readonly evicted: readonly StateId[];
  /** Entries left after the sweep. */
  readonly remaining: number;
}
