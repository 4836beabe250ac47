/**
 * @module types/branded
 * @description Branded types for compile-time safety across the parallel
 * state subsystem.
 *
 * Branded types keep raw primitives (strings, numbers) from being passed
 * where a subsystem-level identifier or unit is expected. A raw string can
 * never be used as a StateId, and a bare number can never be mistaken for a
 * millisecond timestamp.
 *
 * @example
 * ```ts
 * const raw = "some-string";
 * // Type error: string is not assignable to StateId
 * const id: StateId = raw;
 * // Correct:
 * const id: StateId = createStateId();
 * ```
 */

import { randomUUID } from "node:crypto";

/** Unique symbol for branding. Not exported — internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Identifier Brands ──────────────────────────────────────────────

/**
 * Opaque identifier of a ParallelState. Cache key and neighbour back-link.
 */
export type StateId = Brand<string, "StateId">;

// ─── Unit Brands ────────────────────────────────────────────────────

/**
 * Milliseconds since the Unix epoch, as produced by the injected clock.
 */
export type UnixMillis = Brand<number, "UnixMillis">;

// ─── Constructors ───────────────────────────────────────────────────

/** Mint a fresh random StateId. */
export function createStateId(): StateId {
  return randomUUID() as StateId;
}

/** Brand an existing string as a StateId (fixtures, deserialised ids). */
export function toStateId(value: string): StateId {
  return value as StateId;
}

/** Brand a clock reading. */
export function toUnixMillis(value: number): UnixMillis {
  return value as UnixMillis;
}

/** Clock signature shared by every time-aware component. */
export type Clock = () => UnixMillis;

/** Wall-clock default. */
export const systemClock: Clock = () => toUnixMillis(Date.now());
