/**
 * @module types/processing
 * @description Input, token and result types at the processor boundary.
 */

import type { StateId } from "./branded.js";
import type { AggregateResult } from "./vector.js";

/** Kind of input handed to `processInput`. Selects tokenizer behaviour. */
export type InputKind = "text" | "code" | "voice" | "image";

/** Inferred tag of a token. */
export type TokenType = "word" | "number" | "symbol" | "properNoun";

export interface Token {
  readonly value: string;
  readonly type: TokenType;
}

/**
 * Result of a successful `processInput` call.
 */
export interface ProcessingResult {
  readonly input: string;
  readonly kind: InputKind;
  readonly tokens: readonly Token[];
  /** Ids of the cached states, in token order. */
  readonly stateIds: readonly StateId[];
  readonly aggregate: AggregateResult;
  /** Wall time spent in `processInput`, per the injected clock. */
  readonly durationMs: number;
}
