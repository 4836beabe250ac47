/**
 * @module backends/token-encoder
 * @description Default ITokenEncoder: a deterministic unit 4-vector per
 * (token, position).
 *
 * Layout before normalisation:
 *   c0, c1 — cos θ, sin θ with θ ∈ [0, π/2) taken from the first 32 bits
 *            of SHA-256(token.value)
 *   c2     — 0.25 × relative position in the sequence
 *   c3     — 0.25 × a per-type weight
 */

import { createHash } from "node:crypto";
import type { ITokenEncoder } from "../interfaces/tokenizer.js";
import { StateVector } from "../primitives/state-vector.js";
import type { Token, TokenType } from "../types/processing.js";

const TYPE_WEIGHT: Record<TokenType, number> = {
  word: 0.25,
  number: 0.5,
  symbol: 0.75,
  properNoun: 1,
};

const CONTEXT_SCALE = 0.25;

/** Angle in [0, π/2) derived from the token text. */
export function tokenAngle(value: string): number {
  const digest = createHash("sha256").update(value, "utf8").digest();
  return (digest.readUInt32BE(0) / 0x1_0000_0000) * (Math.PI / 2);
}

export class HashTokenEncoder implements ITokenEncoder {
  encode(token: Token, position: number, total: number): StateVector {
    const theta = tokenAngle(token.value);
    const relative = total > 1 ? position / (total - 1) : 0;
    return StateVector.of(
      Math.cos(theta),
      Math.sin(theta),
      CONTEXT_SCALE * relative,
      CONTEXT_SCALE * TYPE_WEIGHT[token.type]
    ).normalize();
  }
}
