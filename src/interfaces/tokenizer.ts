/**
 * @module interfaces/tokenizer
 * @description Front-end contracts: splitting input into tokens and
 * encoding a token as a state vector.
 *
 * Both are synchronous and pure with respect to their inputs. Hosts with a
 * real NLP front end supply their own implementations.
 */

import type { InputKind, Token } from "../types/processing.js";
import type { StateVector } from "../primitives/state-vector.js";

/**
 * @interface ITokenizer
 */
export interface ITokenizer {
  /**
   * @description Splits `input` into an ordered token sequence.
   * @param kind - Input modality; may change splitting rules.
   */
  tokenize(input: string, kind: InputKind): Token[];
}

/**
 * @interface ITokenEncoder
 */
export interface ITokenEncoder {
  /**
   * @description Derives the initial state vector of a token.
   * @param position - Index of the token in its sequence.
   * @param total - Length of the sequence.
   */
  encode(token: Token, position: number, total: number): StateVector;
}
