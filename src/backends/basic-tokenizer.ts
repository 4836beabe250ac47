/**
 * @module backends/basic-tokenizer
 * @description Default ITokenizer: regex splitting with light type tagging.
 *
 * - `text`, `voice`, `image` (caption text): words, decimal numbers and
 *   single punctuation symbols. A capitalised word that does not open a
 *   sentence is tagged `properNoun`.
 * - `code`: syntax stripped, snake_case and camelCase split, lowercased.
 */

import type { ITokenizer } from "../interfaces/tokenizer.js";
import type { InputKind, Token, TokenType } from "../types/processing.js";

const TEXT_PATTERN = /\d+(?:\.\d+)?|[\p{L}\p{N}]+(?:['’]\p{L}+)*|[^\s\p{L}\p{N}]/gu;
const NUMBER = /^\d+(?:\.\d+)?$/;
const SYMBOL = /^[^\p{L}\p{N}]$/u;
const CAPITALISED = /^\p{Lu}/u;
const SENTENCE_END = new Set([".", "!", "?"]);

export class BasicTokenizer implements ITokenizer {
  tokenize(input: string, kind: InputKind): Token[] {
    return kind === "code" ? tokenizeCode(input) : tokenizeText(input);
  }
}

function tokenizeText(input: string): Token[] {
  const tokens: Token[] = [];
  let sentenceStart = true;

  for (const match of input.matchAll(TEXT_PATTERN)) {
    const value = match[0] ?? "";
    let type: TokenType;
    if (NUMBER.test(value)) type = "number";
    else if (SYMBOL.test(value)) type = "symbol";
    else if (CAPITALISED.test(value) && !sentenceStart) type = "properNoun";
    else type = "word";

    tokens.push({ value, type });
    sentenceStart = type === "symbol" ? SENTENCE_END.has(value) : false;
  }

  return tokens;
}

function tokenizeCode(input: string): Token[] {
  return input
    .replace(/[^a-zA-Z0-9_]+/g, " ")
    .replace(/_/g, " ")
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .toLowerCase()
    .split(/\s+/)
    .filter((value) => value.length > 0)
    .map((value): Token => ({ value, type: NUMBER.test(value) ? "number" : "word" }));
}
