import { describe, it, expect } from "vitest";
import { BasicTokenizer } from "../src/backends/basic-tokenizer.js";
import { HashTokenEncoder, tokenAngle } from "../src/backends/token-encoder.js";
import type { Token } from "../src/types/processing.js";

describe("BasicTokenizer", () => {
  const tokenizer = new BasicTokenizer();

  describe("tokenize() — text", () => {
    it("should split words, numbers and punctuation", () => {
      expect(tokenizer.tokenize("Alice met Bob at 3.14 pm.", "text")).toEqual([
        { value: "Alice", type: "word" },
        { value: "met", type: "word" },
        { value: "Bob", type: "properNoun" },
        { value: "at", type: "word" },
        { value: "3.14", type: "number" },
        { value: "pm", type: "word" },
        { value: ".", type: "symbol" },
      ]);
    });

    it("should treat a capitalised word after a sentence end as a plain word", () => {
      const tokens = tokenizer.tokenize("Stop. Go now!", "text");
      expect(tokens.map((t) => t.type)).toEqual(["word", "symbol", "word", "word", "symbol"]);
    });

    it("should keep contractions together", () => {
      expect(tokenizer.tokenize("don't", "text")).toEqual([{ value: "don't", type: "word" }]);
    });

    it("should return no tokens for blank input", () => {
      expect(tokenizer.tokenize("   ", "text")).toEqual([]);
    });
  });

  describe("tokenize() — code", () => {
    it("should split identifiers on case and underscores", () => {
      expect(tokenizer.tokenize("parseHTTPResponse_v2(x)", "code").map((t) => t.value)).toEqual([
        "parse",
        "http",
        "response",
        "v2",
        "x",
      ]);
    });

    it("should tag numeric literals", () => {
      expect(tokenizer.tokenize("retry(3)", "code")).toEqual([
        { value: "retry", type: "word" },
        { value: "3", type: "number" },
      ]);
    });
  });
});

describe("HashTokenEncoder", () => {
  const encoder = new HashTokenEncoder();
  const token: Token = { value: "files", type: "word" };

  describe("encode()", () => {
    it("should produce a unit four-dimensional vector", () => {
      const v = encoder.encode(token, 0, 3);
      expect(v.dimension).toBe(4);
      expect(v.norm).toBeCloseTo(1, 12);
    });

    it("should be deterministic", () => {
      expect(encoder.encode(token, 1, 3).toArray()).toEqual(encoder.encode(token, 1, 3).toArray());
    });

    it("should keep the first two components non-negative", () => {
      const v = encoder.encode(token, 2, 3);
      expect(v.component(0)).toBeGreaterThanOrEqual(0);
      expect(v.component(1)).toBeGreaterThanOrEqual(0);
    });

    it("should distinguish positions", () => {
      expect(encoder.encode(token, 0, 3).component(2)).toBe(0);
      expect(encoder.encode(token, 2, 3).component(2)).toBeGreaterThan(0);
    });

    it("should distinguish token types", () => {
      const word = encoder.encode({ value: "7", type: "word" }, 0, 1);
      const number = encoder.encode({ value: "7", type: "number" }, 0, 1);
      expect(word.equals(number, 1e-9)).toBe(false);
    });
  });

  describe("tokenAngle()", () => {
    it("should fall within the first quadrant", () => {
      for (const value of ["a", "files", "3.14", "Ω"]) {
        const angle = tokenAngle(value);
        expect(angle).toBeGreaterThanOrEqual(0);
        expect(angle).toBeLessThan(Math.PI / 2);
      }
    });
  });
});
