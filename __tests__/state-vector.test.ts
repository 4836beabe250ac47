import { describe, it, expect } from "vitest";
import { StateVector } from "../src/primitives/state-vector.js";
import { VectorError } from "../src/interfaces/state-vector.js";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("StateVector", () => {
  describe("constructor", () => {
    it("should reject an empty component list", () => {
      expect(() => new StateVector([])).toThrow(VectorError);
    });

    it("should reject more than four components", () => {
      expect(thrown(() => StateVector.of(1, 0, 0, 0, 0))).toMatchObject({
        code: "INVALID_DIMENSION",
      });
    });

    it("should reject non-finite components", () => {
      expect(thrown(() => StateVector.of(1, Number.NaN))).toMatchObject({
        code: "INVALID_COMPONENT",
      });
    });

    it("should not share its components with the caller", () => {
      const source = [0.6, 0.8];
      const v = new StateVector(source);
      source[0] = 9;
      const copy = v.toArray();
      copy[1] = 9;
      expect(v.toArray()).toEqual([0.6, 0.8]);
    });
  });

  describe("identity()", () => {
    it("should put all weight on the first component", () => {
      expect(StateVector.identity().toArray()).toEqual([1, 0, 0, 0]);
      expect(StateVector.identity(2).toArray()).toEqual([1, 0]);
    });
  });

  describe("derived scalars", () => {
    it("should read coherence from the first component", () => {
      expect(StateVector.of(0.6, 0.8).coherence).toBe(0.6);
    });

    it("should compute amplitude over the first two components", () => {
      expect(StateVector.of(0.6, 0.8, 5, 5).amplitude).toBeCloseTo(1, 12);
    });

    it("should compute realityScore as coherence × amplitude", () => {
      expect(StateVector.of(0.6, 0.8).realityScore).toBeCloseTo(0.6, 12);
    });

    it("should treat a missing second component as zero", () => {
      const v = StateVector.of(0.5);
      expect(v.amplitude).toBe(0.5);
      expect(v.realityScore).toBe(0.25);
    });
  });

  describe("merge()", () => {
    it("should return the normalised midpoint at the default weight", () => {
      const merged = StateVector.of(1, 0, 0, 0).merge(StateVector.of(0, 1, 0, 0));
      const [x, y, z, w] = merged.toArray();
      expect(x).toBeCloseTo(Math.SQRT1_2, 12);
      expect(y).toBeCloseTo(Math.SQRT1_2, 12);
      expect(z).toBe(0);
      expect(w).toBe(0);
      expect(merged.norm).toBeCloseTo(1, 12);
    });

    it("should clamp the weight into [0, 1]", () => {
      const a = StateVector.of(1, 0);
      const b = StateVector.of(0, 1);
      expect(a.merge(b, 2).toArray()).toEqual([0, 1]);
      expect(a.merge(b, -1).toArray()).toEqual([1, 0]);
    });

    it("should leave a zero sum unnormalised", () => {
      const merged = StateVector.of(1, 0).merge(StateVector.of(-1, 0));
      expect(merged.norm).toBe(0);
    });

    it("should throw DIMENSION_MISMATCH for unequal dimensions", () => {
      const error = thrown(() => StateVector.of(1, 0).merge(StateVector.of(1, 0, 0)));
      expect(error).toBeInstanceOf(VectorError);
      expect(error).toMatchObject({ code: "DIMENSION_MISMATCH" });
    });
  });

  describe("arithmetic", () => {
    it("should measure Euclidean distance", () => {
      expect(StateVector.of(0, 0).distance(StateVector.of(3, 4))).toBe(5);
    });

    it("should compute the overlap as a dot product", () => {
      expect(StateVector.of(1, 2, 3).overlap(StateVector.of(4, 5, 6))).toBe(32);
    });

    it("should normalise to unit length", () => {
      const [x, y] = StateVector.of(3, 4).normalize().toArray();
      expect(x).toBeCloseTo(0.6, 12);
      expect(y).toBeCloseTo(0.8, 12);
    });

    it("should return a zero vector from normalize() unchanged", () => {
      const zero = StateVector.zero(3);
      expect(zero.normalize()).toBe(zero);
    });

    it("should replace only the first component in withCoherence()", () => {
      expect(StateVector.of(0.8, 0.6).withCoherence(0.4).toArray()).toEqual([0.4, 0.6]);
    });
  });

  describe("equals()", () => {
    it("should compare within a tolerance", () => {
      const a = StateVector.of(1, 0);
      expect(a.equals(StateVector.of(1 + 1e-9, 0), 1e-6)).toBe(true);
      expect(a.equals(StateVector.of(1.1, 0), 1e-6)).toBe(false);
    });

    it("should never equal a vector of another dimension", () => {
      expect(StateVector.of(1, 0).equals(StateVector.of(1, 0, 0), 1)).toBe(false);
    });
  });

  describe("toString()", () => {
    it("should print four decimals per component", () => {
      expect(StateVector.of(0.5, 0.25).toString()).toBe("[0.5000, 0.2500]");
    });
  });
});
