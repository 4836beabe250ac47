import { describe, it, expect, vi } from "vitest";
import {
  ConvergenceOptimizer,
  DEFAULT_DESIGN_SEED,
  momentumStep,
} from "../src/primitives/convergence-optimizer.js";
import { StateVector } from "../src/primitives/state-vector.js";
import { ConvergenceError } from "../src/interfaces/optimizer.js";
import type { ITransformStage } from "../src/interfaces/transform-stage.js";
import { SoftwareTransformStage } from "../src/backends/software-transform.js";
import { createLogger } from "../src/logger.js";
import type { DesignIterationEvent } from "../src/types/events.js";
import type { TransformOperation } from "../src/types/vector.js";

// ─── Helpers ───────────────────────────────────────────────────────

const logger = createLogger({ level: "silent" });

function stageOf(fn: (vector: StateVector) => StateVector): ITransformStage {
  return { apply: async (vector) => fn(vector) };
}

const identityStage = stageOf((v) => v);
const flipStage = stageOf((v) => v.scale(-1));

describe("ConvergenceOptimizer", () => {
  describe("iterativeDesign()", () => {
    it("should converge on the first iteration under an identity transform", async () => {
      const optimizer = new ConvergenceOptimizer({ stage: identityStage, logger });
      const result = await optimizer.iterativeDesign();

      expect(result.iterations).toBe(1);
      expect(result.confidence).toBe(1);
      expect(result.designVector.toArray()).toEqual(DEFAULT_DESIGN_SEED.toArray());
    });

    it("should converge with the default hadamard operation from the default seed", async () => {
      const optimizer = new ConvergenceOptimizer({
        stage: new SoftwareTransformStage(),
        logger,
      });
      const result = await optimizer.iterativeDesign();

      expect(result.iterations).toBe(1);
      expect(result.designVector.equals(DEFAULT_DESIGN_SEED, 1e-12)).toBe(true);
    });

    it("should settle on a fixed point after one move", async () => {
      const target = StateVector.of(0, 1, 0, 0);
      const optimizer = new ConvergenceOptimizer({ stage: stageOf(() => target), logger });
      const result = await optimizer.iterativeDesign({ initial: StateVector.of(1, 0, 0, 0) });

      expect(result.iterations).toBe(2);
      expect(result.designVector.toArray()).toEqual([0, 1, 0, 0]);
      expect(result.confidence).toBe(1);
    });

    it("should fail with CONVERGENCE_FAILURE when the transform flips the sign", async () => {
      const optimizer = new ConvergenceOptimizer({ stage: flipStage, logger });
      const error = await optimizer.iterativeDesign().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConvergenceError);
      expect(error).toMatchObject({ code: "CONVERGENCE_FAILURE", iterations: 100 });
    });

    it("should honour maxIterations", async () => {
      const optimizer = new ConvergenceOptimizer({ stage: flipStage, logger });
      await expect(optimizer.iterativeDesign({ maxIterations: 7 })).rejects.toMatchObject({
        iterations: 7,
      });
    });

    it("should keep iterating while the history window repeats itself", async () => {
      const target = StateVector.of(0, 1, 0, 0);
      const optimizer = new ConvergenceOptimizer({ stage: stageOf(() => target), logger });
      const iterations: DesignIterationEvent[] = [];
      optimizer.on("DESIGN_ITERATION", (event) => iterations.push(event));

      await expect(
        optimizer.iterativeDesign({
          initial: StateVector.of(1, 0, 0, 0),
          oscillationWindow: 1,
          maxIterations: 10,
        })
      ).rejects.toMatchObject({ code: "CONVERGENCE_FAILURE" });

      expect(iterations).toHaveLength(10);
      expect(iterations[0]?.oscillating).toBe(false);
      expect(iterations.slice(1).every((e) => e.oscillating)).toBe(true);
    });

    it("should throw CANCELLED when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const optimizer = new ConvergenceOptimizer({ stage: identityStage, logger });

      await expect(
        optimizer.iterativeDesign({ signal: controller.signal })
      ).rejects.toMatchObject({ code: "CANCELLED", iterations: 0 });
    });

    it("should stop at the next iteration once aborted", async () => {
      const controller = new AbortController();
      const stage = stageOf((v) => {
        controller.abort();
        return v.scale(-1);
      });
      const optimizer = new ConvergenceOptimizer({ stage, logger });

      await expect(
        optimizer.iterativeDesign({ signal: controller.signal })
      ).rejects.toMatchObject({ code: "CANCELLED", iterations: 1 });
    });

    it("should reject invalid options", async () => {
      const optimizer = new ConvergenceOptimizer({ stage: identityStage, logger });
      await expect(optimizer.iterativeDesign({ maxIterations: 0 })).rejects.toThrow(RangeError);
      await expect(optimizer.iterativeDesign({ oscillationWindow: 0 })).rejects.toThrow(RangeError);
      await expect(optimizer.iterativeDesign({ convergenceThreshold: 0 })).rejects.toThrow(
        RangeError
      );
    });

    it("should emit DESIGN_CONVERGED on success", async () => {
      const optimizer = new ConvergenceOptimizer({ stage: identityStage, logger });
      const listener = vi.fn();
      optimizer.on("DESIGN_CONVERGED", listener);
      await optimizer.iterativeDesign();

      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith(
        expect.objectContaining({ iterations: 1, confidence: 1 })
      );
    });

    it("should emit DESIGN_FAILED on failure", async () => {
      const optimizer = new ConvergenceOptimizer({ stage: flipStage, logger });
      const listener = vi.fn();
      optimizer.on("DESIGN_FAILED", listener);
      await optimizer.iterativeDesign({ maxIterations: 3 }).catch(() => undefined);

      expect(listener).toHaveBeenCalledWith(
        expect.objectContaining({ reason: "CONVERGENCE_FAILURE", iterations: 3 })
      );
    });

    it("should pass the requested operation to the stage", async () => {
      const apply = vi.fn(async (vector: StateVector, _operation: TransformOperation) => vector);
      const optimizer = new ConvergenceOptimizer({ stage: { apply }, logger });
      await optimizer.iterativeDesign({ operation: { kind: "pauliZ" } });

      expect(apply).toHaveBeenCalledWith(DEFAULT_DESIGN_SEED, { kind: "pauliZ" });
    });
  });
});

describe("momentumStep()", () => {
  it("should return the current vector when there is no history", () => {
    const current = StateVector.of(0, 1);
    expect(momentumStep(current, [], 3, 0.1)).toBe(current);
  });

  it("should return the current vector when momentum is 0", () => {
    const current = StateVector.of(0, 1);
    expect(momentumStep(current, [StateVector.of(1, 0)], 3, 0)).toBe(current);
  });

  it("should push along the recent direction and keep the norm", () => {
    const stepped = momentumStep(StateVector.of(0, 1), [StateVector.of(1, 0)], 3, 0.1);
    expect(stepped.norm).toBeCloseTo(1, 12);
    expect(stepped.component(0)).toBeLessThan(0);
  });
});
