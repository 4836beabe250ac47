import { describe, it, expect, beforeEach, vi } from "vitest";
import { ParallelEmitter } from "../src/primitives/base-emitter.js";
import { SerialExecutor } from "../src/primitives/serial-executor.js";
import { createLogger } from "../src/logger.js";
import { toUnixMillis } from "../src/types/branded.js";
import type { InputProcessedEvent } from "../src/types/events.js";

const processed: InputProcessedEvent = {
  type: "INPUT_PROCESSED",
  tokenCount: 2,
  realityScore: 0.8,
  confidence: 1,
  timestamp: toUnixMillis(0),
};

describe("ParallelEmitter", () => {
  let emitter: ParallelEmitter;

  beforeEach(() => {
    emitter = new ParallelEmitter(createLogger({ level: "silent" }));
  });

  it("should deliver events to listeners of that type only", () => {
    const listener = vi.fn();
    const other = vi.fn();
    emitter.on("INPUT_PROCESSED", listener);
    emitter.on("RESULT_REJECTED", other);

    emitter.emit(processed);

    expect(listener).toHaveBeenCalledWith(processed);
    expect(other).not.toHaveBeenCalled();
  });

  it("should stop delivering after off()", () => {
    const listener = vi.fn();
    emitter.on("INPUT_PROCESSED", listener);
    emitter.off("INPUT_PROCESSED", listener);
    emitter.emit(processed);
    expect(listener).not.toHaveBeenCalled();
  });

  it("should deliver once() listeners a single time", () => {
    const listener = vi.fn();
    emitter.once("INPUT_PROCESSED", listener);
    emitter.emit(processed);
    emitter.emit(processed);
    expect(listener).toHaveBeenCalledOnce();
  });

  it("should keep delivering after a listener throws", () => {
    const later = vi.fn();
    emitter.on("INPUT_PROCESSED", () => {
      throw new Error("listener failed");
    });
    emitter.on("INPUT_PROCESSED", later);

    expect(() => emitter.emit(processed)).not.toThrow();
    expect(later).toHaveBeenCalledWith(processed);
  });
});

describe("SerialExecutor", () => {
  it("should run tasks one at a time in submission order", async () => {
    const executor = new SerialExecutor();
    const order: string[] = [];

    const slow = executor.run(async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push("slow");
    });
    const fast = executor.run(() => {
      order.push("fast");
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(["slow", "fast"]);
  });

  it("should keep running after a task fails", async () => {
    const executor = new SerialExecutor();
    const failed = executor.run(() => {
      throw new Error("boom");
    });
    const next = executor.run(() => 42);

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });

  it("should drain past a failed task", async () => {
    const executor = new SerialExecutor();
    const order: string[] = [];
    const failed = executor.run(() => {
      throw new Error("boom");
    });
    const last = executor.run(() => {
      order.push("last");
    });

    await executor.drain();
    expect(order).toEqual(["last"]);
    await expect(failed).rejects.toThrow("boom");
    await expect(last).resolves.toBeUndefined();
  });
});
