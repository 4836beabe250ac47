/**
 * @module interfaces
 * @description Public interface exports for the parallel state subsystem.
 */

export * from "./event-emitter.js";
export * from "./state-vector.js";
export * from "./state-cache.js";
export * from "./state-merger.js";
export * from "./transform-stage.js";
export * from "./tokenizer.js";
export * from "./optimizer.js";
export * from "./processor.js";
