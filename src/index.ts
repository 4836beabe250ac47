/**
 * @module parallel-state
 * @description Parallel state subsystem of a terminal assistant: a bounded,
 * decaying cache of per-token state vectors with contextual neighbour
 * links, an EMA-based vector merger, and a convergence-seeking optimizer
 * with oscillation detection.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Backends ───────────────────────────────────────────────────────
export * from "./backends/index.js";

// ─── Configuration & Logging ────────────────────────────────────────
export * from "./config.js";
export { createLogger, componentLogger, defaultLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logger.js";

// ─── Orchestrator ───────────────────────────────────────────────────
export { ParallelProcessor } from "./processor.js";
export type { ParallelProcessorOptions } from "./processor.js";
