/**
 * @module types
 * @description Public type exports for the parallel state subsystem.
 */

export * from "./branded.js";
export * from "./vector.js";
export * from "./state.js";
export * from "./processing.js";
export * from "./design.js";
export * from "./events.js";
