/**
 * @module logger
 * @description pino logger factory. Components take an optional `Logger`
 * and derive a child bound to their component name.
 */

import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export type LogLevel = LevelWithSilent;

export interface LoggerOptions {
  /** Default: "info" */
  level?: LogLevel;
  /** Default: "parallel-state" */
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "parallel-state",
    level: options.level ?? "info",
  });
}

let defaultRoot: Logger | undefined;

/** Process-wide root used when a component is given no logger. Created on first use. */
export function defaultLogger(): Logger {
  defaultRoot ??= createLogger();
  return defaultRoot;
}

/** Child logger for a component, bound under `parent` or the shared default root. */
export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? defaultLogger()).child({ component });
}
