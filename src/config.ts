/**
 * @module config
 * @description Processor configuration: zod schema, defaults, and loading
 * from environment variables.
 */

import { z } from "zod";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: "INVALID_CONFIG",
    public readonly issues: readonly z.ZodIssue[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const ProcessorConfigSchema = z.object({
  /** Maximum cached states. */
  cacheCapacity: z.number().int().positive().default(1000),
  /** Decay sweep period (ms). Decay factor per sweep: exp(-interval/1000). */
  decayIntervalMs: z.number().positive().default(100),
  /** Coherence at or below which a sweep evicts an entry. */
  coherenceFloor: z.number().min(0).max(1).default(0.1),
  /** Neighbour window radius. */
  neighborRadius: z.number().int().nonnegative().default(5),
  /** EMA smoothing factor for the aggregate reality score. */
  emaAlpha: z.number().gt(0).max(1).default(0.1),
  /** Aggregates scoring below this are rejected. */
  realityFloor: z.number().min(0).max(1).default(0.5),
  /** Transform calls in flight per batch. */
  transformConcurrency: z.number().int().positive().default(8),
  /** Share of the neighbour mean blended into each state before transform. */
  contextWeight: z.number().min(0).max(1).default(0.25),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type ProcessorConfig = z.infer<typeof ProcessorConfigSchema>;
export type ProcessorConfigInput = z.input<typeof ProcessorConfigSchema>;

/** Environment variable for each numeric key. */
export const CONFIG_ENV_VARS = {
  cacheCapacity: "PARALLEL_STATE_CACHE_CAPACITY",
  decayIntervalMs: "PARALLEL_STATE_DECAY_INTERVAL_MS",
  coherenceFloor: "PARALLEL_STATE_COHERENCE_FLOOR",
  neighborRadius: "PARALLEL_STATE_NEIGHBOR_RADIUS",
  emaAlpha: "PARALLEL_STATE_EMA_ALPHA",
  realityFloor: "PARALLEL_STATE_REALITY_FLOOR",
  transformConcurrency: "PARALLEL_STATE_TRANSFORM_CONCURRENCY",
  contextWeight: "PARALLEL_STATE_CONTEXT_WEIGHT",
} as const satisfies Record<Exclude<keyof ProcessorConfig, "logLevel">, string>;

export const LOG_LEVEL_ENV_VAR = "PARALLEL_STATE_LOG_LEVEL";

/**
 * Validate `input` and fill defaults.
 * @throws {ConfigError} code=INVALID_CONFIG
 */
export function resolveConfig(input: unknown = {}): ProcessorConfig {
  const parsed = ProcessorConfigSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid processor config: ${detail}`, "INVALID_CONFIG", parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Build a config from environment variables. Unset variables fall back to
 * defaults; numeric values are coerced.
 * @throws {ConfigError} code=INVALID_CONFIG
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): ProcessorConfig {
  const raw: Record<string, unknown> = {};

  for (const [key, variable] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[variable];
    if (value !== undefined && value.trim() !== "") {
      raw[key] = Number(value);
    }
  }

  const level = env[LOG_LEVEL_ENV_VAR];
  if (level !== undefined && level.trim() !== "") {
    raw["logLevel"] = level.trim();
  }

  return resolveConfig(raw);
}
