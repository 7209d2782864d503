import { z } from "zod";

import { DEFAULT_CHECK_INTERVAL } from "../analysis/budget.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { type EnvSource, readEnum, readInt, readOptionalInt, readOptionalString } from "./env.js";

/** Default size ceiling: 2^24 states, i.e. networks of up to 24 nodes. */
export const DEFAULT_MAX_STATES = 2 ** 24;

const AnalysisConfigSchema = z
  .object({
    maxStates: z.number().int().positive().nullable(),
    timeLimitMs: z.number().int().positive().nullable(),
    checkInterval: z.number().int().positive(),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    logFile: z.string().min(1).nullable(),
  })
  .strict();

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

/**
 * Resolves the analysis configuration from the environment:
 *
 * - `ATTRACTORS_MAX_STATES` size ceiling; `0` disables it.
 * - `ATTRACTORS_TIME_LIMIT_MS` time ceiling, unbounded when unset.
 * - `ATTRACTORS_CHECK_INTERVAL` states visited between clock reads.
 * - `ATTRACTORS_LOG_LEVEL` and `ATTRACTORS_LOG_FILE` for the logger.
 *
 * Explicit `overrides` win over the environment.
 */
export function loadAnalysisConfig(env: EnvSource = process.env, overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  const maxStates = readInt("ATTRACTORS_MAX_STATES", DEFAULT_MAX_STATES, { min: 0 }, env);
  const resolved = {
    maxStates: maxStates === 0 ? null : maxStates,
    timeLimitMs: readOptionalInt("ATTRACTORS_TIME_LIMIT_MS", { min: 1 }, env) ?? null,
    checkInterval: readInt("ATTRACTORS_CHECK_INTERVAL", DEFAULT_CHECK_INTERVAL, { min: 1 }, env),
    logLevel: readEnum<LogLevel>("ATTRACTORS_LOG_LEVEL", LOG_LEVELS, "info", env),
    logFile: readOptionalString("ATTRACTORS_LOG_FILE", env) ?? null,
    ...overrides,
  };
  return AnalysisConfigSchema.parse(resolved);
}
