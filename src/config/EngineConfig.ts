/**
 * @fileoverview Engine configuration.
 *
 * Defaults live in {@link DEFAULT_ENGINE_CONFIG}. `loadEngineConfig` layers,
 * lowest priority first:
 *   1. defaults
 *   2. an optional JSON config file
 *   3. environment variables (FLOW_MAX_ITERATIONS, FLOW_TOLERANCE,
 *      FLOW_TIME_LIMIT_MS, FLOW_LOG_LEVEL)
 *
 * @module config/EngineConfig
 */

import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { InvalidConfigError } from "../errors/FlowErrors";
import { LOG_LEVELS, type LogLevel } from "../utils/Logger";

export interface EngineConfig {
  /** Default iteration budget per run */
  maxIterations: number;

  /** Default numeric tolerance */
  tolerance: number;

  /** Default wall-clock limit per run, 0 = none */
  timeLimitMs: number;

  /** Re-check the flow invariants after every run */
  verifyResults: boolean;

  logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxIterations: 100_000,
  tolerance: 1e-9,
  timeLimitMs: 0,
  verifyResults: true,
  logLevel: "warn",
};

export const EngineConfigSchema = z.object({
  maxIterations: z.number().int().nonnegative(),
  tolerance: z.number().nonnegative().finite(),
  timeLimitMs: z.number().nonnegative().finite(),
  verifyResults: z.boolean(),
  logLevel: z.enum(LOG_LEVELS),
});

const PartialEngineConfigSchema = EngineConfigSchema.partial();

/**
 * Merges overrides onto the defaults and validates the outcome.
 *
 * @throws InvalidConfigError when a value is out of range
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const merged = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  const parsed = EngineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new InvalidConfigError(`Invalid engine config: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  return parsed.data;
}

function readEnvNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidConfigError(`${key} must be a number, got "${raw}"`, { key, value: raw });
  }
  return value;
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Partial<EngineConfig> {
  const overrides: Partial<EngineConfig> = {};

  const maxIterations = readEnvNumber(env, "FLOW_MAX_ITERATIONS");
  if (maxIterations !== undefined) overrides.maxIterations = maxIterations;

  const tolerance = readEnvNumber(env, "FLOW_TOLERANCE");
  if (tolerance !== undefined) overrides.tolerance = tolerance;

  const timeLimitMs = readEnvNumber(env, "FLOW_TIME_LIMIT_MS");
  if (timeLimitMs !== undefined) overrides.timeLimitMs = timeLimitMs;

  const logLevel = env.FLOW_LOG_LEVEL;
  if (logLevel !== undefined && logLevel !== "") {
    const parsed = z.enum(LOG_LEVELS).safeParse(logLevel);
    if (!parsed.success) {
      throw new InvalidConfigError(`FLOW_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${logLevel}"`);
    }
    overrides.logLevel = parsed.data;
  }

  return overrides;
}

/**
 * Loads configuration from an optional JSON file and the environment.
 *
 * @param configPath - JSON file with any subset of EngineConfig keys
 * @param env - Environment to read overrides from
 */
export function loadEngineConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  let fileConfig: Partial<EngineConfig> = {};

  if (configPath !== undefined && existsSync(configPath)) {
    let json: unknown;
    try {
      json = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (e) {
      throw new InvalidConfigError(`Failed to parse ${configPath}: ${e instanceof Error ? e.message : String(e)}`, {
        path: configPath,
      });
    }

    const parsed = PartialEngineConfigSchema.strict().safeParse(json);
    if (!parsed.success) {
      throw new InvalidConfigError(`Invalid config in ${configPath}: ${parsed.error.issues.map((i) => i.message).join("; ")}`, {
        path: configPath,
      });
    }
    fileConfig = parsed.data;
  }

  return resolveEngineConfig({ ...fileConfig, ...readEnvOverrides(env) });
}
