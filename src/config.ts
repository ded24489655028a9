/**
 * EngineConfig and default configuration for the scatter-gather engine.
 * This module defines the configuration schema and default values.
 */

import fs from "node:fs";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "./errors.js";

export const ENGINE_CONFIG_SCHEMA = Type.Object(
  {
    concurrencyLimit: Type.Integer({ minimum: 1, description: "Admitted work units in flight" }),
    workerPoolSize: Type.Integer({ minimum: 1, description: "Size of the engine-owned worker pool" }),
    failurePolicy: Type.Union([Type.Literal("fail-fast"), Type.Literal("fail-soft")]),
    itemTimeoutMs: Type.Integer({ minimum: 0, description: "Per-item deadline, 0 disables" }),
    runTimeoutMs: Type.Integer({ minimum: 0, description: "Whole-run deadline, 0 disables" }),
    maxRetries: Type.Integer({ minimum: 0 }),
    retryDelayMs: Type.Integer({ minimum: 0 }),
    trajectoryDir: Type.Optional(Type.String({ minLength: 1 })),
  },
  { additionalProperties: false },
);

export type EngineConfig = Static<typeof ENGINE_CONFIG_SCHEMA>;

export const DEFAULT_CONFIG: EngineConfig = {
  concurrencyLimit: 4,
  workerPoolSize: 16,
  failurePolicy: "fail-fast",
  itemTimeoutMs: 0,
  runTimeoutMs: 0,
  maxRetries: 0,
  retryDelayMs: 100,
};

/**
 * Merge a partial config with defaults.
 * Properties in partial override defaults; absent properties use defaults.
 */
export function mergeConfig(partial: Partial<EngineConfig>): EngineConfig {
  return {
    ...DEFAULT_CONFIG,
    ...partial,
  };
}

/**
 * Check a config against ENGINE_CONFIG_SCHEMA.
 * Throws ConfigurationError listing every violation.
 */
export function validateConfig(config: unknown): EngineConfig {
  if (Value.Check(ENGINE_CONFIG_SCHEMA, config)) {
    return config;
  }
  const violations = [...Value.Errors(ENGINE_CONFIG_SCHEMA, config)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );
  throw new ConfigurationError(violations);
}

/**
 * Validate a concurrency limit on its own, for callers that bypass EngineConfig.
 */
export function assertConcurrencyLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigurationError([`concurrencyLimit must be a positive integer, got ${limit}`]);
  }
}

/**
 * Load a JSON config file, merge it over the defaults and validate it.
 */
export function loadConfigFile(filePath: string): EngineConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError([`${filePath}: ${message}`]);
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError([`${filePath}: expected a JSON object`]);
  }

  return validateConfig({ ...DEFAULT_CONFIG, ...raw });
}
