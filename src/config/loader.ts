import type { LlmConfig, RawEnv, ServiceConfig } from "./types.js";
import { normalizeLevel } from "../lib/logger.js";
import {
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
} from "../llm/openai-client.js";

// ---------------------------------------------------------------------------
// Config Loader
// ---------------------------------------------------------------------------
// Builds the service configuration from environment variables, or at runtime
// from a partial object. Malformed values fail at start-up, never mid-request.
// ---------------------------------------------------------------------------

export const DEFAULT_PORT = 8000;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Load a ServiceConfig from environment variables.
 * Pass a plain object in tests; defaults to process.env.
 */
export function loadConfig(env: RawEnv = process.env): ServiceConfig {
  const logLevel = env.LOG_LEVEL ? normalizeLevel(env.LOG_LEVEL) : "info";
  if (!logLevel) {
    throw new ConfigError(
      `LOG_LEVEL must be one of debug, info, warn, error, silent (got "${env.LOG_LEVEL}")`
    );
  }

  return {
    port: parseNumber(env, "PORT", DEFAULT_PORT, { integer: true, min: 0, max: 65535 }),
    logLevel,
    allowedOrigins: parseOrigins(env.ALLOWED_ORIGINS),
    llm: {
      apiKey: env.OPENAI_API_KEY || undefined,
      model: env.OPENAI_MODEL || DEFAULT_MODEL,
      timeoutMs: parseNumber(env, "LLM_TIMEOUT_MS", DEFAULT_TIMEOUT_MS, {
        integer: true,
        min: 1,
      }),
      temperature: parseNumber(env, "LLM_TEMPERATURE", DEFAULT_TEMPERATURE, {
        min: 0,
        max: 2,
      }),
    },
  };
}

/**
 * Build a ServiceConfig at runtime from a partial config object.
 * Applies defaults for omitted fields.
 */
export function buildConfig(
  partial: Partial<Omit<ServiceConfig, "llm">> & { llm?: Partial<LlmConfig> } = {}
): ServiceConfig {
  return {
    port: partial.port ?? DEFAULT_PORT,
    logLevel: partial.logLevel ?? "info",
    allowedOrigins: partial.allowedOrigins ?? ["*"],
    llm: {
      apiKey: partial.llm?.apiKey,
      model: partial.llm?.model ?? DEFAULT_MODEL,
      timeoutMs: partial.llm?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      temperature: partial.llm?.temperature ?? DEFAULT_TEMPERATURE,
    },
  };
}

// ---------------------------------------------------------------------------
// Internal: value parsing
// ---------------------------------------------------------------------------

function parseOrigins(raw: string | undefined): string[] {
  if (!raw) return ["*"];
  const origins = raw
    .split(",")
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
  return origins.length > 0 ? origins : ["*"];
}

function parseNumber(
  env: RawEnv,
  key: keyof RawEnv,
  fallback: number,
  bounds: { integer?: boolean; min?: number; max?: number }
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || (bounds.integer && !Number.isInteger(value))) {
    throw new ConfigError(
      `Environment variable "${key}" must be ${bounds.integer ? "an integer" : "a number"} (got "${raw}")`
    );
  }
  if (bounds.min !== undefined && value < bounds.min) {
    throw new ConfigError(`Environment variable "${key}" must be >= ${bounds.min} (got ${value})`);
  }
  if (bounds.max !== undefined && value > bounds.max) {
    throw new ConfigError(`Environment variable "${key}" must be <= ${bounds.max} (got ${value})`);
  }
  return value;
}
