import type { LogLevel } from "../lib/logger.js";

// ---------------------------------------------------------------------------
// Service Configuration
// ---------------------------------------------------------------------------

export interface LlmConfig {
  /** Unset disables the LLM insight action */
  apiKey?: string;
  model: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  temperature: number;
}

export interface ServiceConfig {
  port: number;
  logLevel: LogLevel;
  /** CORS origins; ["*"] allows any */
  allowedOrigins: string[];
  llm: LlmConfig;
}

/** Environment variables the loader reads */
export interface RawEnv {
  PORT?: string;
  LOG_LEVEL?: string;
  ALLOWED_ORIGINS?: string;
  OPENAI_API_KEY?: string;
  OPENAI_MODEL?: string;
  LLM_TIMEOUT_MS?: string;
  LLM_TEMPERATURE?: string;
}
