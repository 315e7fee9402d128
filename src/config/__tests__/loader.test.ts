import { describe, it, expect } from "vitest";
import { buildConfig, ConfigError, loadConfig } from "../loader.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      logLevel: "info",
      allowedOrigins: ["*"],
      llm: {
        apiKey: undefined,
        model: "gpt-4o-mini",
        timeoutMs: 30000,
        temperature: 0.7,
      },
    });
  });

  it("reads every supported variable", () => {
    const config = loadConfig({
      PORT: "9000",
      LOG_LEVEL: "DEBUG",
      ALLOWED_ORIGINS: "https://a.example, https://b.example ,",
      OPENAI_API_KEY: "test-key",
      OPENAI_MODEL: "gpt-4o",
      LLM_TIMEOUT_MS: "5000",
      LLM_TEMPERATURE: "0.2",
    });

    expect(config).toEqual({
      port: 9000,
      logLevel: "debug",
      allowedOrigins: ["https://a.example", "https://b.example"],
      llm: {
        apiKey: "test-key",
        model: "gpt-4o",
        timeoutMs: 5000,
        temperature: 0.2,
      },
    });
  });

  it("treats an empty API key as unset", () => {
    expect(loadConfig({ OPENAI_API_KEY: "" }).llm.apiKey).toBeUndefined();
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(
      'Environment variable "PORT" must be an integer (got "abc")'
    );
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ConfigError);
    expect(() => loadConfig({ LLM_TEMPERATURE: "3" })).toThrow(
      'Environment variable "LLM_TEMPERATURE" must be <= 2 (got 3)'
    );
    expect(() => loadConfig({ LLM_TIMEOUT_MS: "0" })).toThrow(
      'Environment variable "LLM_TIMEOUT_MS" must be >= 1 (got 0)'
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(
      'LOG_LEVEL must be one of debug, info, warn, error, silent (got "verbose")'
    );
  });
});

describe("buildConfig", () => {
  it("fills omitted fields with defaults", () => {
    const config = buildConfig({ port: 0, llm: { apiKey: "test-key" } });
    expect(config.port).toBe(0);
    expect(config.allowedOrigins).toEqual(["*"]);
    expect(config.llm).toEqual({
      apiKey: "test-key",
      model: "gpt-4o-mini",
      timeoutMs: 30000,
      temperature: 0.7,
    });
  });
});
