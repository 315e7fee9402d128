import { describe, it, expect, vi } from "vitest";
import { createInsightsService } from "../bootstrap.js";
import { buildConfig } from "../../config/loader.js";
import { MockCompletionClient } from "../../llm/mock-client.js";
import { createLogger, type LogSink } from "../../lib/logger.js";

function fakeSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies LogSink;
}

describe("createInsightsService", () => {
  it("warns and disables the LLM action without an API key", () => {
    const sink = fakeSink();
    const service = createInsightsService(buildConfig(), {
      logger: createLogger({ level: "warn", sink }),
    });

    expect(service.llmEnabled).toBe(false);
    expect(sink.warn).toHaveBeenCalledWith(
      "[perfume-insights]",
      "OPENAI_API_KEY not set; LLM insights are disabled",
      ""
    );
  });

  it("builds an OpenAI client when a key is configured", () => {
    const service = createInsightsService(
      buildConfig({ llm: { apiKey: "test-key", model: "gpt-4o" } }),
      { logger: createLogger({ level: "silent" }) }
    );
    expect(service.llmEnabled).toBe(true);
  });

  it("prefers an injected completion client", async () => {
    const llm = new MockCompletionClient("Injected.");
    const service = createInsightsService(buildConfig(), {
      llm,
      logger: createLogger({ level: "silent" }),
      now: () => new Date("2024-10-20T10:00:00.000Z"),
    });

    const result = await service.execute("insights.ad.generate-llm", { ad_name: "Test" });

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({ insight: "Injected.", model: "mock-model" });
  });
});
