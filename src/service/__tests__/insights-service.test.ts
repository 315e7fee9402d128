import { describe, it, expect } from "vitest";
import { InsightsService } from "../index.js";
import { LLM_FAILURE_SUMMARY } from "../actions/generate-llm-insight.js";
import { MockCompletionClient } from "../../llm/mock-client.js";
import { createLogger, type Logger } from "../../lib/logger.js";
import { BOTTLENECK_RULES } from "../../core/analysis/bottleneck.js";
import { PROMPTS } from "../../prompts/index.js";

const NOW = new Date("2024-10-20T10:00:00.000Z");
const silent = createLogger({ level: "silent" });

const diwaliPush = {
  ad_name: "Diwali Push",
  spend: 1000,
  revenue: 2500,
  ctr: 0.8,
  hook_rate: 60,
  hold_rate: 10,
  completion_rate: 8,
};

function createService(llm?: MockCompletionClient) {
  return new InsightsService({ llm, logger: silent, now: () => NOW });
}

describe("insights.ad.generate", () => {
  it("returns the templated insight", async () => {
    const result = await createService().execute("insights.ad.generate", diwaliPush);

    expect(result.success).toBe(true);
    expect(result.summary).toBe('Generated insight for "Diwali Push" (ROAS 2.50x).');
    expect(result.partialFailures).toEqual([]);
    expect(result.data).toMatchObject({
      diagnostics: { roas: 2.5, spend: 1000, revenue: 2500, clicks: 0 },
      timestamp: "2024-10-20T10:00:00.000Z",
    });
    expect(result.data).toHaveProperty("suggestions.length", 5);
  });

  it("accepts numeric strings and fills missing metrics with zero", async () => {
    const result = await createService().execute("insights.ad.generate", {
      ad_name: "Sparse",
      spend: "200",
      revenue: "100",
    });

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      diagnostics: { spend: 200, revenue: 100, roas: 0.5, ctr_pct: 0, hook_rate_pct: 0 },
    });
  });

  it("prefers ad_name over name and accepts name alone", async () => {
    const service = createService();

    const both = await service.execute("insights.ad.generate", {
      ...diwaliPush,
      name: "Alias",
    });
    const aliasOnly = await service.execute("insights.ad.generate", {
      name: "Alias",
      spend: 100,
    });

    expect(both.summary).toBe('Generated insight for "Diwali Push" (ROAS 2.50x).');
    expect(aliasOnly.summary).toBe('Generated insight for "Alias" (ROAS 0.00x).');
  });

  it("truncates fractional counts", async () => {
    const result = await createService().execute("insights.ad.generate", {
      ad_name: "X",
      spend: 100,
      revenue: 50,
      clicks: 60.7,
      impressions: "1200.9",
    });

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      diagnostics: { clicks: 60, impressions: 1200, purchases: 0 },
    });
  });

  it("keeps the ad name exactly as sent", async () => {
    const service = createService();
    const padded = await service.execute("insights.ad.generate", {
      ...diwaliPush,
      ad_name: " Diwali Push",
    });

    expect(padded.summary).toBe('Generated insight for " Diwali Push" (ROAS 2.50x).');
  });

  it("rejects a blank ad name", async () => {
    const result = await createService().execute("insights.ad.generate", {
      ad_name: "   ",
    });

    expect(result.success).toBe(false);
    expect(result.partialFailures).toEqual([
      { step: "validation", error: "ad_name: ad_name must not be blank" },
    ]);
  });

  it("requires an ad name", async () => {
    const result = await createService().execute("insights.ad.generate", { spend: 10 });

    expect(result.success).toBe(false);
    expect(result.summary).toBe("Validation failed: ad_name: ad_name is required");
    expect(result.partialFailures).toEqual([
      { step: "validation", error: "ad_name: ad_name is required" },
    ]);
  });

  it("rejects negative spend", async () => {
    const result = await createService().execute("insights.ad.generate", {
      ad_name: "Bad",
      spend: -5,
    });

    expect(result.success).toBe(false);
    expect(result.partialFailures).toEqual([
      { step: "validation", error: "spend: Number must be greater than or equal to 0" },
    ]);
  });

  it("rejects a percentage above 100", async () => {
    const result = await createService().execute("insights.ad.generate", {
      ad_name: "Bad",
      hook_rate: 150,
    });

    expect(result.success).toBe(false);
    expect(result.partialFailures[0]?.error).toBe(
      "hook_rate: Number must be less than or equal to 100"
    );
  });
});

describe("insights.ad.generate-llm", () => {
  it("uses the completion as the insight", async () => {
    const llm = new MockCompletionClient("Scale the Diwali creative.");
    const result = await createService(llm).execute("insights.ad.generate-llm", {
      ...diwaliPush,
      temperature: 0.3,
    });

    expect(result.success).toBe(true);
    expect(result.summary).toBe('Generated LLM insight for "Diwali Push" with mock-model.');
    expect(result.data).toMatchObject({
      insight: "Scale the Diwali creative.",
      model: "mock-model",
      bottleneck: BOTTLENECK_RULES[5].message,
      timestamp: "2024-10-20T10:00:00.000Z",
    });

    expect(llm.requests).toHaveLength(1);
    expect(llm.requests[0]?.temperature).toBe(0.3);
    expect(llm.requests[0]?.user).toContain("Ad: Diwali Push");
  });

  it("returns the same suggestions as the template path", async () => {
    const service = createService(new MockCompletionClient());
    const template = await service.execute("insights.ad.generate", diwaliPush);
    const llm = await service.execute("insights.ad.generate-llm", diwaliPush);

    expect(template.data).toHaveProperty("suggestions");
    expect(llm.data).toHaveProperty("suggestions");
    const pick = (data: unknown) =>
      typeof data === "object" && data !== null && "suggestions" in data
        ? data.suggestions
        : undefined;
    expect(pick(llm.data)).toEqual(pick(template.data));
  });

  it("reports a generic failure when the completion fails", async () => {
    const llm = new MockCompletionClient();
    llm.shouldFail = true;

    const result = await createService(llm).execute("insights.ad.generate-llm", diwaliPush);

    expect(result.success).toBe(false);
    expect(result.summary).toBe(LLM_FAILURE_SUMMARY);
    expect(result.partialFailures).toEqual([
      { step: "llm", error: "Mock completion failure" },
    ]);
    expect(result.data).toBeUndefined();
  });

  it("fails when no completion client is configured", async () => {
    const result = await createService().execute("insights.ad.generate-llm", diwaliPush);

    expect(result.success).toBe(false);
    expect(result.summary).toBe("LLM insight generation is not configured");
    expect(result.partialFailures[0]?.step).toBe("llm");
  });

  it("rejects a temperature outside 0-2", async () => {
    const llm = new MockCompletionClient();
    const result = await createService(llm).execute("insights.ad.generate-llm", {
      ...diwaliPush,
      temperature: 5,
    });

    expect(result.success).toBe(false);
    expect(result.partialFailures[0]?.step).toBe("validation");
    expect(llm.requests).toHaveLength(0);
  });
});

describe("insights.video.extract-languages", () => {
  it("returns the dominant languages", async () => {
    const result = await createService().execute("insights.video.extract-languages", {
      video_content_analysis: {
        speech_spoken: ["Hindi: 70%", "English: 30%"],
        written_text_on_screen: "English",
      },
    });

    expect(result.success).toBe(true);
    expect(result.summary).toBe("Spoken: Hindi, written: English.");
    expect(result.data).toEqual({ spoken_language: "Hindi", written_language: "English" });
  });

  it("requires the analysis object", async () => {
    const result = await createService().execute("insights.video.extract-languages", {});

    expect(result.success).toBe(false);
    expect(result.partialFailures).toEqual([
      { step: "validation", error: "video_content_analysis: Required" },
    ]);
  });
});

describe("insights.product.categorize", () => {
  it("categorizes by keywords with an empty mapping", async () => {
    const result = await createService().execute("insights.product.categorize", {
      new_product_name: "Kenaz Men Woody EDP 100ml",
    });

    expect(result.success).toBe(true);
    expect(result.summary).toBe(
      'Categorized "Kenaz Men Woody EDP 100ml" as Perfumes - Eau de Parfum (Men, Woody, 100ml).'
    );
  });

  it("uses a matching mapping entry", async () => {
    const result = await createService().execute("insights.product.categorize", {
      product_mapping: [
        { product_name: "Kenaz Noir", category: "Gift Sets", subcategory: "Unisex" },
      ],
      new_product_name: "Kenaz Noir",
    });

    expect(result.data).toEqual({
      new_product_name: "Kenaz Noir",
      category: "Gift Sets",
      subcategory: "Unisex",
      reasoning: "Matched existing product mapping",
    });
  });

  it("rejects a blank product name", async () => {
    const result = await createService().execute("insights.product.categorize", {
      new_product_name: "   ",
    });

    expect(result.success).toBe(false);
    expect(result.partialFailures[0]?.step).toBe("validation");
  });
});

describe("insights.prompt.get", () => {
  it("returns the prompt descriptor", async () => {
    const result = await createService().execute("insights.prompt.get", { kind: "influencer" });

    expect(result.success).toBe(true);
    expect(result.data).toEqual(PROMPTS.influencer);
  });

  it("rejects an unknown kind", async () => {
    const result = await createService().execute("insights.prompt.get", { kind: "audio" });

    expect(result.success).toBe(false);
    expect(result.partialFailures[0]?.step).toBe("validation");
  });
});

describe("execute", () => {
  it("turns a thrown handler error into a failed result", async () => {
    const throwingLogger: Logger = {
      ...silent,
      info() {
        throw new Error("sink down");
      },
      child() {
        return throwingLogger;
      },
    };
    const service = new InsightsService({ logger: throwingLogger, now: () => NOW });

    const result = await service.execute("insights.ad.generate", diwaliPush);

    expect(result.success).toBe(false);
    expect(result.summary).toBe("Failed to execute insights.ad.generate: sink down");
    expect(result.partialFailures).toEqual([{ step: "execute", error: "sink down" }]);
  });

  it("reports whether the LLM action is available", () => {
    expect(createService().llmEnabled).toBe(false);
    expect(createService(new MockCompletionClient()).llmEnabled).toBe(true);
  });
});
