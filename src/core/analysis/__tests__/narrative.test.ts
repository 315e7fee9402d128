import { describe, it, expect } from "vitest";
import {
  buildInsight,
  formatEngagement,
  formatGrouped,
  formatHeadline,
} from "../narrative.js";
import { BOTTLENECK_RULES } from "../bottleneck.js";
import { buildDiagnostics } from "../diagnostics.js";
import { PERFUME_SUGGESTIONS } from "../../../verticals/perfume/suggestions.js";
import type { AdMetrics } from "../../types.js";

const NOW = new Date("2024-10-20T10:00:00.000Z");

const diwaliPush: AdMetrics = {
  name: "Diwali Push",
  spend: 1000,
  revenue: 2500,
  ctr: 0.8,
  cpc: 0,
  hookRate: 60,
  holdRate: 10,
  completionRate: 8,
};

describe("formatGrouped", () => {
  it("groups thousands and drops decimals", () => {
    expect(formatGrouped(1000)).toBe("1,000");
    expect(formatGrouped(1234567.8)).toBe("1,234,568");
    expect(formatGrouped(0)).toBe("0");
  });
});

describe("formatHeadline", () => {
  it("falls back to generic product and platform labels", () => {
    const diag = buildDiagnostics(diwaliPush);
    expect(formatHeadline(diwaliPush, diag)).toBe(
      "**Diwali Push** promoting Product on Platform achieved **2.50x ROAS** with ₹1,000 spend generating ₹2,500 revenue."
    );
  });

  it("names product and platform when present", () => {
    const input = { ...diwaliPush, product: "Kenaz Oud", platform: "Meta" };
    expect(formatHeadline(input, buildDiagnostics(input))).toBe(
      "**Diwali Push** promoting Kenaz Oud on Meta achieved **2.50x ROAS** with ₹1,000 spend generating ₹2,500 revenue."
    );
  });
});

describe("formatEngagement", () => {
  it("prints CTR and CPC to 2 decimals and rates to 1", () => {
    const diag = buildDiagnostics({ ...diwaliPush, cpc: 4.5, hookRate: 33.33 });
    expect(formatEngagement(diag)).toBe(
      "Engagement: **0.80% CTR** (₹4.50 CPC), **33.3% hook rate**, **10.0% hold rate**, **8.0% completion**."
    );
  });
});

describe("buildInsight", () => {
  it("assembles the full narrative for a strong ad", () => {
    const result = buildInsight(diwaliPush, NOW);
    const strong = BOTTLENECK_RULES[5];

    expect(result.diagnostics.roas).toBe(2.5);
    expect(result.insight).toBe(
      "**Diwali Push** promoting Product on Platform achieved **2.50x ROAS** with ₹1,000 spend generating ₹2,500 revenue. " +
        "Engagement: **0.80% CTR** (₹0.00 CPC), **60.0% hook rate**, **10.0% hold rate**, **8.0% completion**. " +
        `\n**Primary Bottleneck:** ${strong.message}`
    );
    expect(result.insight).toContain("**2.50x ROAS**");
    expect(result.insight).toContain("Strong baseline performance");
  });

  it("attaches five catalog suggestions and the timestamp", () => {
    const result = buildInsight(diwaliPush, NOW);

    expect(result.suggestions).toHaveLength(5);
    for (const s of result.suggestions) {
      expect(PERFUME_SUGGESTIONS).toContain(s);
    }
    expect(result.timestamp).toBe("2024-10-20T10:00:00.000Z");
  });

  it("annotates the first suggestion with the ad context", () => {
    const plain = buildInsight(diwaliPush, NOW);
    const withContext = buildInsight(
      { ...diwaliPush, product: "Kenaz Oud", platform: "Meta" },
      NOW
    );

    expect(withContext.suggestions[0]).toBe(
      `${plain.suggestions[0]} [Context: Product: Kenaz Oud, Platform: Meta]`
    );
    expect(withContext.suggestions.slice(1)).toEqual(plain.suggestions.slice(1));
  });

  it("stamps the current time in UTC when no clock is given", () => {
    expect(buildInsight(diwaliPush).timestamp).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/
    );
  });
});
