import type { AdMetrics, DiagnosticRecord, InsightResult } from "../types.js";
import { buildDiagnostics } from "./diagnostics.js";
import { classifyBottleneck } from "./bottleneck.js";
import {
  annotateWithContext,
  selectSuggestions,
  DEFAULT_SUGGESTION_COUNT,
} from "./suggestions.js";
import { PERFUME_SUGGESTIONS } from "../../verticals/perfume/suggestions.js";

// ---------------------------------------------------------------------------
// Insight Narrative Assembler
// ---------------------------------------------------------------------------
// Headline, engagement line and bottleneck line, joined with single spaces,
// plus the seeded suggestions and the diagnostics they were built from.
// ---------------------------------------------------------------------------

const CURRENCY = "₹";

const wholeNumber = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

/** Grouped integer, e.g. 1234567.8 → "1,234,568" */
export function formatGrouped(value: number): string {
  return wholeNumber.format(value);
}

export function formatHeadline(
  input: Pick<AdMetrics, "name" | "product" | "platform">,
  diag: DiagnosticRecord
): string {
  const product = input.product || "Product";
  const platform = input.platform || "Platform";
  return (
    `**${input.name}** promoting ${product} on ${platform} ` +
    `achieved **${diag.roas.toFixed(2)}x ROAS** with ${CURRENCY}${formatGrouped(diag.spend)} spend ` +
    `generating ${CURRENCY}${formatGrouped(diag.revenue)} revenue.`
  );
}

export function formatEngagement(diag: DiagnosticRecord): string {
  return (
    `Engagement: **${diag.ctr_pct.toFixed(2)}% CTR** (${CURRENCY}${diag.cpc.toFixed(2)} CPC), ` +
    `**${diag.hook_rate_pct.toFixed(1)}% hook rate**, ` +
    `**${diag.hold_rate_pct.toFixed(1)}% hold rate**, ` +
    `**${diag.completion_rate_pct.toFixed(1)}% completion**.`
  );
}

export function formatBottleneckLine(bottleneck: string): string {
  return `\n**Primary Bottleneck:** ${bottleneck}`;
}

/** Seeded suggestions for an ad, with the product/platform note on the first */
export function suggestionsFor(
  input: Pick<AdMetrics, "name" | "product" | "platform">,
  catalog: readonly string[] = PERFUME_SUGGESTIONS
): string[] {
  const picked = selectSuggestions(input.name, catalog, DEFAULT_SUGGESTION_COUNT);
  return annotateWithContext(picked, {
    product: input.product,
    platform: input.platform,
  });
}

/** UTC ISO-8601 with millisecond precision and a "Z" suffix */
export function utcTimestamp(now: Date = new Date()): string {
  return now.toISOString();
}

export function buildInsight(input: AdMetrics, now: Date = new Date()): InsightResult {
  const diagnostics = buildDiagnostics(input);
  const bottleneck = classifyBottleneck(diagnostics);

  const insight = [
    formatHeadline(input, diagnostics),
    formatEngagement(diagnostics),
    formatBottleneckLine(bottleneck),
  ].join(" ");

  return {
    insight,
    suggestions: suggestionsFor(input),
    diagnostics,
    timestamp: utcTimestamp(now),
  };
}
