import type { AdMetrics, DiagnosticRecord } from "../core/types.js";

// ---------------------------------------------------------------------------
// Ad Insight Prompt
// ---------------------------------------------------------------------------
// System and user messages for the LLM-written variant of the ad insight.
// The rule-engine bottleneck is passed in so the model starts from the same
// diagnosis the deterministic narrative would give.
// ---------------------------------------------------------------------------

export const AD_INSIGHT_SYSTEM_PROMPT = `You are a senior performance marketer for a premium Indian perfume brand.
You read paid-social ad metrics and write short, specific diagnoses for the media buying team.
Currency is Indian rupees (₹). Percentages are already expressed as percent values.
Be concrete: name the metric, its value, and the single most useful next test.`;

export function renderAdInsightPrompt(
  input: Pick<AdMetrics, "name" | "product" | "platform">,
  diag: DiagnosticRecord,
  bottleneck: string
): string {
  return `Analyze this perfume ad and write the insight in three parts:
1. A bold headline sentence with ad name, product, platform, ROAS, spend and revenue.
2. One engagement sentence covering CTR, CPC, hook rate, hold rate and completion rate.
3. A line starting with "**Primary Bottleneck:**" naming the weakest funnel stage and what to test next.

Ad: ${input.name}
Product: ${input.product || "Not specified"}
Platform: ${input.platform || "Not specified"}

Metrics:
- Spend: ₹${diag.spend.toFixed(2)}
- Revenue: ₹${diag.revenue.toFixed(2)}
- ROAS: ${diag.roas.toFixed(2)}x
- Impressions: ${diag.impressions}
- Clicks: ${diag.clicks}
- Purchases: ${diag.purchases}
- CTR: ${diag.ctr_pct.toFixed(2)}%
- CPC: ₹${diag.cpc.toFixed(2)}
- Hook rate: ${diag.hook_rate_pct.toFixed(2)}%
- Hold rate: ${diag.hold_rate_pct.toFixed(2)}%
- Completion rate: ${diag.completion_rate_pct.toFixed(2)}%

Rule-based diagnosis: ${bottleneck}

Reply with the insight text only, no preamble.`;
}
