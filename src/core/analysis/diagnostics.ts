import type { AdMetrics, DiagnosticRecord } from "../types.js";

// ---------------------------------------------------------------------------
// Diagnostics Builder
// ---------------------------------------------------------------------------
// Normalizes raw ad metrics into the canonical diagnostic record consumed by
// the bottleneck classifier and the narrative assembler. Missing or
// non-numeric values coerce to 0 instead of failing.
// ---------------------------------------------------------------------------

/** Coerce to a finite number, or 0 */
export function toNumber(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/** Round to 2 decimal places. Non-numeric input yields 0. */
export function round2(value: unknown): number {
  const n = toNumber(value);
  return Math.round((n + Math.sign(n) * Number.EPSILON) * 100) / 100;
}

/**
 * ROAS as supplied, or revenue / spend rounded to 2 decimals.
 * Zero spend with no supplied ROAS gives 0.
 */
export function resolveRoas(
  spend: number,
  revenue: number,
  roas?: number | null
): number {
  if (roas !== undefined && roas !== null) return roas;
  if (spend > 0) return round2(revenue / spend);
  return 0;
}

export function buildDiagnostics(input: AdMetrics): DiagnosticRecord {
  const spend = toNumber(input.spend);
  const revenue = toNumber(input.revenue);

  return {
    spend: round2(spend),
    revenue: round2(revenue),
    roas: round2(resolveRoas(spend, revenue, input.roas)),
    impressions: Math.trunc(toNumber(input.impressions)),
    clicks: Math.trunc(toNumber(input.clicks)),
    purchases: Math.trunc(toNumber(input.purchases)),
    ctr_pct: round2(input.ctr),
    cpc: round2(input.cpc),
    hook_rate_pct: round2(input.hookRate),
    hold_rate_pct: round2(input.holdRate),
    completion_rate_pct: round2(input.completionRate),
  };
}
