// ---------------------------------------------------------------------------
// Ad metrics: normalized input to the insight engine
// ---------------------------------------------------------------------------

/** Raw performance numbers for a single ad, already validated at the boundary */
export interface AdMetrics {
  /** Ad name; also seeds the suggestion picker */
  name: string;
  product?: string;
  platform?: string;
  spend: number;
  revenue: number;
  /** Pre-supplied ROAS. Derived from revenue / spend when absent. */
  roas?: number;
  /** Click-through rate, percent (0-100) */
  ctr: number;
  cpc: number;
  /** Percent of viewers engaging past the opening of a video ad */
  hookRate: number;
  /** Percent of viewers retained partway through */
  holdRate: number;
  /** Percent of viewers watching to the end */
  completionRate: number;
  impressions?: number;
  clicks?: number;
  purchases?: number;
  extra?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Diagnostic record: the canonical, rounded view of an ad's metrics
// ---------------------------------------------------------------------------

export interface DiagnosticRecord {
  readonly spend: number;
  readonly revenue: number;
  readonly roas: number;
  readonly impressions: number;
  readonly clicks: number;
  readonly purchases: number;
  readonly ctr_pct: number;
  readonly cpc: number;
  readonly hook_rate_pct: number;
  readonly hold_rate_pct: number;
  readonly completion_rate_pct: number;
}

// ---------------------------------------------------------------------------
// Bottleneck classification
// ---------------------------------------------------------------------------

export type BottleneckId =
  | "retention"
  | "hook"
  | "conversion"
  | "traffic"
  | "moderate"
  | "strong";

export interface BottleneckRule {
  id: BottleneckId;
  /** Short heading, e.g. "Weak initial hook" */
  label: string;
  /** Full narrative with the embedded recommendation */
  message: string;
  /** Returns true when this rule applies. Rules are evaluated in order. */
  matches: (diag: DiagnosticRecord) => boolean;
}

// ---------------------------------------------------------------------------
// Insight output
// ---------------------------------------------------------------------------

export interface InsightResult {
  insight: string;
  suggestions: string[];
  diagnostics: DiagnosticRecord;
  /** UTC ISO-8601, "Z" suffix */
  timestamp: string;
}

export interface LlmInsightResult extends InsightResult {
  /** Model id reported by the completion client */
  model: string;
  /** Rule-engine bottleneck, kept alongside the model's narrative */
  bottleneck: string;
}

// ---------------------------------------------------------------------------
// Video analysis and product categorization
// ---------------------------------------------------------------------------

/** Subset of an LLM video content analysis this service reads */
export interface VideoContentAnalysis {
  speech_spoken?: unknown;
  written_text_on_screen?: unknown;
  [key: string]: unknown;
}

export interface LanguageExtraction {
  spoken_language: string;
  written_language: string;
}

export interface ProductMappingEntry {
  product_name?: string;
  category?: string;
  subcategory?: string;
  [key: string]: string | undefined;
}

export interface ProductCategorization {
  new_product_name: string;
  category: string;
  subcategory: string;
  reasoning: string;
}
