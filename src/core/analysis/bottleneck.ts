import type { BottleneckRule, DiagnosticRecord } from "../types.js";

// ---------------------------------------------------------------------------
// Bottleneck Classifier
// ---------------------------------------------------------------------------
// Ordered decision list over the diagnostic record. Rules overlap, so the
// first match wins: a retention problem is reported before a weak hook even
// when both conditions hold.
// ---------------------------------------------------------------------------

export const HOLD_RATE_FLOOR = 6.0;
export const COMPLETION_RATE_FLOOR = 5.0;
export const HOOK_RATE_FLOOR = 50.0;
export const CTR_FLOOR = 0.5;
export const BREAK_EVEN_ROAS = 1.0;
export const HEALTHY_ROAS = 2.5;
/** Minimum clicks before a low ROAS is blamed on conversion */
export const CONVERSION_MIN_CLICKS = 50;

export const BOTTLENECK_RULES: readonly BottleneckRule[] = [
  {
    id: "retention",
    label: "Critical viewer retention issue",
    message:
      "Critical viewer retention issue — very low hold and completion rates indicate viewers drop off quickly before conversion. Prioritize engaging content in the first 5-10 seconds and mid-video storytelling.",
    matches: (d) =>
      d.hold_rate_pct < HOLD_RATE_FLOOR &&
      d.completion_rate_pct < COMPLETION_RATE_FLOOR,
  },
  {
    id: "hook",
    label: "Weak initial hook",
    message:
      "Weak initial hook — low hook rate and CTR suggest the opening frame/first 3 seconds aren't compelling enough. Test stronger visual hooks, clearer value propositions, and improved thumbnails.",
    matches: (d) => d.hook_rate_pct < HOOK_RATE_FLOOR && d.ctr_pct < CTR_FLOOR,
  },
  {
    id: "conversion",
    label: "Conversion bottleneck",
    message:
      "Conversion bottleneck — decent traffic but poor ROAS indicates landing page or offer misalignment. Review product-message fit, landing page load speed, checkout friction, and pricing clarity.",
    matches: (d) => d.roas < BREAK_EVEN_ROAS && d.clicks > CONVERSION_MIN_CLICKS,
  },
  {
    id: "traffic",
    label: "Traffic generation challenge",
    message:
      "Traffic generation challenge — low CTR suggests the ad isn't resonating with the target audience. Test different audience segments, creative formats, and messaging angles.",
    matches: (d) => d.ctr_pct < CTR_FLOOR,
  },
  {
    id: "moderate",
    label: "Moderate performance",
    message:
      "Moderate performance — ROAS is positive but has optimization potential. Focus on incremental improvements: creative iteration, audience refinement, and funnel optimization.",
    matches: (d) => d.roas >= BREAK_EVEN_ROAS && d.roas < HEALTHY_ROAS,
  },
  {
    id: "strong",
    label: "Strong baseline performance",
    message:
      "Strong baseline performance — ad shows healthy metrics across the funnel. Focus on scaling winning elements, testing new creative variations, and exploring expansion audiences.",
    matches: () => true,
  },
];

/** The first rule matching the record. The last rule always matches. */
export function identifyBottleneck(diag: DiagnosticRecord): BottleneckRule {
  const rule = BOTTLENECK_RULES.find((r) => r.matches(diag));
  return rule ?? BOTTLENECK_RULES[BOTTLENECK_RULES.length - 1];
}

export function classifyBottleneck(diag: DiagnosticRecord): string {
  return identifyBottleneck(diag).message;
}
