import { z } from "zod";
import type { AdMetrics } from "../core/types.js";
import { PROMPT_KINDS } from "../prompts/index.js";

// ---------------------------------------------------------------------------
// Parameter validation
// ---------------------------------------------------------------------------
// Wire payloads use snake_case field names. Numeric strings are accepted and
// missing metrics default to 0, matching what upstream ad exports send.
// ---------------------------------------------------------------------------

export const LIMITS = {
  AD_NAME_MAX_LENGTH: 200,
  PRODUCT_MAX_LENGTH: 100,
  PLATFORM_MAX_LENGTH: 50,
  PRODUCT_NAME_MAX_LENGTH: 200,
  PERCENTAGE_MAX: 100,
  TEMPERATURE_MAX: 2,
} as const;

const nonNegative = z.coerce.number().min(0);
const percentage = z.coerce.number().min(0).max(LIMITS.PERCENTAGE_MAX);
// Fractional counts are truncated, not rejected
const count = z.coerce.number().min(0).transform(Math.trunc);
// Kept verbatim: the raw name seeds the suggestion picker
const adName = z
  .string()
  .max(LIMITS.AD_NAME_MAX_LENGTH)
  .refine((s) => s.trim().length > 0, { message: "ad_name must not be blank" });

const adPayloadObject = z.object({
  ad_name: adName.optional(),
  name: adName.optional(),
  product: z.string().max(LIMITS.PRODUCT_MAX_LENGTH).nullish(),
  platform: z.string().max(LIMITS.PLATFORM_MAX_LENGTH).nullish(),
  spend: nonNegative.default(0),
  revenue: nonNegative.default(0),
  roas: nonNegative.nullish(),
  ctr: percentage.default(0),
  cpc: nonNegative.default(0),
  hook_rate: percentage.default(0),
  hold_rate: percentage.default(0),
  completion_rate: percentage.default(0),
  impressions: count.nullish(),
  clicks: count.nullish(),
  purchases: count.nullish(),
  extra: z.record(z.unknown()).nullish(),
});

const requireAdName = <T extends { ad_name?: string; name?: string }>(p: T) =>
  p.ad_name !== undefined || p.name !== undefined;

const adNameRequired = { message: "ad_name is required", path: ["ad_name"] };

export const adPayloadSchema = adPayloadObject.refine(requireAdName, adNameRequired);

export const llmAdPayloadSchema = adPayloadObject
  .extend({
    temperature: z.number().min(0).max(LIMITS.TEMPERATURE_MAX).optional(),
  })
  .refine(requireAdName, adNameRequired);

export type AdPayload = z.infer<typeof adPayloadSchema>;

export const extractLanguagesSchema = z.object({
  video_content_analysis: z.record(z.unknown()),
});

export const categorizeProductSchema = z.object({
  product_mapping: z.array(z.record(z.string())).default([]),
  new_product_name: z.string().trim().min(1).max(LIMITS.PRODUCT_NAME_MAX_LENGTH),
});

export const getPromptSchema = z.object({
  kind: z.enum(PROMPT_KINDS),
});

/** Wire payload → AdMetrics. `ad_name` wins over `name`. */
export function toAdMetrics(payload: AdPayload): AdMetrics {
  return {
    name: payload.ad_name ?? payload.name ?? "",
    product: payload.product ?? undefined,
    platform: payload.platform ?? undefined,
    spend: payload.spend,
    revenue: payload.revenue,
    roas: payload.roas ?? undefined,
    ctr: payload.ctr,
    cpc: payload.cpc,
    hookRate: payload.hook_rate,
    holdRate: payload.hold_rate,
    completionRate: payload.completion_rate,
    impressions: payload.impressions ?? undefined,
    clicks: payload.clicks ?? undefined,
    purchases: payload.purchases ?? undefined,
    extra: payload.extra ?? undefined,
  };
}

/** "spend: Number must be greater than or equal to 0; ad_name: ad_name is required" */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
