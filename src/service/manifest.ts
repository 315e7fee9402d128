// ---------------------------------------------------------------------------
// Insights Service Manifest
// ---------------------------------------------------------------------------
// Declares the actions the service dispatches, with their wire parameters.
// ---------------------------------------------------------------------------

import type { ServiceManifest } from "./types.js";

const AD_METRICS_PARAMETERS = {
  type: "object",
  required: ["ad_name"],
  properties: {
    ad_name: { type: "string", minLength: 1, maxLength: 200, description: 'Ad name ("name" is accepted too)' },
    product: { type: "string", maxLength: 100 },
    platform: { type: "string", maxLength: 50 },
    spend: { type: "number", minimum: 0, default: 0 },
    revenue: { type: "number", minimum: 0, default: 0 },
    roas: { type: "number", minimum: 0, description: "Derived from revenue / spend when omitted" },
    ctr: { type: "number", minimum: 0, maximum: 100, default: 0 },
    cpc: { type: "number", minimum: 0, default: 0 },
    hook_rate: { type: "number", minimum: 0, maximum: 100, default: 0 },
    hold_rate: { type: "number", minimum: 0, maximum: 100, default: 0 },
    completion_rate: { type: "number", minimum: 0, maximum: 100, default: 0 },
    impressions: { type: "number", minimum: 0, description: "Truncated to an integer" },
    clicks: { type: "number", minimum: 0, description: "Truncated to an integer" },
    purchases: { type: "number", minimum: 0, description: "Truncated to an integer" },
    extra: { type: "object" },
  },
};

export const INSIGHTS_MANIFEST: ServiceManifest = {
  id: "perfume-ad-insights",
  version: "3.0.0",
  description:
    "Ad performance insights and video/influencer content analysis for perfume marketing.",
  actions: [
    {
      id: "insights.ad.generate",
      description:
        "Build diagnostics for one ad, classify its primary bottleneck and return a templated insight with five seeded suggestions.",
      parameters: AD_METRICS_PARAMETERS,
      usesLlm: false,
    },
    {
      id: "insights.ad.generate-llm",
      description:
        "Same diagnostics and suggestions as insights.ad.generate, with the insight narrative written by the LLM.",
      parameters: {
        ...AD_METRICS_PARAMETERS,
        properties: {
          ...AD_METRICS_PARAMETERS.properties,
          temperature: { type: "number", minimum: 0, maximum: 2 },
        },
      },
      usesLlm: true,
    },
    {
      id: "insights.video.extract-languages",
      description:
        "Extract the dominant spoken and on-screen language from a video content analysis.",
      parameters: {
        type: "object",
        required: ["video_content_analysis"],
        properties: {
          video_content_analysis: { type: "object" },
        },
      },
      usesLlm: false,
    },
    {
      id: "insights.product.categorize",
      description:
        "Assign a catalog category and subcategory to a new product name.",
      parameters: {
        type: "object",
        required: ["new_product_name"],
        properties: {
          product_mapping: { type: "array", items: { type: "object" } },
          new_product_name: { type: "string", minLength: 1, maxLength: 200 },
        },
      },
      usesLlm: false,
    },
    {
      id: "insights.prompt.get",
      description: "Return one of the content analysis prompt templates.",
      parameters: {
        type: "object",
        required: ["kind"],
        properties: {
          kind: { type: "string", enum: ["video", "influencer", "language", "product"] },
        },
      },
      usesLlm: false,
    },
  ],
};
