import {
  VIDEO_CONTENT_ANALYSIS_PROMPT,
  INFLUENCER_VIDEO_ANALYSIS_PROMPT,
  LANGUAGE_EXTRACTION_PROMPT,
  PRODUCT_CATEGORIZATION_PROMPT,
} from "./content-analysis.js";

export {
  VIDEO_CONTENT_ANALYSIS_PROMPT,
  INFLUENCER_VIDEO_ANALYSIS_PROMPT,
  LANGUAGE_EXTRACTION_PROMPT,
  PRODUCT_CATEGORIZATION_PROMPT,
};
export { AD_INSIGHT_SYSTEM_PROMPT, renderAdInsightPrompt } from "./ad-insight.js";

export const PROMPT_KINDS = ["video", "influencer", "language", "product"] as const;

export type PromptKind = (typeof PROMPT_KINDS)[number];

export interface PromptDescriptor {
  prompt: string;
  usage: string;
  expected_output: string;
}

export const PROMPTS: Record<PromptKind, PromptDescriptor> = {
  video: {
    prompt: VIDEO_CONTENT_ANALYSIS_PROMPT,
    usage: "Send this prompt with your video to a multimodal LLM API",
    expected_output: "JSON with video_content_analysis structure",
  },
  influencer: {
    prompt: INFLUENCER_VIDEO_ANALYSIS_PROMPT,
    usage: "Send this prompt with an influencer video to extract marketing metrics",
    expected_output: "JSON with influencer metadata",
  },
  language: {
    prompt: LANGUAGE_EXTRACTION_PROMPT,
    usage: "Send this prompt with a video_content_analysis object",
    expected_output: "JSON with spoken_language and written_language",
  },
  product: {
    prompt: PRODUCT_CATEGORIZATION_PROMPT,
    usage: "Send this prompt with the product mapping and the new product name",
    expected_output: "JSON with category, subcategory and reasoning",
  },
};
