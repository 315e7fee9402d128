// ---------------------------------------------------------------------------
// perfume-ad-insights: ad diagnostics and insight engine for perfume marketing
// ---------------------------------------------------------------------------

// Core types
export type {
  AdMetrics,
  DiagnosticRecord,
  BottleneckId,
  BottleneckRule,
  InsightResult,
  LlmInsightResult,
  VideoContentAnalysis,
  LanguageExtraction,
  ProductMappingEntry,
  ProductCategorization,
} from "./core/types.js";

// Insight engine
export { buildDiagnostics, resolveRoas, round2, toNumber } from "./core/analysis/diagnostics.js";
export {
  BOTTLENECK_RULES,
  classifyBottleneck,
  identifyBottleneck,
} from "./core/analysis/bottleneck.js";
export { SeededRandom, seedFromText } from "./core/analysis/seeded-random.js";
export {
  selectSuggestions,
  pickDeterministic,
  annotateWithContext,
  DEFAULT_SUGGESTION_COUNT,
} from "./core/analysis/suggestions.js";
export type { SuggestionContext } from "./core/analysis/suggestions.js";
export {
  buildInsight,
  formatHeadline,
  formatEngagement,
  formatBottleneckLine,
  suggestionsFor,
} from "./core/analysis/narrative.js";

// Verticals: perfume
export { PERFUME_SUGGESTIONS } from "./verticals/perfume/suggestions.js";
export { categorizeProduct, categorizeByKeywords } from "./verticals/perfume/categorizer.js";

// Content analysis
export { extractLanguages, NOT_AVAILABLE } from "./content/languages.js";

// Prompts
export {
  PROMPTS,
  PROMPT_KINDS,
  VIDEO_CONTENT_ANALYSIS_PROMPT,
  INFLUENCER_VIDEO_ANALYSIS_PROMPT,
  LANGUAGE_EXTRACTION_PROMPT,
  PRODUCT_CATEGORIZATION_PROMPT,
  AD_INSIGHT_SYSTEM_PROMPT,
  renderAdInsightPrompt,
} from "./prompts/index.js";
export type { PromptKind, PromptDescriptor } from "./prompts/index.js";

// LLM collaborator
export type { TextCompletionClient, CompletionRequest } from "./llm/types.js";
export { LlmError } from "./llm/types.js";
export { OpenAICompletionClient } from "./llm/openai-client.js";
export type { OpenAICompletionConfig } from "./llm/openai-client.js";
export { MockCompletionClient } from "./llm/mock-client.js";

// Config
export type { ServiceConfig, LlmConfig, RawEnv } from "./config/types.js";
export { loadConfig, buildConfig, ConfigError } from "./config/loader.js";

// Logging
export { createLogger, logger } from "./lib/logger.js";
export type { Logger, LogLevel, LogSink } from "./lib/logger.js";

// Service
export { InsightsService } from "./service/index.js";
export type { InsightsServiceOptions } from "./service/index.js";
export { createInsightsService } from "./service/bootstrap.js";
export type { BootstrapOptions } from "./service/bootstrap.js";
export { INSIGHTS_MANIFEST } from "./service/manifest.js";
export { validateManifest } from "./service/types.js";
export type {
  ActionType,
  ActionDefinition,
  ServiceManifest,
  ExecuteResult,
  PartialFailure,
} from "./service/types.js";

// HTTP
export { createApp, ROUTES } from "./server/app.js";
export { toHttpResponse } from "./server/http.js";
