// ---------------------------------------------------------------------------
// Bootstrap: createInsightsService() factory
// ---------------------------------------------------------------------------
// Wires configuration into a ready service: logger at the configured level
// and, when an API key is present, the OpenAI completion client.
// ---------------------------------------------------------------------------

import { InsightsService } from "./index.js";
import { OpenAICompletionClient } from "../llm/openai-client.js";
import { createLogger, type Logger } from "../lib/logger.js";
import type { TextCompletionClient } from "../llm/types.js";
import type { ServiceConfig } from "../config/types.js";

export interface BootstrapOptions {
  /** Use this client instead of building one from config (tests, other vendors) */
  llm?: TextCompletionClient;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Create a configured InsightsService.
 *
 * Usage:
 * ```ts
 * const service = createInsightsService(loadConfig());
 * const result = await service.execute("insights.ad.generate", {
 *   ad_name: "Diwali Push",
 *   spend: 1000,
 *   revenue: 2500,
 * });
 * ```
 */
export function createInsightsService(
  config: ServiceConfig,
  options: BootstrapOptions = {}
): InsightsService {
  const log = options.logger ?? createLogger({ level: config.logLevel, scope: "service" });

  let llm = options.llm;
  if (!llm && config.llm.apiKey) {
    llm = new OpenAICompletionClient({
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
      temperature: config.llm.temperature,
    });
  }
  if (!llm) {
    log.warn("OPENAI_API_KEY not set; LLM insights are disabled");
  }

  return new InsightsService({ llm, logger: log, now: options.now });
}
