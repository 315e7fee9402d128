// ---------------------------------------------------------------------------
// InsightsService: action dispatcher
// ---------------------------------------------------------------------------
// Validates parameters, routes actions to handlers and wraps every outcome in
// an ExecuteResult. execute() never throws.
// ---------------------------------------------------------------------------

import type { z } from "zod";
import type { ActionType, ExecuteResult, ServiceManifest } from "./types.js";
import type { TextCompletionClient } from "../llm/types.js";
import { logger as defaultLogger, type Logger } from "../lib/logger.js";
import { INSIGHTS_MANIFEST } from "./manifest.js";
import {
  adPayloadSchema,
  categorizeProductSchema,
  extractLanguagesSchema,
  formatIssues,
  getPromptSchema,
  llmAdPayloadSchema,
  toAdMetrics,
} from "./validation.js";
import { errorMessage, failResult } from "./utils.js";

// Action handlers
import { executeGenerateInsight } from "./actions/generate-insight.js";
import { executeGenerateLlmInsight } from "./actions/generate-llm-insight.js";
import { executeExtractLanguages } from "./actions/extract-languages.js";
import { executeCategorizeProduct } from "./actions/categorize-product.js";
import { executeGetPrompt } from "./actions/get-prompt.js";

export interface InsightsServiceOptions {
  /** Completion client for insights.ad.generate-llm; the action fails without one */
  llm?: TextCompletionClient;
  logger?: Logger;
  /** Clock for result timestamps */
  now?: () => Date;
}

function validationFailure(error: z.ZodError): ExecuteResult {
  const detail = formatIssues(error);
  return failResult(`Validation failed: ${detail}`, "validation", detail);
}

export class InsightsService {
  readonly manifest: ServiceManifest = INSIGHTS_MANIFEST;

  private readonly llm?: TextCompletionClient;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: InsightsServiceOptions = {}) {
    this.llm = options.llm;
    this.log = options.logger ?? defaultLogger.child("service");
    this.now = options.now ?? (() => new Date());
  }

  /** Whether insights.ad.generate-llm can run */
  get llmEnabled(): boolean {
    return this.llm !== undefined;
  }

  async execute(actionType: ActionType, parameters: unknown): Promise<ExecuteResult> {
    try {
      return await this.dispatchAction(actionType, parameters);
    } catch (err) {
      this.log.error("Action failed", err, { actionType });
      return failResult(
        `Failed to execute ${actionType}: ${errorMessage(err)}`,
        "execute",
        errorMessage(err)
      );
    }
  }

  private async dispatchAction(
    actionType: ActionType,
    parameters: unknown
  ): Promise<ExecuteResult> {
    switch (actionType) {
      case "insights.ad.generate": {
        const parsed = adPayloadSchema.safeParse(parameters);
        if (!parsed.success) return validationFailure(parsed.error);
        return executeGenerateInsight(toAdMetrics(parsed.data), this.log, this.now());
      }

      case "insights.ad.generate-llm": {
        const parsed = llmAdPayloadSchema.safeParse(parameters);
        if (!parsed.success) return validationFailure(parsed.error);
        return executeGenerateLlmInsight(
          toAdMetrics(parsed.data),
          { temperature: parsed.data.temperature },
          this.llm,
          this.log,
          this.now
        );
      }

      case "insights.video.extract-languages": {
        const parsed = extractLanguagesSchema.safeParse(parameters);
        if (!parsed.success) return validationFailure(parsed.error);
        return executeExtractLanguages(parsed.data, this.log);
      }

      case "insights.product.categorize": {
        const parsed = categorizeProductSchema.safeParse(parameters);
        if (!parsed.success) return validationFailure(parsed.error);
        return executeCategorizeProduct(parsed.data, this.log);
      }

      case "insights.prompt.get": {
        const parsed = getPromptSchema.safeParse(parameters);
        if (!parsed.success) return validationFailure(parsed.error);
        return executeGetPrompt(parsed.data);
      }

      default: {
        const _exhaustive: never = actionType;
        return failResult(
          `Unknown action type: ${String(_exhaustive)}`,
          "dispatch",
          "Unknown action type"
        );
      }
    }
  }
}
