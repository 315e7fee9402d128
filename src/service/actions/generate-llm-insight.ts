// ---------------------------------------------------------------------------
// Action: insights.ad.generate-llm
// ---------------------------------------------------------------------------
// Same diagnostics and suggestions as insights.ad.generate, but the narrative
// comes from the LLM collaborator. One attempt; a failure is reported with a
// generic summary and no partial result.
// ---------------------------------------------------------------------------

import type { AdMetrics, LlmInsightResult } from "../../core/types.js";
import type { Logger } from "../../lib/logger.js";
import type { TextCompletionClient } from "../../llm/types.js";
import type { ExecuteResult, GenerateLlmInsightOptions } from "../types.js";
import { buildDiagnostics } from "../../core/analysis/diagnostics.js";
import { classifyBottleneck } from "../../core/analysis/bottleneck.js";
import { suggestionsFor, utcTimestamp } from "../../core/analysis/narrative.js";
import { AD_INSIGHT_SYSTEM_PROMPT, renderAdInsightPrompt } from "../../prompts/index.js";
import { errorMessage, failResult, okResult } from "../utils.js";

export const LLM_FAILURE_SUMMARY = "Failed to generate insights";

export async function executeGenerateLlmInsight(
  input: AdMetrics,
  options: GenerateLlmInsightOptions,
  llm: TextCompletionClient | undefined,
  log: Logger,
  now: () => Date
): Promise<ExecuteResult> {
  const start = Date.now();

  if (!llm) {
    return failResult(
      "LLM insight generation is not configured",
      "llm",
      "No completion client configured (set OPENAI_API_KEY)",
      start
    );
  }

  const diagnostics = buildDiagnostics(input);
  const bottleneck = classifyBottleneck(diagnostics);

  let insight: string;
  try {
    insight = await llm.complete({
      system: AD_INSIGHT_SYSTEM_PROMPT,
      user: renderAdInsightPrompt(input, diagnostics, bottleneck),
      temperature: options.temperature,
    });
  } catch (err) {
    log.error("LLM insight generation failed", err, {
      adName: input.name,
      model: llm.model,
    });
    return failResult(LLM_FAILURE_SUMMARY, "llm", errorMessage(err), start);
  }

  const data: LlmInsightResult = {
    insight,
    suggestions: suggestionsFor(input),
    diagnostics,
    timestamp: utcTimestamp(now()),
    model: llm.model,
    bottleneck,
  };

  log.info("Generated LLM insight", {
    adName: input.name,
    model: llm.model,
    roas: diagnostics.roas,
    spend: diagnostics.spend,
  });

  return okResult(
    `Generated LLM insight for "${input.name}" with ${llm.model}.`,
    data,
    start
  );
}
