// ---------------------------------------------------------------------------
// Action: insights.prompt.get
// ---------------------------------------------------------------------------

import type { ExecuteResult, GetPromptParams } from "../types.js";
import { PROMPTS } from "../../prompts/index.js";
import { okResult } from "../utils.js";

export function executeGetPrompt(params: GetPromptParams): ExecuteResult {
  const start = Date.now();
  return okResult(`Prompt for ${params.kind} analysis.`, PROMPTS[params.kind], start);
}
