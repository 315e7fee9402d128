import OpenAI from "openai";
import { LlmError, type CompletionRequest, type TextCompletionClient } from "./types.js";

// ---------------------------------------------------------------------------
// OpenAI Completion Client
// ---------------------------------------------------------------------------

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_TEMPERATURE = 0.7;

export interface OpenAICompletionConfig {
  apiKey: string;
  model?: string;
  /** Per-request timeout (default: 30 s) */
  timeoutMs?: number;
  /** Used when a request does not set its own temperature */
  temperature?: number;
  /** Override for proxies and compatible gateways */
  baseURL?: string;
}

export class OpenAICompletionClient implements TextCompletionClient {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly temperature: number;

  constructor(config: OpenAICompletionConfig) {
    if (!config.apiKey) {
      throw new LlmError("OpenAI API key is required");
    }
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      // One attempt only; the caller turns a failure into an error response
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        temperature: request.temperature ?? this.temperature,
      });
      content = response.choices[0]?.message?.content;
    } catch (err) {
      if (err instanceof OpenAI.APIConnectionTimeoutError) {
        throw new LlmError("LLM request timed out", { cause: err });
      }
      if (err instanceof OpenAI.APIError) {
        throw new LlmError(`LLM request failed with status ${err.status ?? "unknown"}`, {
          cause: err,
        });
      }
      throw new LlmError("LLM request failed", { cause: err });
    }

    const text = content?.trim();
    if (!text) {
      throw new LlmError("LLM returned an empty completion");
    }
    return text;
  }
}
