// ---------------------------------------------------------------------------
// LLM Text Completion: narrow collaborator contract
// ---------------------------------------------------------------------------
// The insight service only needs "system + user text in, text out". Anything
// else (retries, streaming, tool calls) stays out of this interface.
// ---------------------------------------------------------------------------

export interface CompletionRequest {
  /** System role text */
  system: string;
  /** User role text */
  user: string;
  temperature?: number;
}

export interface TextCompletionClient {
  /** Model id the client sends requests to */
  readonly model: string;

  /** Single blocking attempt. Rejects with LlmError on any failure. */
  complete(request: CompletionRequest): Promise<string>;
}

export class LlmError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LlmError";
  }
}
