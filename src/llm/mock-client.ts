import { LlmError, type CompletionRequest, type TextCompletionClient } from "./types.js";

// ---------------------------------------------------------------------------
// Mock Completion Client: for testing
// ---------------------------------------------------------------------------

export class MockCompletionClient implements TextCompletionClient {
  readonly model: string;
  /** Every request received, oldest first */
  readonly requests: CompletionRequest[] = [];
  /** When true, complete() rejects with LlmError */
  shouldFail = false;
  private response: string;

  constructor(response = "Mock insight.", model = "mock-model") {
    this.response = response;
    this.model = model;
  }

  setResponse(response: string): void {
    this.response = response;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    if (this.shouldFail) {
      throw new LlmError("Mock completion failure");
    }
    return this.response;
  }
}
