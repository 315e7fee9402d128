// ---------------------------------------------------------------------------
// ExecuteResult → HTTP response mapping
// ---------------------------------------------------------------------------

import type { ExecuteResult } from "../service/types.js";

export interface HttpResponse {
  status: number;
  body: unknown;
}

/**
 * 200 with the action's data on success, 400 for validation failures,
 * 500 with the result summary for everything else.
 */
export function toHttpResponse(result: ExecuteResult): HttpResponse {
  if (result.success) {
    return { status: 200, body: result.data ?? {} };
  }

  const validation = result.partialFailures.find((f) => f.step === "validation");
  if (validation) {
    return {
      status: 400,
      body: { detail: `Invalid request payload: ${validation.error}` },
    };
  }

  return { status: 500, body: { detail: result.summary } };
}
