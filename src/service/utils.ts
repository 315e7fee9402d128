// ---------------------------------------------------------------------------
// Shared result helpers for the service layer
// ---------------------------------------------------------------------------

import type { ExecuteResult, FailureStep } from "./types.js";

export function okResult(summary: string, data: unknown, start: number): ExecuteResult {
  return {
    success: true,
    summary,
    partialFailures: [],
    durationMs: Date.now() - start,
    data,
  };
}

export function failResult(
  summary: string,
  step: FailureStep,
  error: string,
  start: number = Date.now()
): ExecuteResult {
  return {
    success: false,
    summary,
    partialFailures: [{ step, error }],
    durationMs: Date.now() - start,
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
