// ---------------------------------------------------------------------------
// Insights Service: Contract Types
// ---------------------------------------------------------------------------

import type { PromptKind } from "../prompts/index.js";
import type { ProductMappingEntry, VideoContentAnalysis } from "../core/types.js";

// ---------------------------------------------------------------------------
// Manifest types
// ---------------------------------------------------------------------------

export interface ActionDefinition {
  /** Fully qualified action ID (e.g. "insights.ad.generate") */
  id: ActionType;
  /** Human-readable description of what this action does */
  description: string;
  /** JSON Schema for the action's parameters (wire field names) */
  parameters: Record<string, unknown>;
  /** Whether the action calls the LLM collaborator */
  usesLlm: boolean;
}

export interface ServiceManifest {
  id: string;
  version: string;
  description: string;
  actions: ActionDefinition[];
}

// ---------------------------------------------------------------------------
// Execution types
// ---------------------------------------------------------------------------

/** Where a failed action stopped */
export type FailureStep = "validation" | "llm" | "execute" | "dispatch";

export interface PartialFailure {
  step: FailureStep;
  error: string;
}

export interface ExecuteResult {
  success: boolean;
  /** Human-readable summary of what happened */
  summary: string;
  /** Failures, if any step failed */
  partialFailures: PartialFailure[];
  /** Execution duration in milliseconds */
  durationMs: number;
  /** The actual result data */
  data?: unknown;
}

// ---------------------------------------------------------------------------
// Action parameter types (after validation)
// ---------------------------------------------------------------------------

export interface GenerateLlmInsightOptions {
  temperature?: number;
}

export interface ExtractLanguagesParams {
  video_content_analysis: VideoContentAnalysis;
}

export interface CategorizeProductParams {
  product_mapping: ProductMappingEntry[];
  new_product_name: string;
}

export interface GetPromptParams {
  kind: PromptKind;
}

export type ActionType =
  | "insights.ad.generate"
  | "insights.ad.generate-llm"
  | "insights.video.extract-languages"
  | "insights.product.categorize"
  | "insights.prompt.get";

// ---------------------------------------------------------------------------
// Manifest validation
// ---------------------------------------------------------------------------

export interface ManifestValidationError {
  field: string;
  message: string;
}

export function validateManifest(
  manifest: ServiceManifest
): ManifestValidationError[] {
  const errors: ManifestValidationError[] = [];

  if (!manifest.id) {
    errors.push({ field: "id", message: "id is required" });
  }
  if (!manifest.version) {
    errors.push({ field: "version", message: "version is required" });
  }
  if (!manifest.description) {
    errors.push({ field: "description", message: "description is required" });
  }
  if (manifest.actions.length === 0) {
    errors.push({ field: "actions", message: "actions must be a non-empty array" });
  }

  const ids = new Set<string>();
  for (const action of manifest.actions) {
    if (ids.has(action.id)) {
      errors.push({ field: "actions", message: `duplicate action id: ${action.id}` });
    }
    ids.add(action.id);

    if (!action.description) {
      errors.push({
        field: `actions[${action.id}]`,
        message: "action must have a description",
      });
    }
  }

  return errors;
}
