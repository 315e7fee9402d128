import { SeededRandom, seedFromText } from "./seeded-random.js";

// ---------------------------------------------------------------------------
// Suggestion Selector
// ---------------------------------------------------------------------------
// Picks a stable, name-dependent subset of a suggestion catalog. The same ad
// name always yields the same suggestions in the same order.
// ---------------------------------------------------------------------------

export const DEFAULT_SUGGESTION_COUNT = 5;

/** Shuffle a copy of the catalog with the given seed and keep the first k */
export function pickDeterministic(
  seed: bigint,
  options: readonly string[],
  k: number
): string[] {
  const shuffled = new SeededRandom(seed).shuffle(options);
  return shuffled.slice(0, Math.max(0, Math.min(k, shuffled.length)));
}

export function selectSuggestions(
  adName: string,
  catalog: readonly string[],
  k: number = DEFAULT_SUGGESTION_COUNT
): string[] {
  return pickDeterministic(seedFromText(adName), catalog, k);
}

export interface SuggestionContext {
  product?: string;
  platform?: string;
}

/**
 * Append a "[Context: ...]" note to the first suggestion naming the product
 * and platform that are present. Returns a new array.
 */
export function annotateWithContext(
  suggestions: readonly string[],
  context: SuggestionContext
): string[] {
  const out = suggestions.slice();
  const parts: string[] = [];
  if (context.product) parts.push(`Product: ${context.product}`);
  if (context.platform) parts.push(`Platform: ${context.platform}`);

  if (parts.length > 0 && out.length > 0) {
    out[0] = `${out[0]} [Context: ${parts.join(", ")}]`;
  }
  return out;
}
