import type { LanguageExtraction, VideoContentAnalysis } from "../core/types.js";
import { logger as defaultLogger, type Logger } from "../lib/logger.js";

// ---------------------------------------------------------------------------
// Language Extractor
// ---------------------------------------------------------------------------
// Reads the dominant spoken and on-screen language from an LLM video content
// analysis. Language lists arrive pre-sorted ("Hindi: 70%", "English: 30%"),
// so the first entry is taken as-is.
// ---------------------------------------------------------------------------

export const NOT_AVAILABLE = "NA";

/** Substring of the "no speech" sentinel the video analysis prompt mandates */
export const NO_SPEECH_MARKER = "No discernible";
/** Substring of the "no on-screen text" sentinel */
export const NO_TEXT_MARKER = "No significant";

/** "Hindi: 70% (Confidence: High)" → "Hindi" */
export function languageName(entry: string): string {
  return entry.split(":")[0].trim();
}

function dominantLanguage(field: unknown, sentinelMarker: string): string {
  if (Array.isArray(field)) {
    if (field.length === 0) return NOT_AVAILABLE;
    const first: unknown = field[0];
    if (typeof first !== "string") {
      throw new TypeError(`Expected a language entry string, got ${typeof first}`);
    }
    return languageName(first);
  }
  if (typeof field === "string" && !field.includes(sentinelMarker)) {
    return field;
  }
  return NOT_AVAILABLE;
}

export function extractLanguages(
  analysis: VideoContentAnalysis,
  log: Logger = defaultLogger
): LanguageExtraction {
  try {
    return {
      spoken_language: dominantLanguage(analysis.speech_spoken, NO_SPEECH_MARKER),
      written_language: dominantLanguage(analysis.written_text_on_screen, NO_TEXT_MARKER),
    };
  } catch (err) {
    log.error("Language extraction error", err);
    return { spoken_language: NOT_AVAILABLE, written_language: NOT_AVAILABLE };
  }
}
