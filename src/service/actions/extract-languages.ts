// ---------------------------------------------------------------------------
// Action: insights.video.extract-languages
// ---------------------------------------------------------------------------

import type { Logger } from "../../lib/logger.js";
import type { ExecuteResult, ExtractLanguagesParams } from "../types.js";
import { extractLanguages } from "../../content/languages.js";
import { okResult } from "../utils.js";

export function executeExtractLanguages(
  params: ExtractLanguagesParams,
  log: Logger
): ExecuteResult {
  const start = Date.now();
  const result = extractLanguages(params.video_content_analysis, log);

  log.info("Extracted languages", {
    spoken: result.spoken_language,
    written: result.written_language,
  });

  return okResult(
    `Spoken: ${result.spoken_language}, written: ${result.written_language}.`,
    result,
    start
  );
}
