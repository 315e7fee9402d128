// ---------------------------------------------------------------------------
// Action: insights.ad.generate
// ---------------------------------------------------------------------------
// Template narrative, bottleneck and seeded suggestions for one ad. No I/O.
// ---------------------------------------------------------------------------

import type { AdMetrics } from "../../core/types.js";
import type { Logger } from "../../lib/logger.js";
import type { ExecuteResult } from "../types.js";
import { buildInsight } from "../../core/analysis/narrative.js";
import { okResult } from "../utils.js";

export function executeGenerateInsight(
  input: AdMetrics,
  log: Logger,
  now: Date
): ExecuteResult {
  const start = Date.now();
  const result = buildInsight(input, now);

  log.info("Generated insight", {
    adName: input.name,
    roas: result.diagnostics.roas,
    spend: result.diagnostics.spend,
  });

  return okResult(
    `Generated insight for "${input.name}" (ROAS ${result.diagnostics.roas.toFixed(2)}x).`,
    result,
    start
  );
}
