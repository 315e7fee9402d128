// ---------------------------------------------------------------------------
// Action: insights.product.categorize
// ---------------------------------------------------------------------------

import type { Logger } from "../../lib/logger.js";
import type { CategorizeProductParams, ExecuteResult } from "../types.js";
import { categorizeProduct } from "../../verticals/perfume/categorizer.js";
import { okResult } from "../utils.js";

export function executeCategorizeProduct(
  params: CategorizeProductParams,
  log: Logger
): ExecuteResult {
  const start = Date.now();
  const result = categorizeProduct(params.product_mapping, params.new_product_name, log);

  log.info("Categorized product", {
    product: params.new_product_name,
    category: result.category,
    subcategory: result.subcategory,
  });

  return okResult(
    `Categorized "${params.new_product_name}" as ${result.category} (${result.subcategory}).`,
    result,
    start
  );
}
