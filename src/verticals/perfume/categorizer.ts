import type { ProductCategorization, ProductMappingEntry } from "../../core/types.js";
import { logger as defaultLogger, type Logger } from "../../lib/logger.js";

// ---------------------------------------------------------------------------
// Perfume Product Categorizer
// ---------------------------------------------------------------------------
// Assigns a catalog category and a composite subcategory to a product name.
// An exact match in the existing product mapping wins; otherwise ordered
// keyword groups decide. Keywords match whole words, case-insensitively,
// with an optional plural or possessive ending.
// ---------------------------------------------------------------------------

export const GENERAL_CATEGORY = "Perfumes - General";
export const STANDARD_SUBCATEGORY = "Standard";
export const UNKNOWN = "Unknown";

interface KeywordGroup {
  label: string;
  /** Any keyword matching selects the group */
  anyOf: string[];
  /** Every keyword here must match as well */
  allOf?: string[];
}

/** First matching group wins */
export const CATEGORY_GROUPS: readonly KeywordGroup[] = [
  // Must precede EDP: its "perfume" keyword would claim every perfume oil.
  // Earlier releases checked EDP first and filed "Kenaz Perfume Oil" under
  // Eau de Parfum; product mappings built then may still say so.
  { label: "Perfumes - Perfume Oil", anyOf: ["oil"], allOf: ["perfume"] },
  { label: "Perfumes - Eau de Parfum", anyOf: ["edp", "eau de parfum", "perfume"] },
  { label: "Perfumes - Eau de Toilette", anyOf: ["edt", "eau de toilette"] },
  { label: "Body Care - Body Mist", anyOf: ["mist", "body mist"] },
  { label: "Body Care - Deodorant", anyOf: ["deo", "deodorant"] },
  { label: "Gift Sets", anyOf: ["set", "combo", "kit", "bundle", "gift"] },
];

// "women" is checked before "men"
export const TARGET_GROUPS: readonly KeywordGroup[] = [
  { label: "Women", anyOf: ["women", "woman", "female", "ladies"] },
  { label: "Men", anyOf: ["men", "man", "male"] },
  { label: "Unisex", anyOf: ["unisex"] },
];

export const NOTE_GROUPS: readonly KeywordGroup[] = [
  { label: "Woody", anyOf: ["oud", "woody", "sandalwood", "cedar", "vetiver"] },
  { label: "Floral", anyOf: ["rose", "jasmine", "floral", "tuberose", "lily"] },
  { label: "Citrus", anyOf: ["citrus", "lemon", "orange", "bergamot", "lime"] },
  { label: "Oriental", anyOf: ["oriental", "amber", "vanilla", "musk"] },
  { label: "Fresh", anyOf: ["fresh", "aqua", "aquatic", "marine", "ocean"] },
  { label: "Spicy", anyOf: ["spicy", "spice", "saffron", "pepper", "cardamom"] },
];

export const SIZE_GROUPS: readonly KeywordGroup[] = [
  { label: "100ml", anyOf: ["100ml", "100 ml"] },
  { label: "50ml", anyOf: ["50ml", "50 ml"] },
  { label: "30ml", anyOf: ["30ml", "30 ml"] },
  { label: "Travel Size", anyOf: ["travel", "mini", "pocket", "10ml", "10 ml", "8ml", "8 ml"] },
];

const patternCache = new Map<string, RegExp>();

function keywordPattern(keyword: string): RegExp {
  let pattern = patternCache.get(keyword);
  if (!pattern) {
    const escaped = keyword
      .replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
      .replace(/\s+/g, "\\s+");
    // Plural and possessive forms count: "Perfumes", "Mens", "Women's"
    pattern = new RegExp(`\\b${escaped}(?:'?s)?\\b`, "i");
    patternCache.set(keyword, pattern);
  }
  return pattern;
}

export function containsKeyword(text: string, keyword: string): boolean {
  return keywordPattern(keyword).test(text);
}

function groupMatches(text: string, group: KeywordGroup): boolean {
  const any = group.anyOf.some((k) => containsKeyword(text, k));
  const all = (group.allOf ?? []).every((k) => containsKeyword(text, k));
  return any && all;
}

/** Label of the first matching group, if any */
export function firstMatch(
  text: string,
  groups: readonly KeywordGroup[]
): string | undefined {
  return groups.find((g) => groupMatches(text, g))?.label;
}

export function categorizeByKeywords(productName: string): {
  category: string;
  subcategory: string;
} {
  const category = firstMatch(productName, CATEGORY_GROUPS) ?? GENERAL_CATEGORY;

  const parts = [TARGET_GROUPS, NOTE_GROUPS, SIZE_GROUPS]
    .map((groups) => firstMatch(productName, groups))
    .filter((label): label is string => label !== undefined);

  return {
    category,
    subcategory: parts.length > 0 ? parts.join(", ") : STANDARD_SUBCATEGORY,
  };
}

function findMappedProduct(
  mapping: readonly ProductMappingEntry[],
  productName: string
): ProductMappingEntry | undefined {
  const wanted = productName.trim().toLowerCase();
  return mapping.find(
    (entry) =>
      typeof entry.product_name === "string" &&
      typeof entry.category === "string" &&
      entry.product_name.trim().toLowerCase() === wanted
  );
}

export function categorizeProduct(
  mapping: readonly ProductMappingEntry[],
  productName: string,
  log: Logger = defaultLogger
): ProductCategorization {
  try {
    const mapped = findMappedProduct(mapping, productName);
    if (mapped?.category) {
      return {
        new_product_name: productName,
        category: mapped.category,
        subcategory: mapped.subcategory ?? STANDARD_SUBCATEGORY,
        reasoning: "Matched existing product mapping",
      };
    }

    const { category, subcategory } = categorizeByKeywords(productName);
    return {
      new_product_name: productName,
      category,
      subcategory,
      reasoning: "Classified based on product name keywords and structure",
    };
  } catch (err) {
    log.error("Product categorization error", err, { productName });
    return {
      new_product_name: productName,
      category: UNKNOWN,
      subcategory: UNKNOWN,
      reasoning: `Error: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}
