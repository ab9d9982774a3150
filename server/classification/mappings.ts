import { z } from "zod";
import { fragilityEnum, unitTypeEnum, warehouseZoneEnum } from "@shared/schema";
import type { Fragility, UnitType, WarehouseZone } from "@shared/schema";
import rawMappings from "./mappings.json";

// ---------------------------------------------------------------------------
// Category / keyword lookup tables (data lives in mappings.json)
// ---------------------------------------------------------------------------

const codeList = z.array(z.string().min(1));

const mappingsSchema = z.object({
  liquidCategories: codeList,
  glassBottleCategories: codeList,
  fragileCategories: z.record(z.string(), z.enum(fragilityEnum)),
  heatSensitiveCategories: codeList,
  coolRequiredCategories: codeList,
  highPressureCategories: codeList,
  mediumPressureCategories: codeList,
  roundShapeCategories: codeList,
  flatShapeCategories: codeList,
  liquidKeywords: codeList,
  fragileKeywords: codeList,
  crushableKeywords: codeList,
  heatSensitiveKeywords: codeList,
  coolRequiredKeywords: codeList,
  roundShapeKeywords: codeList,
  irregularShapeKeywords: codeList,
  unitTypeCodes: z.record(z.string(), z.enum(unitTypeEnum)),
  zoneCategories: z.record(z.string(), z.enum(warehouseZoneEnum)),
});

const parsed = mappingsSchema.parse(rawMappings);

export interface KeywordMatcher {
  keyword: string;
  pattern: RegExp;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Whole-word match with an optional plural ending, so "chip" hits "chips"
// but "can" does not hit "candle".
function keywordMatchers(keywords: string[]): KeywordMatcher[] {
  return keywords.map((keyword) => ({
    keyword,
    pattern: new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(keyword.toLowerCase())}(?:s|es)?(?:$|[^a-z0-9])`),
  }));
}

export const LIQUID_CATEGORIES: ReadonlySet<string> = new Set(parsed.liquidCategories);
export const GLASS_BOTTLE_CATEGORIES: ReadonlySet<string> = new Set(parsed.glassBottleCategories);
export const FRAGILE_CATEGORIES: ReadonlyMap<string, Fragility> = new Map(Object.entries(parsed.fragileCategories));
export const HEAT_SENSITIVE_CATEGORIES: ReadonlySet<string> = new Set(parsed.heatSensitiveCategories);
export const COOL_REQUIRED_CATEGORIES: ReadonlySet<string> = new Set(parsed.coolRequiredCategories);
export const HIGH_PRESSURE_CATEGORIES: ReadonlySet<string> = new Set(parsed.highPressureCategories);
export const MEDIUM_PRESSURE_CATEGORIES: ReadonlySet<string> = new Set(parsed.mediumPressureCategories);
export const ROUND_SHAPE_CATEGORIES: ReadonlySet<string> = new Set(parsed.roundShapeCategories);
export const FLAT_SHAPE_CATEGORIES: ReadonlySet<string> = new Set(parsed.flatShapeCategories);
export const UNIT_TYPE_CODES: ReadonlyMap<string, UnitType> = new Map(Object.entries(parsed.unitTypeCodes));
export const ZONE_CATEGORIES: ReadonlyMap<string, WarehouseZone> = new Map(Object.entries(parsed.zoneCategories));

export const LIQUID_KEYWORDS = keywordMatchers(parsed.liquidKeywords);
export const FRAGILE_KEYWORDS = keywordMatchers(parsed.fragileKeywords);
export const CRUSHABLE_KEYWORDS = keywordMatchers(parsed.crushableKeywords);
export const HEAT_SENSITIVE_KEYWORDS = keywordMatchers(parsed.heatSensitiveKeywords);
export const COOL_REQUIRED_KEYWORDS = keywordMatchers(parsed.coolRequiredKeywords);
export const ROUND_SHAPE_KEYWORDS = keywordMatchers(parsed.roundShapeKeywords);
export const IRREGULAR_SHAPE_KEYWORDS = keywordMatchers(parsed.irregularShapeKeywords);

/** "500ml", "1.5 L", "75cl" and the like. */
export const VOLUME_PATTERN = /\d+(?:[.,]\d+)?\s*(?:ml|cl|l|lt|ltr)\b/i;

/** Every category code any table above knows about. */
export const KNOWN_CATEGORIES: ReadonlySet<string> = new Set([
  ...parsed.liquidCategories,
  ...parsed.glassBottleCategories,
  ...Object.keys(parsed.fragileCategories),
  ...parsed.heatSensitiveCategories,
  ...parsed.highPressureCategories,
  ...parsed.mediumPressureCategories,
  ...parsed.roundShapeCategories,
  ...parsed.flatShapeCategories,
  ...Object.keys(parsed.zoneCategories),
]);

/** First keyword (in table order) found in the name, or null. */
export function findKeyword(name: string, matchers: readonly KeywordMatcher[]): string | null {
  const haystack = name.toLowerCase();
  for (const matcher of matchers) {
    if (matcher.pattern.test(haystack)) return matcher.keyword;
  }
  return null;
}
