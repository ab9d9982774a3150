/**
 * Attribute rules, one pure function per attribute kind.
 *
 * Each rule reads the item's raw signals (category, name, unit code, weight)
 * and, for derived attributes, the values already resolved earlier in the
 * same pass. Rules never decide whether a value is confident enough to keep;
 * they report a confidence and let the resolver apply the threshold.
 */

import type {
  BoxFitRule,
  Fragility,
  PressureSensitivity,
  Stackability,
  TemperatureSensitivity,
} from "@shared/schema";
import {
  COOL_REQUIRED_CATEGORIES,
  COOL_REQUIRED_KEYWORDS,
  CRUSHABLE_KEYWORDS,
  FLAT_SHAPE_CATEGORIES,
  FRAGILE_CATEGORIES,
  FRAGILE_KEYWORDS,
  GLASS_BOTTLE_CATEGORIES,
  HEAT_SENSITIVE_CATEGORIES,
  HEAT_SENSITIVE_KEYWORDS,
  HIGH_PRESSURE_CATEGORIES,
  IRREGULAR_SHAPE_KEYWORDS,
  KNOWN_CATEGORIES,
  LIQUID_CATEGORIES,
  LIQUID_KEYWORDS,
  MEDIUM_PRESSURE_CATEGORIES,
  ROUND_SHAPE_CATEGORIES,
  ROUND_SHAPE_KEYWORDS,
  UNIT_TYPE_CODES,
  VOLUME_PATTERN,
  ZONE_CATEGORIES,
  findKeyword,
} from "./mappings";
import type { AttributeKind, ItemSignals, RuleContext, RuleResult } from "./types";

export type AttributeRule<K extends AttributeKind> = (item: ItemSignals, ctx: RuleContext) => RuleResult<K>;

export type RuleTable = { [K in AttributeKind]: AttributeRule<K> };

function categoryOf(item: ItemSignals): string {
  return (item.categoryCode ?? "").trim().toUpperCase();
}

function unitCodeOf(item: ItemSignals): string {
  return (item.attribute1Code ?? "").trim().toUpperCase();
}

// ---------------------------------------------------------------------------
// Signal-based rules
// ---------------------------------------------------------------------------

const unitTypeRule: AttributeRule<"unitType"> = (item) => {
  const code = unitCodeOf(item);
  const mapped = UNIT_TYPE_CODES.get(code);
  if (mapped) {
    return { value: mapped, confidence: 90, reason: `Unit code ${code} → ${mapped}` };
  }
  return {
    value: "item",
    confidence: 40,
    reason: code ? `Unknown unit code ${code}, assumed item` : "No unit code, assumed item",
  };
};

const spillRiskRule: AttributeRule<"spillRisk"> = (item) => {
  const category = categoryOf(item);
  if (LIQUID_CATEGORIES.has(category)) {
    return { value: true, confidence: 90, reason: `Liquid category ${category}` };
  }

  const volume = VOLUME_PATTERN.exec(item.itemName);
  if (volume) {
    return { value: true, confidence: 75, reason: `Volume in name: ${volume[0]}` };
  }

  const keyword = findKeyword(item.itemName, LIQUID_KEYWORDS);
  if (keyword) {
    return { value: true, confidence: 75, reason: `Liquid keyword: ${keyword}` };
  }

  return { value: false, confidence: 30, reason: "No liquid signals" };
};

const fragilityRule: AttributeRule<"fragility"> = (item) => {
  const category = categoryOf(item);
  const fromCategory = FRAGILE_CATEGORIES.get(category);
  if (fromCategory) {
    return { value: fromCategory, confidence: 90, reason: `Fragile category ${category}` };
  }

  if (GLASS_BOTTLE_CATEGORIES.has(category)) {
    return { value: "YES", confidence: 85, reason: `Glass bottle category ${category}` };
  }

  const keyword = findKeyword(item.itemName, FRAGILE_KEYWORDS);
  if (keyword) {
    return { value: "YES", confidence: 70, reason: `Fragile keyword: ${keyword}` };
  }

  return { value: "NO", confidence: 45, reason: "No fragility signals" };
};

const pressureSensitivityRule: AttributeRule<"pressureSensitivity"> = (item) => {
  const category = categoryOf(item);
  if (HIGH_PRESSURE_CATEGORIES.has(category)) {
    return { value: "high", confidence: 90, reason: `Crushable category ${category}` };
  }
  if (MEDIUM_PRESSURE_CATEGORIES.has(category)) {
    return { value: "medium", confidence: 85, reason: `Pressure-sensitive category ${category}` };
  }
  if (GLASS_BOTTLE_CATEGORIES.has(category)) {
    return { value: "medium", confidence: 80, reason: `Glass bottle category ${category}` };
  }

  const keyword = findKeyword(item.itemName, CRUSHABLE_KEYWORDS);
  if (keyword) {
    return { value: "high", confidence: 75, reason: `Crushable keyword: ${keyword}` };
  }

  if (UNIT_TYPE_CODES.get(unitCodeOf(item)) === "case") {
    return { value: "low", confidence: 70, reason: "Case-packed unit" };
  }

  return { value: "low", confidence: 50, reason: "No pressure signals" };
};

const temperatureSensitivityRule: AttributeRule<"temperatureSensitivity"> = (item) => {
  const category = categoryOf(item);
  if (COOL_REQUIRED_CATEGORIES.has(category)) {
    return { value: "cool_required", confidence: 95, reason: `Frozen category ${category}` };
  }
  if (HEAT_SENSITIVE_CATEGORIES.has(category)) {
    return { value: "heat_sensitive", confidence: 90, reason: `Heat-sensitive category ${category}` };
  }

  const coolKeyword = findKeyword(item.itemName, COOL_REQUIRED_KEYWORDS);
  if (coolKeyword) {
    return { value: "cool_required", confidence: 80, reason: `Cold keyword: ${coolKeyword}` };
  }
  const heatKeyword = findKeyword(item.itemName, HEAT_SENSITIVE_KEYWORDS);
  if (heatKeyword) {
    return { value: "heat_sensitive", confidence: 75, reason: `Heat keyword: ${heatKeyword}` };
  }

  if (KNOWN_CATEGORIES.has(category)) {
    return { value: "normal", confidence: 60, reason: `Known category ${category}, no temperature signals` };
  }
  return { value: "normal", confidence: 40, reason: "Unknown category, no temperature signals" };
};

const shapeTypeRule: AttributeRule<"shapeType"> = (item) => {
  const category = categoryOf(item);
  if (ROUND_SHAPE_CATEGORIES.has(category)) {
    return { value: "round", confidence: 80, reason: `Round category ${category}` };
  }
  if (FLAT_SHAPE_CATEGORIES.has(category)) {
    return { value: "flat", confidence: 80, reason: `Flat category ${category}` };
  }

  const roundKeyword = findKeyword(item.itemName, ROUND_SHAPE_KEYWORDS);
  if (roundKeyword) {
    return { value: "round", confidence: 70, reason: `Round keyword: ${roundKeyword}` };
  }
  const irregularKeyword = findKeyword(item.itemName, IRREGULAR_SHAPE_KEYWORDS);
  if (irregularKeyword) {
    return { value: "irregular", confidence: 65, reason: `Irregular keyword: ${irregularKeyword}` };
  }

  return { value: "cubic", confidence: 55, reason: "Default shape" };
};

const shelfHeightRule: AttributeRule<"shelfHeight"> = (item) => {
  const weight = item.weightKg ?? 0;
  if (weight > 8) return { value: "LOW", confidence: 70, reason: `Heavy (${weight} kg)` };
  if (weight > 4) return { value: "MID", confidence: 60, reason: `Medium weight (${weight} kg)` };
  return { value: null, confidence: 35, reason: "No weight-based shelf preference" };
};

// ---------------------------------------------------------------------------
// Derived rules (read values resolved earlier in the pass)
// ---------------------------------------------------------------------------

const stackabilityRule: AttributeRule<"stackability"> = (_item, ctx) => {
  const fragility: Fragility | null = ctx.resolved.fragility ?? null;
  const pressure: PressureSensitivity | null = ctx.resolved.pressureSensitivity ?? null;
  const bothResolved = fragility !== null && pressure !== null;

  let value: Stackability;
  let confidence: number;
  let reason: string;
  if (fragility === "YES") {
    value = "NO";
    confidence = 85;
    reason = "Fragile";
  } else if (pressure === "high") {
    value = "NO";
    confidence = 85;
    reason = "High pressure sensitivity";
  } else if (fragility === "SEMI" || pressure === "medium") {
    value = "LIMITED";
    confidence = 75;
    reason = "Semi-fragile or medium pressure sensitivity";
  } else {
    value = "YES";
    confidence = 70;
    reason = "Not fragile, low pressure sensitivity";
  }

  if (!bothResolved) {
    return { value, confidence: 40, reason: `${reason} (fragility or pressure unresolved)` };
  }
  return { value, confidence, reason };
};

const pickDifficultyRule: AttributeRule<"pickDifficulty"> = (item, ctx) => {
  const fragility = ctx.resolved.fragility ?? null;
  const pressure = ctx.resolved.pressureSensitivity ?? null;
  if (item.weightKg === null || fragility === null || pressure === null) {
    return { value: null, confidence: 35, reason: "Missing weight, fragility or pressure" };
  }

  const weight = item.weightKg;
  const factors: string[] = [];
  let score = 2;
  if (weight > 10) {
    score += 2;
    factors.push("heavy");
  } else if (weight > 5) {
    score += 1;
    factors.push("moderately heavy");
  }
  if (fragility === "YES") {
    score += 1;
    factors.push("fragile");
  }
  if (pressure === "high") {
    score += 1;
    factors.push("high pressure");
  }
  score = Math.min(5, Math.max(1, score));

  let confidence = 60;
  if (weight > 10 || fragility === "YES" || pressure === "high") {
    confidence = 70;
  } else if (weight > 5) {
    confidence = 65;
  }

  return {
    value: score,
    confidence,
    reason: factors.length > 0 ? `Difficulty ${score}: ${factors.join(", ")}` : `Difficulty ${score}: standard`,
  };
};

const boxFitRuleRule: AttributeRule<"boxFitRule"> = (item, ctx) => {
  const fragility: Fragility | null = ctx.resolved.fragility ?? null;
  const spill: boolean | null = ctx.resolved.spillRisk ?? null;
  const pressure: PressureSensitivity | null = ctx.resolved.pressureSensitivity ?? null;
  const temperature: TemperatureSensitivity | null = ctx.resolved.temperatureSensitivity ?? null;

  const missing = [
    fragility === null ? "fragility" : null,
    spill === null ? "spill risk" : null,
    pressure === null ? "pressure" : null,
    temperature === null ? "temperature" : null,
  ].filter((name): name is string => name !== null);

  if (missing.length === 4) {
    return { value: null, confidence: 40, reason: "No prerequisites resolved" };
  }

  const weight = item.weightKg ?? 0;
  let value: BoxFitRule;
  let confidence: number;
  let reason: string;
  if (temperature === "heat_sensitive" && ctx.summerMode) {
    value = "COOLER_BAG";
    confidence = 90;
    reason = "Heat-sensitive in summer";
  } else if (spill === true && weight > 2) {
    value = "BOTTOM";
    confidence = 85;
    reason = "Heavy liquid";
  } else if (fragility === "YES") {
    value = "TOP";
    confidence = 85;
    reason = "Fragile";
  } else if (pressure === "high") {
    value = "TOP";
    confidence = 80;
    reason = "Crushable";
  } else if (spill === true) {
    value = "BOTTOM";
    confidence = 75;
    reason = "Liquid";
  } else {
    value = "MIDDLE";
    confidence = 75;
    reason = "No special placement";
  }

  if (missing.length > 0) {
    return { value, confidence: 40, reason: `${reason} (unresolved: ${missing.join(", ")})` };
  }
  return { value, confidence, reason };
};

const zoneRule: AttributeRule<"zone"> = (item, ctx) => {
  const category = categoryOf(item);
  const mapped = ZONE_CATEGORIES.get(category);
  if (mapped) {
    return { value: mapped, confidence: 85, reason: `Zone for category ${category}` };
  }

  const temperature = ctx.resolved.temperatureSensitivity ?? null;
  if (temperature === "heat_sensitive" || temperature === "cool_required") {
    return { value: "SENSITIVE", confidence: 80, reason: `Temperature ${temperature}` };
  }

  return { value: "MAIN", confidence: 60, reason: "Default zone" };
};

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

/** One rule per attribute kind; a kind without a rule does not compile. */
export const attributeRules: RuleTable = {
  unitType: unitTypeRule,
  spillRisk: spillRiskRule,
  fragility: fragilityRule,
  pressureSensitivity: pressureSensitivityRule,
  stackability: stackabilityRule,
  temperatureSensitivity: temperatureSensitivityRule,
  shapeType: shapeTypeRule,
  pickDifficulty: pickDifficultyRule,
  shelfHeight: shelfHeightRule,
  boxFitRule: boxFitRuleRule,
  zone: zoneRule,
};

export function evaluateAttribute<K extends AttributeKind>(
  kind: K,
  item: ItemSignals,
  ctx: RuleContext,
): RuleResult<K> {
  const rule: AttributeRule<K> = attributeRules[kind];
  return rule(item, ctx);
}
