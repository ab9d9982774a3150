import {
  boxFitRuleEnum,
  fragilityEnum,
  pressureSensitivityEnum,
  shapeTypeEnum,
  shelfHeightEnum,
  stackabilityEnum,
  temperatureSensitivityEnum,
  unitTypeEnum,
  warehouseZoneEnum,
} from "@shared/schema";
import type { CategoryDefault, Item, ItemClassificationUpdate, ItemOverride } from "@shared/schema";
import type { ItemClassification } from "./classification/engine";
import type { ReviewableItem } from "./classification/resolver";
import type {
  AttributeInputs,
  CategoryDefaultInput,
  ClassifiableItem,
  ClassifiedAttributes,
  ItemOverrideInput,
} from "./classification/types";
import type { HandlingAttributes } from "./estimation/pick";

/**
 * Row ↔ domain helpers for items.
 *
 * Classification columns are plain varchar in the database; these helpers
 * narrow them to the enum values the classifier and the estimator work with.
 * A stored value outside its enum reads as null (unresolved).
 */

/** The stored value if it is one of `values`, else null. */
export function oneOf<T extends string>(values: readonly T[], raw: string | null | undefined): T | null {
  if (raw === null || raw === undefined) return null;
  return values.find((value) => value === raw) ?? null;
}

/** Pick difficulty is an integer 1-5; anything else reads as unresolved. */
export function toPickDifficulty(raw: number | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  return Number.isInteger(raw) && raw >= 1 && raw <= 5 ? raw : null;
}

export function toClassifiedAttributes(row: {
  zone: string | null;
  unitType: string | null;
  fragility: string | null;
  stackability: string | null;
  temperatureSensitivity: string | null;
  pressureSensitivity: string | null;
  shapeType: string | null;
  spillRisk: boolean | null;
  pickDifficulty: number | null;
  shelfHeight: string | null;
  boxFitRule: string | null;
}): ClassifiedAttributes {
  return {
    unitType: oneOf(unitTypeEnum, row.unitType),
    spillRisk: row.spillRisk,
    fragility: oneOf(fragilityEnum, row.fragility),
    pressureSensitivity: oneOf(pressureSensitivityEnum, row.pressureSensitivity),
    stackability: oneOf(stackabilityEnum, row.stackability),
    temperatureSensitivity: oneOf(temperatureSensitivityEnum, row.temperatureSensitivity),
    shapeType: oneOf(shapeTypeEnum, row.shapeType),
    pickDifficulty: toPickDifficulty(row.pickDifficulty),
    shelfHeight: oneOf(shelfHeightEnum, row.shelfHeight),
    boxFitRule: oneOf(boxFitRuleEnum, row.boxFitRule),
    zone: oneOf(warehouseZoneEnum, row.zone),
  };
}

export function toClassifiableItem(row: Item): ClassifiableItem {
  return {
    itemCode: row.itemCode,
    itemName: row.itemName,
    active: row.active,
    categoryCode: row.categoryCode,
    brandCode: row.brandCode,
    attribute1Code: row.attribute1Code,
    weightKg: row.weightKg,
    lengthCm: row.lengthCm,
    widthCm: row.widthCm,
    heightCm: row.heightCm,
    pieces: row.pieces,
    ...toClassifiedAttributes(row),
  };
}

export function toReviewableItem(row: Item): ReviewableItem {
  const attributes = toClassifiedAttributes(row);
  return {
    active: row.active,
    classConfidence: row.classConfidence,
    fragility: attributes.fragility,
    spillRisk: attributes.spillRisk,
    pressureSensitivity: attributes.pressureSensitivity,
    temperatureSensitivity: attributes.temperatureSensitivity,
    boxFitRule: attributes.boxFitRule,
  };
}

export function toHandlingAttributes(row: Item): HandlingAttributes {
  const attributes = toClassifiedAttributes(row);
  return {
    unitType: attributes.unitType,
    fragility: attributes.fragility,
    spillRisk: attributes.spillRisk,
    pressureSensitivity: attributes.pressureSensitivity,
    temperatureSensitivity: attributes.temperatureSensitivity,
    pickDifficulty: attributes.pickDifficulty,
  };
}

export function toCategoryDefaultInput(row: CategoryDefault): CategoryDefaultInput {
  const values: AttributeInputs = toClassifiedAttributes({
    zone: row.defaultZone,
    unitType: null,
    fragility: row.defaultFragility,
    stackability: row.defaultStackability,
    temperatureSensitivity: row.defaultTemperatureSensitivity,
    pressureSensitivity: row.defaultPressureSensitivity,
    shapeType: row.defaultShapeType,
    spillRisk: row.defaultSpillRisk,
    pickDifficulty: row.defaultPickDifficulty,
    shelfHeight: row.defaultShelfHeight,
    boxFitRule: row.defaultBoxFitRule,
  });
  return { categoryCode: row.categoryCode, isActive: row.isActive, values };
}

export function toItemOverrideInput(row: ItemOverride): ItemOverrideInput {
  const values: AttributeInputs = toClassifiedAttributes({
    zone: row.zoneOverride,
    unitType: row.unitTypeOverride,
    fragility: row.fragilityOverride,
    stackability: row.stackabilityOverride,
    temperatureSensitivity: row.temperatureSensitivityOverride,
    pressureSensitivity: row.pressureSensitivityOverride,
    shapeType: row.shapeTypeOverride,
    spillRisk: row.spillRiskOverride,
    pickDifficulty: row.pickDifficultyOverride,
    shelfHeight: row.shelfHeightOverride,
    boxFitRule: row.boxFitRuleOverride,
  });
  return { itemCode: row.itemCode, isActive: row.isActive, values };
}

export function toClassificationUpdate(result: ItemClassification): ItemClassificationUpdate {
  const a = result.attributes;
  return {
    zone: a.zone,
    unitType: a.unitType,
    fragility: a.fragility,
    stackability: a.stackability,
    temperatureSensitivity: a.temperatureSensitivity,
    pressureSensitivity: a.pressureSensitivity,
    shapeType: a.shapeType,
    spillRisk: a.spillRisk,
    pickDifficulty: a.pickDifficulty,
    shelfHeight: a.shelfHeight,
    boxFitRule: a.boxFitRule,
    classConfidence: result.confidence,
    classSource: result.source,
    classNotes: result.notes,
    classEvidence: result.evidence,
    classifiedAt: result.classifiedAt,
  };
}
