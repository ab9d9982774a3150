import type {
  UnitType,
  Fragility,
  Stackability,
  TemperatureSensitivity,
  PressureSensitivity,
  ShapeType,
  ShelfHeight,
  BoxFitRule,
  WarehouseZone,
  ClassSource,
} from "@shared/schema";

// ---------------------------------------------------------------------------
// Attribute kinds
// ---------------------------------------------------------------------------

/**
 * Every attribute the classifier produces, in evaluation order. Derived
 * attributes (stackability, pick difficulty, box fit, zone) come after the
 * attributes they read.
 */
export const attributeKinds = [
  "unitType",
  "spillRisk",
  "fragility",
  "pressureSensitivity",
  "stackability",
  "temperatureSensitivity",
  "shapeType",
  "pickDifficulty",
  "shelfHeight",
  "boxFitRule",
  "zone",
] as const;
export type AttributeKind = typeof attributeKinds[number];

export interface AttributeValueMap {
  unitType: UnitType;
  spillRisk: boolean;
  fragility: Fragility;
  pressureSensitivity: PressureSensitivity;
  stackability: Stackability;
  temperatureSensitivity: TemperatureSensitivity;
  shapeType: ShapeType;
  pickDifficulty: number;
  shelfHeight: ShelfHeight;
  boxFitRule: BoxFitRule;
  zone: WarehouseZone;
}

/** Attributes a missing value blocks a safe pick/pack plan for. */
export const criticalAttributes = [
  "fragility",
  "spillRisk",
  "pressureSensitivity",
  "temperatureSensitivity",
  "boxFitRule",
] as const satisfies readonly AttributeKind[];

/** One value per kind; null means unresolved (ambiguous). */
export type ClassifiedAttributes = { [K in AttributeKind]: AttributeValueMap[K] | null };

/** Forced values from a category default or an item override; absent or null = nothing forced. */
export type AttributeInputs = { [K in AttributeKind]?: AttributeValueMap[K] | null };

// ---------------------------------------------------------------------------
// Rule and resolution results
// ---------------------------------------------------------------------------

export interface RuleResult<K extends AttributeKind> {
  value: AttributeValueMap[K] | null;
  confidence: number;
  reason: string;
}

export interface AttributeResult<K extends AttributeKind> {
  value: AttributeValueMap[K] | null;
  confidence: number;
  source: ClassSource;
  reason: string;
}

export type ClassificationEvidence = { [K in AttributeKind]: AttributeResult<K> };

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

/** Raw item master signals the rules read. */
export interface ItemSignals {
  itemCode: string;
  itemName: string;
  active: boolean;
  categoryCode: string | null;
  brandCode: string | null;
  attribute1Code: string | null;
  weightKg: number | null;
  lengthCm: number | null;
  widthCm: number | null;
  heightCm: number | null;
  pieces: number | null;
}

/** An item as the classifier sees it: signals plus its currently stored attributes. */
export type ClassifiableItem = ItemSignals & ClassifiedAttributes;

export interface CategoryDefaultInput {
  categoryCode: string;
  isActive: boolean;
  values: AttributeInputs;
}

export interface ItemOverrideInput {
  itemCode: string;
  isActive: boolean;
  values: AttributeInputs;
}

export interface RuleContext {
  /** Final values of attributes already resolved for this item. */
  resolved: AttributeInputs;
  summerMode: boolean;
}
