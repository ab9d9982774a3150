/**
 * Classification engine: runs every active item through the attribute rules
 * and the resolver, and summarizes the outcome of the pass.
 *
 * Pure: no I/O. The caller loads items, category defaults and overrides, and
 * persists whatever comes back. One item failing never stops the run.
 */

import type { ClassSource } from "@shared/schema";
import { evaluateAttribute } from "./rules";
import {
  classNotes,
  classSource,
  confidenceThresholdSchema,
  needsReview,
  overallConfidence,
  resolveAttribute,
} from "./resolver";
import { attributeKinds } from "./types";
import type {
  AttributeKind,
  AttributeInputs,
  AttributeResult,
  AttributeValueMap,
  CategoryDefaultInput,
  ClassifiableItem,
  ClassificationEvidence,
  ClassifiedAttributes,
  ItemOverrideInput,
} from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ClassificationOptions {
  threshold: number;
  summerMode: boolean;
  classifiedAt: Date;
}

export interface ItemClassification {
  itemCode: string;
  attributes: ClassifiedAttributes;
  evidence: ClassificationEvidence;
  confidence: number;
  source: ClassSource;
  notes: string;
  needsReview: boolean;
  /** Whether any attribute differs from what the item had stored. */
  changed: boolean;
  classifiedAt: Date;
}

export interface ClassificationFailure {
  itemCode: string;
  error: string;
}

export interface ClassificationStats {
  itemsScanned: number;
  itemsUpdated: number;
  itemsNeedingReview: number;
  itemsFailed: number;
}

export interface ClassificationRunResult {
  results: ItemClassification[];
  failures: ClassificationFailure[];
  stats: ClassificationStats;
}

// ---------------------------------------------------------------------------
// Single item
// ---------------------------------------------------------------------------

function activeValue<K extends AttributeKind>(
  source: { isActive: boolean; values: AttributeInputs } | undefined,
  kind: K,
): AttributeValueMap[K] | null {
  if (!source || !source.isActive) return null;
  return source.values[kind] ?? null;
}

export function classifyItem(
  item: ClassifiableItem,
  categoryDefault: CategoryDefaultInput | undefined,
  override: ItemOverrideInput | undefined,
  options: ClassificationOptions,
): ItemClassification {
  const resolved: AttributeInputs = {};

  const resolve = <K extends AttributeKind>(kind: K): AttributeResult<K> => {
    const computed = evaluateAttribute(kind, item, { resolved, summerMode: options.summerMode });
    // Unit type is a property of the SKU, never of its category
    const defaultValue = kind === "unitType" ? null : activeValue(categoryDefault, kind);
    const result = resolveAttribute(kind, computed, activeValue(override, kind), defaultValue, options.threshold);
    resolved[kind] = result.value;
    return result;
  };

  // Property order is evaluation order: derived attributes read `resolved`.
  const evidence: ClassificationEvidence = {
    unitType: resolve("unitType"),
    spillRisk: resolve("spillRisk"),
    fragility: resolve("fragility"),
    pressureSensitivity: resolve("pressureSensitivity"),
    stackability: resolve("stackability"),
    temperatureSensitivity: resolve("temperatureSensitivity"),
    shapeType: resolve("shapeType"),
    pickDifficulty: resolve("pickDifficulty"),
    shelfHeight: resolve("shelfHeight"),
    boxFitRule: resolve("boxFitRule"),
    zone: resolve("zone"),
  };

  const attributes: ClassifiedAttributes = {
    unitType: evidence.unitType.value,
    spillRisk: evidence.spillRisk.value,
    fragility: evidence.fragility.value,
    pressureSensitivity: evidence.pressureSensitivity.value,
    stackability: evidence.stackability.value,
    temperatureSensitivity: evidence.temperatureSensitivity.value,
    shapeType: evidence.shapeType.value,
    pickDifficulty: evidence.pickDifficulty.value,
    shelfHeight: evidence.shelfHeight.value,
    boxFitRule: evidence.boxFitRule.value,
    zone: evidence.zone.value,
  };

  const confidence = overallConfidence(evidence);

  return {
    itemCode: item.itemCode,
    attributes,
    evidence,
    confidence,
    source: classSource(evidence),
    notes: classNotes(evidence, confidence),
    needsReview: needsReview({ ...attributes, active: item.active, classConfidence: confidence }, options.threshold),
    changed: attributeKinds.some((kind) => item[kind] !== attributes[kind]),
    classifiedAt: options.classifiedAt,
  };
}

// ---------------------------------------------------------------------------
// Whole run
// ---------------------------------------------------------------------------

export function runClassification(
  items: readonly ClassifiableItem[],
  categoryDefaults: ReadonlyMap<string, CategoryDefaultInput>,
  itemOverrides: ReadonlyMap<string, ItemOverrideInput>,
  options: ClassificationOptions,
): ClassificationRunResult {
  confidenceThresholdSchema.parse(options.threshold);

  const results: ItemClassification[] = [];
  const failures: ClassificationFailure[] = [];
  let itemsScanned = 0;

  for (const item of items) {
    if (!item.active) continue;
    itemsScanned++;

    try {
      const categoryDefault = item.categoryCode ? categoryDefaults.get(item.categoryCode) : undefined;
      results.push(classifyItem(item, categoryDefault, itemOverrides.get(item.itemCode), options));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      failures.push({ itemCode: item.itemCode, error: message });
    }
  }

  return {
    results,
    failures,
    stats: {
      itemsScanned,
      itemsUpdated: results.filter((r) => r.changed).length,
      itemsNeedingReview: results.filter((r) => r.needsReview).length,
      itemsFailed: failures.length,
    },
  };
}
