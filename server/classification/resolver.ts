import { z } from "zod";
import type { ClassSource } from "@shared/schema";
import { attributeKinds, criticalAttributes } from "./types";
import type {
  AttributeKind,
  AttributeResult,
  AttributeValueMap,
  ClassificationEvidence,
  ClassifiedAttributes,
  RuleResult,
} from "./types";

export const DEFAULT_CONFIDENCE_THRESHOLD = 60;

export const MANUAL_CONFIDENCE = 100;
export const CATEGORY_DEFAULT_CONFIDENCE = 85;

export const confidenceThresholdSchema = z.number().int().min(0).max(100);

// ---------------------------------------------------------------------------
// Per-attribute precedence: override > category default > confident rule > null
// ---------------------------------------------------------------------------

export function resolveAttribute<K extends AttributeKind>(
  kind: K,
  computed: RuleResult<K>,
  overrideValue: AttributeValueMap[K] | null | undefined,
  defaultValue: AttributeValueMap[K] | null | undefined,
  threshold: number,
): AttributeResult<K> {
  if (overrideValue !== null && overrideValue !== undefined) {
    return {
      value: overrideValue,
      confidence: MANUAL_CONFIDENCE,
      source: "MANUAL",
      reason: `MANUAL override for ${kind}`,
    };
  }

  if (defaultValue !== null && defaultValue !== undefined) {
    return {
      value: defaultValue,
      confidence: CATEGORY_DEFAULT_CONFIDENCE,
      source: "CATEGORY_DEFAULT",
      reason: `CATEGORY default for ${kind}`,
    };
  }

  if (computed.value !== null && computed.confidence >= threshold) {
    return { value: computed.value, confidence: computed.confidence, source: "RULES", reason: computed.reason };
  }

  return {
    value: null,
    confidence: computed.confidence,
    source: "RULES",
    reason: `AMBIGUOUS (<${threshold}) - ${computed.reason}`,
  };
}

// ---------------------------------------------------------------------------
// Item-level summaries
// ---------------------------------------------------------------------------

/** Floor of the mean confidence over the critical attributes that resolved to a value; 0 when none did. */
export function overallConfidence(evidence: ClassificationEvidence): number {
  const confidences = criticalAttributes
    .filter((kind) => evidence[kind].value !== null)
    .map((kind) => evidence[kind].confidence);
  if (confidences.length === 0) return 0;
  const sum = confidences.reduce((acc, c) => acc + c, 0);
  return Math.floor(sum / confidences.length);
}

export function classSource(evidence: ClassificationEvidence): ClassSource {
  const sources = attributeKinds.map((kind) => evidence[kind].source);
  if (sources.includes("MANUAL")) return "MANUAL";
  if (sources.includes("CATEGORY_DEFAULT")) return "CATEGORY_DEFAULT";
  return "RULES";
}

export function ambiguousAttributes(evidence: ClassificationEvidence): AttributeKind[] {
  return attributeKinds.filter((kind) => evidence[kind].value === null);
}

export function classNotes(evidence: ClassificationEvidence, overall: number): string {
  const notes = [`Overall confidence: ${overall}%`];
  const source = attributeKinds.map((kind) => evidence[kind].source);
  if (source.includes("MANUAL")) notes.push("Contains manual overrides");
  if (source.includes("CATEGORY_DEFAULT")) notes.push("Uses category defaults");

  const ambiguous = ambiguousAttributes(evidence);
  if (ambiguous.length > 0) notes.push(`Ambiguous: ${ambiguous.join(", ")}`);

  return notes.join(". ");
}

export interface ReviewableItem {
  active: boolean;
  classConfidence: number | null;
  fragility: ClassifiedAttributes["fragility"];
  spillRisk: ClassifiedAttributes["spillRisk"];
  pressureSensitivity: ClassifiedAttributes["pressureSensitivity"];
  temperatureSensitivity: ClassifiedAttributes["temperatureSensitivity"];
  boxFitRule: ClassifiedAttributes["boxFitRule"];
}

/** Critical attributes still unresolved on the item. */
export function missingCriticalAttributes(item: ReviewableItem): AttributeKind[] {
  return criticalAttributes.filter((kind) => item[kind] === null);
}

/**
 * Derived, never stored. Inactive items never need review; an item never
 * classified (no confidence) always does.
 */
export function needsReview(item: ReviewableItem, threshold: number = DEFAULT_CONFIDENCE_THRESHOLD): boolean {
  if (!item.active) return false;
  if (missingCriticalAttributes(item).length > 0) return true;
  return (item.classConfidence ?? 0) < threshold;
}
