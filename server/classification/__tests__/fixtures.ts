import type { ClassifiableItem, ClassificationEvidence } from "../types";

export function makeItem(overrides: Partial<ClassifiableItem> = {}): ClassifiableItem {
  return {
    itemCode: "SKU-1",
    itemName: "Plain Widget",
    active: true,
    categoryCode: null,
    brandCode: null,
    attribute1Code: null,
    weightKg: null,
    lengthCm: null,
    widthCm: null,
    heightCm: null,
    pieces: null,
    unitType: null,
    spillRisk: null,
    fragility: null,
    pressureSensitivity: null,
    stackability: null,
    temperatureSensitivity: null,
    shapeType: null,
    pickDifficulty: null,
    shelfHeight: null,
    boxFitRule: null,
    zone: null,
    ...overrides,
  };
}

export function makeEvidence(overrides: Partial<ClassificationEvidence> = {}): ClassificationEvidence {
  return {
    unitType: { value: "item", confidence: 90, source: "RULES", reason: "test" },
    spillRisk: { value: false, confidence: 70, source: "RULES", reason: "test" },
    fragility: { value: "NO", confidence: 70, source: "RULES", reason: "test" },
    pressureSensitivity: { value: "low", confidence: 70, source: "RULES", reason: "test" },
    stackability: { value: "YES", confidence: 70, source: "RULES", reason: "test" },
    temperatureSensitivity: { value: "normal", confidence: 70, source: "RULES", reason: "test" },
    shapeType: { value: "cubic", confidence: 70, source: "RULES", reason: "test" },
    pickDifficulty: { value: 2, confidence: 70, source: "RULES", reason: "test" },
    shelfHeight: { value: "MID", confidence: 70, source: "RULES", reason: "test" },
    boxFitRule: { value: "MIDDLE", confidence: 70, source: "RULES", reason: "test" },
    zone: { value: "MAIN", confidence: 70, source: "RULES", reason: "test" },
    ...overrides,
  };
}
