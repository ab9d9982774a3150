import { describe, it, expect } from "vitest";
import {
  classNotes,
  classSource,
  needsReview,
  overallConfidence,
  resolveAttribute,
} from "../resolver";
import type { ReviewableItem } from "../resolver";
import { makeEvidence } from "./fixtures";

describe("resolveAttribute", () => {
  const computed = { value: "NO" as const, confidence: 45, reason: "No fragility signals" };

  it("prefers an item override over everything else", () => {
    expect(resolveAttribute("fragility", computed, "YES", "SEMI", 60)).toEqual({
      value: "YES",
      confidence: 100,
      source: "MANUAL",
      reason: "MANUAL override for fragility",
    });
  });

  it("uses the category default when there is no override", () => {
    expect(resolveAttribute("fragility", computed, null, "SEMI", 60)).toEqual({
      value: "SEMI",
      confidence: 85,
      source: "CATEGORY_DEFAULT",
      reason: "CATEGORY default for fragility",
    });
  });

  it("treats false as a real override value", () => {
    const liquid = { value: true, confidence: 90, reason: "Liquid category BEV" };
    expect(resolveAttribute("spillRisk", liquid, false, undefined, 60)).toMatchObject({ value: false, source: "MANUAL" });
  });

  it("keeps a rule value exactly at the threshold", () => {
    const atThreshold = { value: "MAIN" as const, confidence: 60, reason: "Default zone" };
    expect(resolveAttribute("zone", atThreshold, null, null, 60)).toEqual({
      value: "MAIN",
      confidence: 60,
      source: "RULES",
      reason: "Default zone",
    });
  });

  it("drops a rule value one point below the threshold", () => {
    const belowThreshold = { value: "MAIN" as const, confidence: 59, reason: "Default zone" };
    expect(resolveAttribute("zone", belowThreshold, null, null, 60)).toEqual({
      value: null,
      confidence: 59,
      source: "RULES",
      reason: "AMBIGUOUS (<60) - Default zone",
    });
  });
});

describe("item summaries", () => {
  it("floors the mean confidence of the resolved critical attributes", () => {
    const evidence = makeEvidence({
      fragility: { value: "YES", confidence: 90, source: "RULES", reason: "test" },
      spillRisk: { value: null, confidence: 30, source: "RULES", reason: "test" },
      pressureSensitivity: { value: "low", confidence: 50, source: "RULES", reason: "test" },
      temperatureSensitivity: { value: "normal", confidence: 60, source: "RULES", reason: "test" },
      boxFitRule: { value: "TOP", confidence: 85, source: "RULES", reason: "test" },
      // Not critical: ignored
      unitType: { value: "item", confidence: 0, source: "RULES", reason: "test" },
    });
    // spillRisk is unresolved: (90 + 50 + 60 + 85) / 4 = 71.25
    expect(overallConfidence(evidence)).toBe(71);
  });

  it("is 0 when no critical attribute resolved", () => {
    const unresolved = { value: null, confidence: 55, source: "RULES" as const, reason: "test" };
    const evidence = makeEvidence({
      fragility: unresolved,
      spillRisk: unresolved,
      pressureSensitivity: unresolved,
      temperatureSensitivity: unresolved,
      boxFitRule: unresolved,
    });
    expect(overallConfidence(evidence)).toBe(0);
  });

  it("reports MANUAL ahead of CATEGORY_DEFAULT", () => {
    const evidence = makeEvidence({
      zone: { value: "MAIN", confidence: 85, source: "CATEGORY_DEFAULT", reason: "CATEGORY default for zone" },
      fragility: { value: "YES", confidence: 100, source: "MANUAL", reason: "MANUAL override for fragility" },
    });
    expect(classSource(evidence)).toBe("MANUAL");
    expect(classSource(makeEvidence())).toBe("RULES");
  });

  it("summarizes overrides, defaults and ambiguous attributes", () => {
    const evidence = makeEvidence({
      fragility: { value: "YES", confidence: 100, source: "MANUAL", reason: "MANUAL override for fragility" },
      zone: { value: "MAIN", confidence: 85, source: "CATEGORY_DEFAULT", reason: "CATEGORY default for zone" },
      shelfHeight: { value: null, confidence: 35, source: "RULES", reason: "AMBIGUOUS (<60) - test" },
    });
    expect(classNotes(evidence, 76)).toBe(
      "Overall confidence: 76%. Contains manual overrides. Uses category defaults. Ambiguous: shelfHeight",
    );
  });
});

describe("needsReview", () => {
  const resolved: ReviewableItem = {
    active: true,
    classConfidence: 80,
    fragility: "NO",
    spillRisk: false,
    pressureSensitivity: "low",
    temperatureSensitivity: "normal",
    boxFitRule: "MIDDLE",
  };

  it("is false for a confidently classified item", () => {
    expect(needsReview(resolved)).toBe(false);
  });

  it("is true when a critical attribute is missing", () => {
    expect(needsReview({ ...resolved, boxFitRule: null })).toBe(true);
  });

  it("compares confidence against the threshold", () => {
    expect(needsReview({ ...resolved, classConfidence: 60 }, 60)).toBe(false);
    expect(needsReview({ ...resolved, classConfidence: 59 }, 60)).toBe(true);
    expect(needsReview({ ...resolved, classConfidence: 70 }, 75)).toBe(true);
  });

  it("flags items that were never classified", () => {
    expect(needsReview({ ...resolved, classConfidence: null })).toBe(true);
  });

  it("never flags inactive items", () => {
    expect(needsReview({ ...resolved, active: false, fragility: null, classConfidence: 0 })).toBe(false);
  });
});
