import { describe, it, expect } from "vitest";
import { evaluateAttribute } from "../rules";
import type {
  PressureSensitivity,
  ShapeType,
  ShelfHeight,
  Stackability,
  TemperatureSensitivity,
  WarehouseZone,
} from "@shared/schema";
import type { AttributeInputs, ClassifiableItem, RuleContext } from "../types";
import { makeItem } from "./fixtures";

const ctx = (resolved: AttributeInputs = {}, summerMode = false): RuleContext => ({ resolved, summerMode });

describe("attribute rules", () => {
  describe("spirits in glass (category ALD)", () => {
    const vodka = makeItem({ categoryCode: "ALD", itemName: "Premium Vodka 70cl" });

    it("is fragile from the category table", () => {
      expect(evaluateAttribute("fragility", vodka, ctx())).toEqual({
        value: "YES",
        confidence: 90,
        reason: "Fragile category ALD",
      });
    });

    it("is a liquid", () => {
      expect(evaluateAttribute("spillRisk", vodka, ctx())).toMatchObject({ value: true, confidence: 90 });
    });

    it("is round", () => {
      expect(evaluateAttribute("shapeType", vodka, ctx())).toMatchObject({ value: "round", confidence: 80 });
    });

    it("is medium pressure sensitive", () => {
      expect(evaluateAttribute("pressureSensitivity", vodka, ctx())).toMatchObject({ value: "medium", confidence: 85 });
    });
  });

  describe("unitType", () => {
    it("maps the unit code case-insensitively", () => {
      expect(evaluateAttribute("unitType", makeItem({ attribute1Code: "pac" }), ctx())).toMatchObject({
        value: "pack",
        confidence: 90,
      });
    });

    it("falls back to item with low confidence for unknown codes", () => {
      expect(evaluateAttribute("unitType", makeItem({ attribute1Code: "XYZ" }), ctx())).toEqual({
        value: "item",
        confidence: 40,
        reason: "Unknown unit code XYZ, assumed item",
      });
    });

    it("falls back to item when there is no code", () => {
      expect(evaluateAttribute("unitType", makeItem(), ctx())).toMatchObject({ value: "item", confidence: 40 });
    });
  });

  describe("spillRisk", () => {
    it("detects a volume in the name", () => {
      expect(evaluateAttribute("spillRisk", makeItem({ itemName: "Orange Juice 500ml" }), ctx())).toEqual({
        value: true,
        confidence: 75,
        reason: "Volume in name: 500ml",
      });
    });

    it("reports the first liquid keyword in table order", () => {
      expect(evaluateAttribute("spillRisk", makeItem({ itemName: "Window Cleaner Spray" }), ctx())).toMatchObject({
        value: true,
        confidence: 75,
        reason: "Liquid keyword: spray",
      });
    });

    it("only matches whole words", () => {
      expect(evaluateAttribute("spillRisk", makeItem({ itemName: "Ginger Biscuits" }), ctx())).toEqual({
        value: false,
        confidence: 30,
        reason: "No liquid signals",
      });
    });
  });

  describe("fragility", () => {
    it("uses the semi-fragile category value", () => {
      expect(evaluateAttribute("fragility", makeItem({ categoryCode: "BIS" }), ctx())).toMatchObject({
        value: "SEMI",
        confidence: 90,
      });
    });

    it("treats glass bottle categories as fragile", () => {
      expect(evaluateAttribute("fragility", makeItem({ categoryCode: "olv" }), ctx())).toEqual({
        value: "YES",
        confidence: 85,
        reason: "Glass bottle category OLV",
      });
    });

    it("matches plural keywords", () => {
      expect(evaluateAttribute("fragility", makeItem({ itemName: "Crystal Wine Glasses" }), ctx())).toEqual({
        value: "YES",
        confidence: 70,
        reason: "Fragile keyword: glass",
      });
    });

    it("is NO below the default threshold without signals", () => {
      expect(evaluateAttribute("fragility", makeItem({ itemName: "Steel Bucket" }), ctx())).toMatchObject({
        value: "NO",
        confidence: 45,
      });
    });
  });

  describe("pressureSensitivity", () => {
    it.each<[Partial<ClassifiableItem>, PressureSensitivity, number]>([
      [{ categoryCode: "CRI" }, "high", 90],
      [{ categoryCode: "OLV" }, "medium", 80],
      [{ itemName: "Salted Chips" }, "high", 75],
      [{ itemName: "Paper Towels", attribute1Code: "CASE" }, "low", 70],
      [{ itemName: "Paper Towels" }, "low", 50],
    ])("%o → %s (%i)", (overrides, value, confidence) => {
      expect(evaluateAttribute("pressureSensitivity", makeItem(overrides), ctx())).toMatchObject({ value, confidence });
    });
  });

  describe("temperatureSensitivity", () => {
    it.each<[Partial<ClassifiableItem>, TemperatureSensitivity, number]>([
      [{ categoryCode: "FRO" }, "cool_required", 95],
      [{ categoryCode: "CHO" }, "heat_sensitive", 90],
      [{ itemName: "Vanilla Ice Cream Tub" }, "cool_required", 80],
      [{ itemName: "Scented Candle" }, "heat_sensitive", 75],
      [{ categoryCode: "MAG" }, "normal", 60],
      [{ categoryCode: "ZZZ" }, "normal", 40],
    ])("%o → %s (%i)", (overrides, value, confidence) => {
      expect(evaluateAttribute("temperatureSensitivity", makeItem(overrides), ctx())).toMatchObject({
        value,
        confidence,
      });
    });
  });

  describe("shapeType", () => {
    it.each<[Partial<ClassifiableItem>, ShapeType, number]>([
      [{ categoryCode: "MAG" }, "flat", 80],
      [{ itemName: "Glass Jar" }, "round", 70],
      [{ itemName: "Tool Kit" }, "irregular", 65],
      [{ itemName: "Wooden Candle Holder" }, "cubic", 55],
    ])("%o → %s (%i)", (overrides, value, confidence) => {
      expect(evaluateAttribute("shapeType", makeItem(overrides), ctx())).toMatchObject({ value, confidence });
    });
  });

  describe("shelfHeight", () => {
    it.each<[number | null, ShelfHeight | null, number]>([
      [9, "LOW", 70],
      [5, "MID", 60],
      [4, null, 35],
      [null, null, 35],
    ])("weight %s → %s (%i)", (weightKg, value, confidence) => {
      expect(evaluateAttribute("shelfHeight", makeItem({ weightKg }), ctx())).toMatchObject({ value, confidence });
    });
  });

  describe("stackability", () => {
    it.each<[AttributeInputs, Stackability, number]>([
      [{ fragility: "YES", pressureSensitivity: "low" }, "NO", 85],
      [{ fragility: "NO", pressureSensitivity: "high" }, "NO", 85],
      [{ fragility: "SEMI", pressureSensitivity: "low" }, "LIMITED", 75],
      [{ fragility: "NO", pressureSensitivity: "medium" }, "LIMITED", 75],
      [{ fragility: "NO", pressureSensitivity: "low" }, "YES", 70],
      [{ fragility: null, pressureSensitivity: "low" }, "YES", 40],
    ])("%o → %s (%i)", (resolved, value, confidence) => {
      expect(evaluateAttribute("stackability", makeItem(), ctx(resolved))).toMatchObject({ value, confidence });
    });
  });

  describe("pickDifficulty", () => {
    it("clamps the score at 5", () => {
      const item = makeItem({ weightKg: 12 });
      expect(evaluateAttribute("pickDifficulty", item, ctx({ fragility: "YES", pressureSensitivity: "high" }))).toEqual({
        value: 5,
        confidence: 70,
        reason: "Difficulty 5: heavy, fragile, high pressure",
      });
    });

    it("raises confidence for moderately heavy items", () => {
      const item = makeItem({ weightKg: 6 });
      expect(evaluateAttribute("pickDifficulty", item, ctx({ fragility: "NO", pressureSensitivity: "low" }))).toMatchObject({
        value: 3,
        confidence: 65,
      });
    });

    it("scores light plain items as 2", () => {
      const item = makeItem({ weightKg: 1 });
      expect(evaluateAttribute("pickDifficulty", item, ctx({ fragility: "NO", pressureSensitivity: "low" }))).toEqual({
        value: 2,
        confidence: 60,
        reason: "Difficulty 2: standard",
      });
    });

    it("is unresolved without weight or prerequisites", () => {
      expect(
        evaluateAttribute("pickDifficulty", makeItem(), ctx({ fragility: "NO", pressureSensitivity: "low" })),
      ).toMatchObject({ value: null, confidence: 35 });
      expect(
        evaluateAttribute("pickDifficulty", makeItem({ weightKg: 1 }), ctx({ pressureSensitivity: "low" })),
      ).toMatchObject({ value: null, confidence: 35 });
    });
  });

  describe("boxFitRule", () => {
    const plain = { fragility: "NO", spillRisk: false, pressureSensitivity: "low", temperatureSensitivity: "normal" } as const;

    it("uses a cooler bag for heat-sensitive items only in summer", () => {
      const resolved = { ...plain, temperatureSensitivity: "heat_sensitive" } as const;
      expect(evaluateAttribute("boxFitRule", makeItem(), ctx(resolved, true))).toMatchObject({
        value: "COOLER_BAG",
        confidence: 90,
      });
      expect(evaluateAttribute("boxFitRule", makeItem(), ctx(resolved, false))).toMatchObject({
        value: "MIDDLE",
        confidence: 75,
      });
    });

    it("puts heavy liquids at the bottom", () => {
      expect(
        evaluateAttribute("boxFitRule", makeItem({ weightKg: 3 }), ctx({ ...plain, spillRisk: true })),
      ).toMatchObject({ value: "BOTTOM", confidence: 85 });
      expect(
        evaluateAttribute("boxFitRule", makeItem({ weightKg: 1 }), ctx({ ...plain, spillRisk: true })),
      ).toMatchObject({ value: "BOTTOM", confidence: 75 });
    });

    it("puts fragile and crushable items on top", () => {
      expect(evaluateAttribute("boxFitRule", makeItem(), ctx({ ...plain, fragility: "YES" }))).toMatchObject({
        value: "TOP",
        confidence: 85,
      });
      expect(evaluateAttribute("boxFitRule", makeItem(), ctx({ ...plain, pressureSensitivity: "high" }))).toMatchObject({
        value: "TOP",
        confidence: 80,
      });
    });

    it("drops to low confidence when a prerequisite is unresolved", () => {
      expect(evaluateAttribute("boxFitRule", makeItem(), ctx({ ...plain, fragility: null }))).toEqual({
        value: "MIDDLE",
        confidence: 40,
        reason: "No special placement (unresolved: fragility)",
      });
    });

    it("has no value when nothing is resolved", () => {
      expect(evaluateAttribute("boxFitRule", makeItem(), ctx())).toEqual({
        value: null,
        confidence: 40,
        reason: "No prerequisites resolved",
      });
    });
  });

  describe("zone", () => {
    it.each<[Partial<ClassifiableItem>, AttributeInputs, WarehouseZone, number]>([
      [{ categoryCode: "CHO" }, {}, "SENSITIVE", 85],
      [{ categoryCode: "SNA" }, {}, "SNACKS", 85],
      [{}, { temperatureSensitivity: "cool_required" }, "SENSITIVE", 80],
      [{}, {}, "MAIN", 60],
    ])("%o %o → %s (%i)", (overrides, resolved, value, confidence) => {
      expect(evaluateAttribute("zone", makeItem(overrides), ctx(resolved))).toMatchObject({ value, confidence });
    });
  });
});
