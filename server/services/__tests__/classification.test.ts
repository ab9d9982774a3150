import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ClassificationError, createClassificationService } from "../classification";
import { createSettingsService } from "../settings";
import { MemoryStorage, makeItemRow } from "./memory-storage";

const NOW = new Date("2024-06-01T08:00:00Z");

const vodka = makeItemRow({
  itemCode: "ALD-001",
  itemName: "Premium Vodka 70cl",
  categoryCode: "ALD",
  attribute1Code: "EA",
  weightKg: 1.2,
});

describe("ClassificationService", () => {
  let storage: MemoryStorage;

  const service = () => createClassificationService(storage, createSettingsService(storage), () => NOW);

  beforeEach(() => {
    storage = new MemoryStorage();
    storage.items = [vodka, makeItemRow({ itemCode: "SKU-2" }), makeItemRow({ itemCode: "OLD-1", active: false })];
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("runClassification", () => {
    it("writes results and records the run", async () => {
      const summary = await service().runClassification({ runBy: "ops" });

      expect(summary.threshold).toBe(60);
      expect(summary.summerMode).toBe(false);
      expect(summary.stats).toEqual({ itemsScanned: 2, itemsUpdated: 2, itemsNeedingReview: 1, itemsFailed: 0 });
      expect(summary.run).toMatchObject({
        id: 1,
        runBy: "ops",
        mode: "moderate_60",
        finishedAt: NOW,
        itemsScanned: 2,
        itemsUpdated: 2,
        itemsNeedingReview: 1,
        itemsFailed: 0,
        notes: "Threshold 60, summer mode off, 0 failed",
      });

      const stored = await storage.getItemByCode("ALD-001");
      expect(stored).toMatchObject({
        fragility: "YES",
        spillRisk: true,
        boxFitRule: "TOP",
        classConfidence: 82,
        classSource: "RULES",
        classNotes: "Overall confidence: 82%. Ambiguous: shelfHeight",
        classifiedAt: NOW,
      });
      expect(stored?.classEvidence).toMatchObject({
        fragility: { value: "YES", confidence: 90, source: "RULES", reason: "Fragile category ALD" },
      });

      const inactive = await storage.getItemByCode("OLD-1");
      expect(inactive?.classifiedAt).toBeNull();
    });

    it("uses an explicit threshold and summer mode", async () => {
      const summary = await service().runClassification({ runBy: "ops", threshold: 40, summerMode: true });

      expect(summary.run.mode).toBe("moderate_40");
      expect(summary.run.notes).toBe("Threshold 40, summer mode on, 0 failed");
    });

    it("rejects a threshold outside 0-100 before starting a run", async () => {
      const attempt = service().runClassification({ runBy: "ops", threshold: 101 });

      await expect(attempt).rejects.toBeInstanceOf(ClassificationError);
      expect(storage.runs).toHaveLength(0);
    });

    it("matches category defaults regardless of case", async () => {
      storage.items = [makeItemRow({ itemCode: "SKU-9", categoryCode: "zzz" })];
      await service().upsertCategoryDefault({ categoryCode: "ZZZ", defaultZone: "CROSS_SHIPPING", updatedBy: "ops" });

      await service().runClassification({ runBy: "ops" });

      const stored = await storage.getItemByCode("SKU-9");
      expect(stored?.zone).toBe("CROSS_SHIPPING");
      expect(stored?.classSource).toBe("CATEGORY_DEFAULT");
    });

    it("applies manual overrides on the next run", async () => {
      await service().upsertItemOverride({
        itemCode: "SKU-2",
        fragilityOverride: "YES",
        pressureSensitivityOverride: "low",
        updatedBy: "ops",
      });

      await service().runClassification({ runBy: "ops" });

      const stored = await storage.getItemByCode("SKU-2");
      expect(stored?.fragility).toBe("YES");
      expect(stored?.stackability).toBe("NO");
      expect(stored?.classSource).toBe("MANUAL");
    });

    it("closes the run as failed when the write throws", async () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      vi.spyOn(storage, "applyClassificationResults").mockRejectedValue(new Error("disk full"));

      await expect(service().runClassification({ runBy: "ops" })).rejects.toThrow("disk full");

      expect(storage.runs).toHaveLength(1);
      expect(storage.runs[0]).toMatchObject({ notes: "Failed: disk full", finishedAt: NOW, itemsScanned: null });
    });

    it("leaves every item untouched when one write in the batch fails", async () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      storage.failClassificationWriteFor = "SKU-2";

      await expect(service().runClassification({ runBy: "ops" })).rejects.toThrow("connection reset");

      const first = await storage.getItemByCode("ALD-001");
      expect(first?.fragility).toBeNull();
      expect(first?.classifiedAt).toBeNull();
      expect(storage.runs[0].notes).toBe("Failed: connection reset");
    });
  });

  describe("review queue", () => {
    it("lists active items that need review with their missing critical attributes", async () => {
      await service().runClassification({ runBy: "ops" });

      const queue = await service().getItemsNeedingReview();

      expect(queue.map((view) => view.item.itemCode)).toEqual(["SKU-2"]);
      expect(queue[0].missingCritical).toEqual([
        "fragility",
        "spillRisk",
        "pressureSensitivity",
        "temperatureSensitivity",
        "boxFitRule",
      ]);
    });

    it("treats never-classified items as needing review", async () => {
      const queue = await service().getItemsNeedingReview();
      expect(queue.map((view) => view.item.itemCode)).toEqual(["ALD-001", "SKU-2"]);
    });
  });

  describe("getItemClassification", () => {
    it("returns the stored classification", async () => {
      await service().runClassification({ runBy: "ops" });

      const view = await service().getItemClassification("ALD-001");

      expect(view.needsReview).toBe(false);
      expect(view.missingCritical).toEqual([]);
      expect(view.item.classConfidence).toBe(82);
    });

    it("answers 404 for an unknown item", async () => {
      await expect(service().getItemClassification("NOPE")).rejects.toMatchObject({
        name: "ClassificationError",
        statusCode: 404,
      });
    });
  });

  describe("upsertItemOverride", () => {
    it("refuses overrides for unknown items", async () => {
      await expect(service().upsertItemOverride({ itemCode: "NOPE", zoneOverride: "MAIN" })).rejects.toMatchObject({
        statusCode: 404,
      });
      expect(storage.itemOverrides).toHaveLength(0);
    });
  });

  describe("getRecentRuns", () => {
    it("returns the newest run first", async () => {
      await service().runClassification({ runBy: "first" });
      await service().runClassification({ runBy: "second" });

      const runs = await service().getRecentRuns(1);
      expect(runs.map((run) => run.runBy)).toEqual(["second"]);
    });
  });
});
