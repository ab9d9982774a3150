/**
 * ClassificationService runs the attribute classifier over the item master
 * and records every run in `classification_runs`.
 *
 * The classifier itself is pure (../classification/engine); this service
 * loads its inputs, writes the results of successfully classified items in
 * one batch and appends the run row. Per-item failures are counted, not
 * fatal. A failure to load or write leaves every item unchanged, closes the
 * run row as failed and is rethrown.
 */

import type {
  CategoryDefault,
  ClassificationRun,
  InsertCategoryDefault,
  InsertClassificationRun,
  InsertItemOverride,
  Item,
  ItemOverride,
} from "@shared/schema";
import { runClassification } from "../classification/engine";
import type { ClassificationRunResult } from "../classification/engine";
import { confidenceThresholdSchema, missingCriticalAttributes, needsReview } from "../classification/resolver";
import type { AttributeKind, CategoryDefaultInput, ItemOverrideInput } from "../classification/types";
import {
  toCategoryDefaultInput,
  toClassifiableItem,
  toClassificationUpdate,
  toItemOverrideInput,
  toReviewableItem,
} from "../item-utils";
import type { ItemClassificationWrite } from "../storage";

// ---------------------------------------------------------------------------
// Dependency interfaces (minimal, only methods actually called)
// ---------------------------------------------------------------------------

type Storage = {
  getActiveItems(): Promise<Item[]>;
  getItemByCode(itemCode: string): Promise<Item | undefined>;
  applyClassificationResults(writes: ItemClassificationWrite[]): Promise<void>;
  getActiveCategoryDefaults(): Promise<CategoryDefault[]>;
  getActiveItemOverrides(): Promise<ItemOverride[]>;
  upsertCategoryDefault(data: InsertCategoryDefault): Promise<CategoryDefault>;
  upsertItemOverride(data: InsertItemOverride): Promise<ItemOverride>;
  createClassificationRun(data: InsertClassificationRun): Promise<ClassificationRun>;
  finishClassificationRun(id: number, updates: Partial<InsertClassificationRun>): Promise<ClassificationRun | undefined>;
  getRecentClassificationRuns(limit: number): Promise<ClassificationRun[]>;
};

type Settings = {
  getClassificationThreshold(): Promise<number>;
  getSummerMode(): Promise<boolean>;
};

// ---------------------------------------------------------------------------
// Error class
// ---------------------------------------------------------------------------

export class ClassificationError extends Error {
  constructor(
    message: string,
    public statusCode: number = 400,
  ) {
    super(message);
    this.name = "ClassificationError";
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunClassificationParams {
  runBy: string;
  threshold?: number;
  summerMode?: boolean;
}

export interface ClassificationRunSummary {
  run: ClassificationRun;
  threshold: number;
  summerMode: boolean;
  stats: ClassificationRunResult["stats"];
  failures: ClassificationRunResult["failures"];
}

export interface ItemClassificationView {
  item: Item;
  needsReview: boolean;
  missingCritical: AttributeKind[];
}

const RECENT_RUNS_DEFAULT = 20;

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class ClassificationService {
  constructor(
    private storage: Storage,
    private settings: Settings,
    private now: () => Date = () => new Date(),
  ) {}

  async runClassification(params: RunClassificationParams): Promise<ClassificationRunSummary> {
    const threshold = await this.resolveThreshold(params.threshold);
    const summerMode = params.summerMode ?? (await this.settings.getSummerMode());

    const run = await this.storage.createClassificationRun({
      runBy: params.runBy,
      mode: `moderate_${threshold}`,
      startedAt: this.now(),
    });
    console.log(`[Classification] Run #${run.id} started by ${params.runBy} (threshold ${threshold}, summer ${summerMode})`);

    try {
      const [itemRows, defaultRows, overrideRows] = await Promise.all([
        this.storage.getActiveItems(),
        this.storage.getActiveCategoryDefaults(),
        this.storage.getActiveItemOverrides(),
      ]);

      const defaults = new Map<string, CategoryDefaultInput>();
      for (const row of defaultRows) {
        const input = toCategoryDefaultInput(row);
        defaults.set(input.categoryCode.toUpperCase(), input);
      }
      const overrides = new Map<string, ItemOverrideInput>();
      for (const row of overrideRows) {
        overrides.set(row.itemCode, toItemOverrideInput(row));
      }

      const items = itemRows.map((row) => {
        const item = toClassifiableItem(row);
        return { ...item, categoryCode: item.categoryCode ? item.categoryCode.toUpperCase() : null };
      });

      const result = runClassification(items, defaults, overrides, {
        threshold,
        summerMode,
        classifiedAt: this.now(),
      });

      await this.storage.applyClassificationResults(
        result.results.map((classified) => ({ itemCode: classified.itemCode, update: toClassificationUpdate(classified) })),
      );
      for (const failure of result.failures) {
        console.error(`[Classification] Run #${run.id} item ${failure.itemCode} failed: ${failure.error}`);
      }

      const notes = [
        `Threshold ${threshold}`,
        `summer mode ${summerMode ? "on" : "off"}`,
        `${result.stats.itemsFailed} failed`,
      ].join(", ");

      const finished = await this.storage.finishClassificationRun(run.id, {
        finishedAt: this.now(),
        itemsScanned: result.stats.itemsScanned,
        itemsUpdated: result.stats.itemsUpdated,
        itemsNeedingReview: result.stats.itemsNeedingReview,
        itemsFailed: result.stats.itemsFailed,
        notes,
      });

      console.log(
        `[Classification] Run #${run.id} done: ${result.stats.itemsScanned} scanned, ` +
          `${result.stats.itemsUpdated} updated, ${result.stats.itemsNeedingReview} need review, ` +
          `${result.stats.itemsFailed} failed`,
      );

      return {
        run: finished ?? run,
        threshold,
        summerMode,
        stats: result.stats,
        failures: result.failures,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Classification] Run #${run.id} failed:`, error);
      await this.storage.finishClassificationRun(run.id, { finishedAt: this.now(), notes: `Failed: ${message}` });
      throw error;
    }
  }

  async getRecentRuns(limit: number = RECENT_RUNS_DEFAULT): Promise<ClassificationRun[]> {
    return this.storage.getRecentClassificationRuns(limit);
  }

  async getItemsNeedingReview(threshold?: number): Promise<ItemClassificationView[]> {
    const gate = await this.resolveThreshold(threshold);
    const rows = await this.storage.getActiveItems();
    return rows.map((row) => this.toView(row, gate)).filter((view) => view.needsReview);
  }

  async getItemClassification(itemCode: string): Promise<ItemClassificationView> {
    const row = await this.storage.getItemByCode(itemCode);
    if (!row) {
      throw new ClassificationError(`Item ${itemCode} not found`, 404);
    }
    return this.toView(row, await this.settings.getClassificationThreshold());
  }

  async upsertCategoryDefault(data: InsertCategoryDefault): Promise<CategoryDefault> {
    const saved = await this.storage.upsertCategoryDefault(data);
    console.log(`[Classification] Category default ${saved.categoryCode} saved by ${saved.updatedBy ?? "unknown"}`);
    return saved;
  }

  async upsertItemOverride(data: InsertItemOverride): Promise<ItemOverride> {
    const item = await this.storage.getItemByCode(data.itemCode);
    if (!item) {
      throw new ClassificationError(`Item ${data.itemCode} not found`, 404);
    }
    const saved = await this.storage.upsertItemOverride(data);
    console.log(`[Classification] Override for ${saved.itemCode} saved by ${saved.updatedBy ?? "unknown"}`);
    return saved;
  }

  // ---------------------------------------------------------------------------

  private async resolveThreshold(requested: number | undefined): Promise<number> {
    if (requested === undefined) return this.settings.getClassificationThreshold();
    const parsed = confidenceThresholdSchema.safeParse(requested);
    if (!parsed.success) {
      throw new ClassificationError(`Threshold must be an integer between 0 and 100, got ${requested}`);
    }
    return parsed.data;
  }

  private toView(row: Item, threshold: number): ItemClassificationView {
    const reviewable = toReviewableItem(row);
    return {
      item: row,
      needsReview: needsReview(reviewable, threshold),
      missingCritical: missingCriticalAttributes(reviewable),
    };
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createClassificationService(storage: Storage, settings: Settings, now?: () => Date) {
  return new ClassificationService(storage, settings, now);
}
