import {
  type Item,
  type ItemClassificationUpdate,
  type CategoryDefault,
  type InsertCategoryDefault,
  type ItemOverride,
  type InsertItemOverride,
  type ClassificationRun,
  type InsertClassificationRun,
  type Order,
  type OrderLine,
  type InsertOrderEstimate,
  type Setting,
  type SettingKey,
  items,
  categoryDefaults,
  itemOverrides,
  classificationRuns,
  orders,
  orderLines,
  orderEstimates,
  settings,
} from "@shared/schema";
import { db } from "./db";
import { eq, inArray, and, desc, asc } from "drizzle-orm";

export interface LineMinutes {
  lineId: number;
  expectedMinutes: number;
}

export interface ItemClassificationWrite {
  itemCode: string;
  update: ItemClassificationUpdate;
}

export interface OrderEstimateWrite {
  orderId: number;
  totalMinutes: number;
  estimatedAt: Date;
  lines: LineMinutes[];
  snapshot: InsertOrderEstimate;
}

export interface IStorage {
  // Items
  getActiveItems(): Promise<Item[]>;
  getItemByCode(itemCode: string): Promise<Item | undefined>;
  getItemsByCodes(itemCodes: string[]): Promise<Item[]>;
  /** All or nothing: a failed write leaves every item as it was. */
  applyClassificationResults(writes: ItemClassificationWrite[]): Promise<void>;

  // Category defaults & item overrides
  getActiveCategoryDefaults(): Promise<CategoryDefault[]>;
  getActiveItemOverrides(): Promise<ItemOverride[]>;
  upsertCategoryDefault(data: InsertCategoryDefault): Promise<CategoryDefault>;
  upsertItemOverride(data: InsertItemOverride): Promise<ItemOverride>;

  // Classification runs
  createClassificationRun(data: InsertClassificationRun): Promise<ClassificationRun>;
  finishClassificationRun(id: number, updates: Partial<InsertClassificationRun>): Promise<ClassificationRun | undefined>;
  getRecentClassificationRuns(limit: number): Promise<ClassificationRun[]>;

  // Settings
  getSetting(key: SettingKey): Promise<Setting | undefined>;
  setSetting(key: SettingKey, value: unknown, updatedBy: string | null): Promise<Setting>;

  // Orders
  getOrderById(id: number): Promise<Order | undefined>;
  getOrderLines(orderId: number): Promise<OrderLine[]>;
  getOrderIdsByStatus(statuses: string[], limit: number): Promise<number[]>;
  saveOrderEstimate(write: OrderEstimateWrite): Promise<void>;
}

export class DatabaseStorage implements IStorage {
  // Item methods
  async getActiveItems(): Promise<Item[]> {
    return await db.select().from(items).where(eq(items.active, true)).orderBy(asc(items.itemCode));
  }

  async getItemByCode(itemCode: string): Promise<Item | undefined> {
    const result = await db.select().from(items).where(eq(items.itemCode, itemCode));
    return result[0];
  }

  async getItemsByCodes(itemCodes: string[]): Promise<Item[]> {
    if (itemCodes.length === 0) return [];
    return await db.select().from(items).where(inArray(items.itemCode, itemCodes));
  }

  async applyClassificationResults(writes: ItemClassificationWrite[]): Promise<void> {
    if (writes.length === 0) return;
    await db.transaction(async (tx) => {
      for (const write of writes) {
        await tx.update(items).set(write.update).where(eq(items.itemCode, write.itemCode));
      }
    });
  }

  // Category default / override methods
  async getActiveCategoryDefaults(): Promise<CategoryDefault[]> {
    return await db.select().from(categoryDefaults).where(eq(categoryDefaults.isActive, true));
  }

  async getActiveItemOverrides(): Promise<ItemOverride[]> {
    return await db.select().from(itemOverrides).where(eq(itemOverrides.isActive, true));
  }

  async upsertCategoryDefault(data: InsertCategoryDefault): Promise<CategoryDefault> {
    const values = { ...data, categoryCode: data.categoryCode.toUpperCase(), updatedAt: new Date() };
    const result = await db
      .insert(categoryDefaults)
      .values(values)
      .onConflictDoUpdate({ target: categoryDefaults.categoryCode, set: values })
      .returning();
    return result[0];
  }

  async upsertItemOverride(data: InsertItemOverride): Promise<ItemOverride> {
    const values = { ...data, updatedAt: new Date() };
    const result = await db
      .insert(itemOverrides)
      .values(values)
      .onConflictDoUpdate({ target: itemOverrides.itemCode, set: values })
      .returning();
    return result[0];
  }

  // Classification run methods
  async createClassificationRun(data: InsertClassificationRun): Promise<ClassificationRun> {
    const result = await db.insert(classificationRuns).values(data).returning();
    return result[0];
  }

  async finishClassificationRun(
    id: number,
    updates: Partial<InsertClassificationRun>,
  ): Promise<ClassificationRun | undefined> {
    const result = await db
      .update(classificationRuns)
      .set({ ...updates, finishedAt: updates.finishedAt ?? new Date() })
      .where(eq(classificationRuns.id, id))
      .returning();
    return result[0];
  }

  async getRecentClassificationRuns(limit: number): Promise<ClassificationRun[]> {
    return await db.select().from(classificationRuns).orderBy(desc(classificationRuns.startedAt)).limit(limit);
  }

  // Setting methods
  async getSetting(key: SettingKey): Promise<Setting | undefined> {
    const result = await db.select().from(settings).where(eq(settings.key, key));
    return result[0];
  }

  async setSetting(key: SettingKey, value: unknown, updatedBy: string | null): Promise<Setting> {
    const values = { key, value, updatedBy, updatedAt: new Date() };
    const result = await db
      .insert(settings)
      .values(values)
      .onConflictDoUpdate({ target: settings.key, set: values })
      .returning();
    return result[0];
  }

  // Order methods
  async getOrderById(id: number): Promise<Order | undefined> {
    const result = await db.select().from(orders).where(eq(orders.id, id));
    return result[0];
  }

  async getOrderLines(orderId: number): Promise<OrderLine[]> {
    return await db.select().from(orderLines).where(eq(orderLines.orderId, orderId)).orderBy(asc(orderLines.id));
  }

  async getOrderIdsByStatus(statuses: string[], limit: number): Promise<number[]> {
    if (statuses.length === 0) return [];
    const result = await db
      .select({ id: orders.id })
      .from(orders)
      .where(inArray(orders.status, statuses))
      .orderBy(asc(orders.createdAt))
      .limit(limit);
    return result.map((row) => row.id);
  }

  async saveOrderEstimate(write: OrderEstimateWrite): Promise<void> {
    await db.transaction(async (tx) => {
      for (const line of write.lines) {
        await tx
          .update(orderLines)
          .set({ expectedMinutes: line.expectedMinutes })
          .where(and(eq(orderLines.id, line.lineId), eq(orderLines.orderId, write.orderId)));
      }

      await tx
        .update(orders)
        .set({ totalExpectedMinutes: write.totalMinutes, estimatedAt: write.estimatedAt })
        .where(eq(orders.id, write.orderId));

      await tx.insert(orderEstimates).values(write.snapshot);
    });
  }
}

export const storage = new DatabaseStorage();
