import { pgTable, text, varchar, integer, timestamp, jsonb, boolean, doublePrecision, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Classification enums
// ---------------------------------------------------------------------------

export const unitTypeEnum = ["item", "pack", "box", "case", "virtual_pack"] as const;
export type UnitType = typeof unitTypeEnum[number];

export const fragilityEnum = ["YES", "SEMI", "NO"] as const;
export type Fragility = typeof fragilityEnum[number];

export const stackabilityEnum = ["YES", "LIMITED", "NO"] as const;
export type Stackability = typeof stackabilityEnum[number];

export const temperatureSensitivityEnum = ["normal", "heat_sensitive", "cool_required"] as const;
export type TemperatureSensitivity = typeof temperatureSensitivityEnum[number];

export const pressureSensitivityEnum = ["low", "medium", "high"] as const;
export type PressureSensitivity = typeof pressureSensitivityEnum[number];

export const shapeTypeEnum = ["cubic", "flat", "round", "irregular"] as const;
export type ShapeType = typeof shapeTypeEnum[number];

export const shelfHeightEnum = ["LOW", "MID", "HIGH"] as const;
export type ShelfHeight = typeof shelfHeightEnum[number];

export const boxFitRuleEnum = ["BOTTOM", "MIDDLE", "TOP", "COOLER_BAG"] as const;
export type BoxFitRule = typeof boxFitRuleEnum[number];

export const warehouseZoneEnum = ["MAIN", "SENSITIVE", "SNACKS", "CROSS_SHIPPING"] as const;
export type WarehouseZone = typeof warehouseZoneEnum[number];

export const classSourceEnum = ["RULES", "CATEGORY_DEFAULT", "MANUAL"] as const;
export type ClassSource = typeof classSourceEnum[number];

// ---------------------------------------------------------------------------
// Items (synced from the ERP item master; classification columns owned here)
// ---------------------------------------------------------------------------

export const items = pgTable("items", {
  itemCode: varchar("item_code", { length: 64 }).primaryKey(),
  itemName: text("item_name").notNull(),
  active: boolean("active").notNull().default(true),

  // Raw signals from the item master
  categoryCode: varchar("category_code", { length: 64 }),
  brandCode: varchar("brand_code", { length: 64 }),
  attribute1Code: varchar("attribute_1_code", { length: 64 }), // Unit of measure code (EA, PAC, BOX, CASE, VPACK)
  attribute2Code: varchar("attribute_2_code", { length: 64 }),
  attribute3Code: varchar("attribute_3_code", { length: 64 }),
  attribute4Code: varchar("attribute_4_code", { length: 64 }),
  attribute5Code: varchar("attribute_5_code", { length: 64 }),
  attribute6Code: varchar("attribute_6_code", { length: 64 }),
  lengthCm: doublePrecision("length_cm"),
  widthCm: doublePrecision("width_cm"),
  heightCm: doublePrecision("height_cm"),
  weightKg: doublePrecision("weight_kg"),
  pieces: integer("pieces"),

  // Classification outputs
  zone: varchar("zone", { length: 50 }), // MAIN, SENSITIVE, SNACKS, CROSS_SHIPPING
  unitType: varchar("unit_type", { length: 50 }), // item, pack, box, case, virtual_pack
  fragility: varchar("fragility", { length: 20 }), // YES, SEMI, NO
  stackability: varchar("stackability", { length: 20 }), // YES, LIMITED, NO
  temperatureSensitivity: varchar("temperature_sensitivity", { length: 30 }),
  pressureSensitivity: varchar("pressure_sensitivity", { length: 20 }),
  shapeType: varchar("shape_type", { length: 30 }),
  spillRisk: boolean("spill_risk"),
  pickDifficulty: integer("pick_difficulty"), // 1-5
  shelfHeight: varchar("shelf_height", { length: 20 }),
  boxFitRule: varchar("box_fit_rule", { length: 30 }),

  // Audit / explainability
  classConfidence: integer("class_confidence"), // 0-100
  classSource: varchar("class_source", { length: 30 }),
  classNotes: text("class_notes"),
  classEvidence: jsonb("class_evidence"),
  classifiedAt: timestamp("classified_at"),

  lastSyncAt: timestamp("last_sync_at").defaultNow().notNull(),
}, (table) => [
  index("items_category_code_idx").on(table.categoryCode),
]);

export type Item = typeof items.$inferSelect;

// Columns a classification run writes back onto an item
export type ItemClassificationUpdate = Pick<
  typeof items.$inferInsert,
  | "zone"
  | "unitType"
  | "fragility"
  | "stackability"
  | "temperatureSensitivity"
  | "pressureSensitivity"
  | "shapeType"
  | "spillRisk"
  | "pickDifficulty"
  | "shelfHeight"
  | "boxFitRule"
  | "classConfidence"
  | "classSource"
  | "classNotes"
  | "classEvidence"
  | "classifiedAt"
>;

// ---------------------------------------------------------------------------
// Category defaults: a null column means "no forced default", never "force null"
// ---------------------------------------------------------------------------

export const categoryDefaults = pgTable("category_defaults", {
  categoryCode: varchar("category_code", { length: 64 }).primaryKey(),
  defaultZone: varchar("default_zone", { length: 50 }),
  defaultFragility: varchar("default_fragility", { length: 20 }),
  defaultStackability: varchar("default_stackability", { length: 20 }),
  defaultTemperatureSensitivity: varchar("default_temperature_sensitivity", { length: 30 }),
  defaultPressureSensitivity: varchar("default_pressure_sensitivity", { length: 20 }),
  defaultShapeType: varchar("default_shape_type", { length: 30 }),
  defaultSpillRisk: boolean("default_spill_risk"),
  defaultPickDifficulty: integer("default_pick_difficulty"),
  defaultShelfHeight: varchar("default_shelf_height", { length: 20 }),
  defaultBoxFitRule: varchar("default_box_fit_rule", { length: 30 }),
  isActive: boolean("is_active").notNull().default(true),
  notes: text("notes"),
  updatedBy: varchar("updated_by", { length: 100 }),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export const insertCategoryDefaultSchema = createInsertSchema(categoryDefaults, {
  defaultZone: z.enum(warehouseZoneEnum).nullish(),
  defaultFragility: z.enum(fragilityEnum).nullish(),
  defaultStackability: z.enum(stackabilityEnum).nullish(),
  defaultTemperatureSensitivity: z.enum(temperatureSensitivityEnum).nullish(),
  defaultPressureSensitivity: z.enum(pressureSensitivityEnum).nullish(),
  defaultShapeType: z.enum(shapeTypeEnum).nullish(),
  defaultPickDifficulty: z.number().int().min(1).max(5).nullish(),
  defaultShelfHeight: z.enum(shelfHeightEnum).nullish(),
  defaultBoxFitRule: z.enum(boxFitRuleEnum).nullish(),
}).omit({
  updatedAt: true,
});

export type InsertCategoryDefault = z.infer<typeof insertCategoryDefaultSchema>;
export type CategoryDefault = typeof categoryDefaults.$inferSelect;

// ---------------------------------------------------------------------------
// Item overrides: same null semantics as category defaults, but outrank them
// ---------------------------------------------------------------------------

export const itemOverrides = pgTable("item_overrides", {
  itemCode: varchar("item_code", { length: 64 }).primaryKey(),
  zoneOverride: varchar("zone_override", { length: 50 }),
  unitTypeOverride: varchar("unit_type_override", { length: 50 }),
  fragilityOverride: varchar("fragility_override", { length: 20 }),
  stackabilityOverride: varchar("stackability_override", { length: 20 }),
  temperatureSensitivityOverride: varchar("temperature_sensitivity_override", { length: 30 }),
  pressureSensitivityOverride: varchar("pressure_sensitivity_override", { length: 20 }),
  shapeTypeOverride: varchar("shape_type_override", { length: 30 }),
  spillRiskOverride: boolean("spill_risk_override"),
  pickDifficultyOverride: integer("pick_difficulty_override"),
  shelfHeightOverride: varchar("shelf_height_override", { length: 20 }),
  boxFitRuleOverride: varchar("box_fit_rule_override", { length: 30 }),
  overrideReason: text("override_reason"),
  isActive: boolean("is_active").notNull().default(true),
  updatedBy: varchar("updated_by", { length: 100 }),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export const insertItemOverrideSchema = createInsertSchema(itemOverrides, {
  zoneOverride: z.enum(warehouseZoneEnum).nullish(),
  unitTypeOverride: z.enum(unitTypeEnum).nullish(),
  fragilityOverride: z.enum(fragilityEnum).nullish(),
  stackabilityOverride: z.enum(stackabilityEnum).nullish(),
  temperatureSensitivityOverride: z.enum(temperatureSensitivityEnum).nullish(),
  pressureSensitivityOverride: z.enum(pressureSensitivityEnum).nullish(),
  shapeTypeOverride: z.enum(shapeTypeEnum).nullish(),
  pickDifficultyOverride: z.number().int().min(1).max(5).nullish(),
  shelfHeightOverride: z.enum(shelfHeightEnum).nullish(),
  boxFitRuleOverride: z.enum(boxFitRuleEnum).nullish(),
}).omit({
  updatedAt: true,
});

export type InsertItemOverride = z.infer<typeof insertItemOverrideSchema>;
export type ItemOverride = typeof itemOverrides.$inferSelect;

// ---------------------------------------------------------------------------
// Classification runs (append-only audit log)
// ---------------------------------------------------------------------------

export const classificationRuns = pgTable("classification_runs", {
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),
  startedAt: timestamp("started_at").defaultNow().notNull(),
  finishedAt: timestamp("finished_at"),
  runBy: varchar("run_by", { length: 100 }),
  mode: varchar("mode", { length: 30 }).default("moderate_60"), // moderate_<threshold>
  itemsScanned: integer("items_scanned"),
  itemsUpdated: integer("items_updated"),
  itemsNeedingReview: integer("items_needing_review"),
  itemsFailed: integer("items_failed"),
  notes: text("notes"),
});

export type ClassificationRun = typeof classificationRuns.$inferSelect;
export type InsertClassificationRun = typeof classificationRuns.$inferInsert;

// ---------------------------------------------------------------------------
// Orders & lines (imported by the order sync; expected-time columns owned here)
// ---------------------------------------------------------------------------

export const orders = pgTable("orders", {
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),
  orderNumber: varchar("order_number", { length: 50 }).notNull().unique(),
  status: varchar("status", { length: 30 }).notNull().default("not_started"),
  totalExpectedMinutes: doublePrecision("total_expected_minutes"),
  estimatedAt: timestamp("estimated_at"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type Order = typeof orders.$inferSelect;

export const orderLines = pgTable("order_lines", {
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),
  orderId: integer("order_id").notNull().references(() => orders.id, { onDelete: "cascade" }),
  itemCode: varchar("item_code", { length: 64 }),
  location: varchar("location", { length: 50 }), // e.g. 10-01-A02
  zone: varchar("zone", { length: 50 }),
  unitType: varchar("unit_type", { length: 50 }),
  quantity: integer("quantity").notNull().default(1),
  expectedMinutes: doublePrecision("expected_minutes"),
}, (table) => [
  index("order_lines_order_id_idx").on(table.orderId),
]);

export type OrderLine = typeof orderLines.$inferSelect;

// Snapshot of every persisted estimate, for explaining a number after params change
export const orderEstimates = pgTable("order_estimates", {
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),
  orderId: integer("order_id").notNull().references(() => orders.id, { onDelete: "cascade" }),
  reason: varchar("reason", { length: 30 }).notNull().default("manual"), // manual, batch, import
  totalMinutes: doublePrecision("total_minutes").notNull(),
  breakdown: jsonb("breakdown").notNull(),
  paramsVersion: varchar("params_version", { length: 30 }),
  paramsRevision: integer("params_revision"),
  summerMode: boolean("summer_mode").notNull().default(false),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export type OrderEstimateRow = typeof orderEstimates.$inferSelect;
export type InsertOrderEstimate = typeof orderEstimates.$inferInsert;

// ---------------------------------------------------------------------------
// Settings (key → JSON value)
// ---------------------------------------------------------------------------

export const settingKeyEnum = ["time_params", "time_params_revision", "summer_mode", "classification_threshold"] as const;
export type SettingKey = typeof settingKeyEnum[number];

export const settings = pgTable("settings", {
  key: varchar("key", { length: 100 }).primaryKey(),
  value: jsonb("value"),
  updatedBy: varchar("updated_by", { length: 100 }),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export type Setting = typeof settings.$inferSelect;
