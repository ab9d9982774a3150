import { db, pool } from "./db";
import { categoryDefaults, settings } from "@shared/schema";
import type { InsertCategoryDefault } from "@shared/schema";
import { DEFAULT_CONFIDENCE_THRESHOLD } from "./classification/resolver";
import { DEFAULT_TIME_PARAMS } from "./estimation/params";

const sampleCategoryDefaults: InsertCategoryDefault[] = [
  {
    categoryCode: "FRO",
    defaultZone: "SENSITIVE",
    defaultTemperatureSensitivity: "cool_required",
    defaultBoxFitRule: "COOLER_BAG",
    notes: "Frozen goods always travel in a cooler bag",
  },
  {
    categoryCode: "CHO",
    defaultZone: "SENSITIVE",
    defaultSpillRisk: false,
    defaultPressureSensitivity: "medium",
    notes: "Chocolate is heat sensitive; box fit follows summer mode",
  },
  {
    categoryCode: "SNA",
    defaultZone: "SNACKS",
    defaultSpillRisk: false,
    defaultFragility: "NO",
  },
];

async function seed() {
  console.log("Seeding settings and category defaults...");
  let failed = false;

  try {
    await db
      .insert(settings)
      .values([
        { key: "time_params", value: DEFAULT_TIME_PARAMS, updatedBy: "seed" },
        { key: "time_params_revision", value: 1, updatedBy: "seed" },
        { key: "summer_mode", value: false, updatedBy: "seed" },
        { key: "classification_threshold", value: DEFAULT_CONFIDENCE_THRESHOLD, updatedBy: "seed" },
      ])
      .onConflictDoNothing();
    console.log("✓ Seeded settings");

    for (const row of sampleCategoryDefaults) {
      await db.insert(categoryDefaults).values({ ...row, updatedBy: "seed" }).onConflictDoNothing();
    }
    console.log("✓ Seeded", sampleCategoryDefaults.length, "category defaults");
  } catch (error) {
    failed = true;
    console.error("Error seeding database:", error);
  } finally {
    await pool.end();
  }

  process.exit(failed ? 1 : 0);
}

seed().catch((error) => {
  console.error("Seed failed:", error);
  process.exit(1);
});
