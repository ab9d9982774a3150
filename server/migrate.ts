import { db, pool } from "./db";
import { sql } from "drizzle-orm";

async function migrate() {
  console.log("Creating tables...");
  let failed = false;

  try {
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS "items" (
        "item_code" varchar(64) PRIMARY KEY,
        "item_name" text NOT NULL,
        "active" boolean DEFAULT true NOT NULL,
        "category_code" varchar(64),
        "brand_code" varchar(64),
        "attribute_1_code" varchar(64),
        "attribute_2_code" varchar(64),
        "attribute_3_code" varchar(64),
        "attribute_4_code" varchar(64),
        "attribute_5_code" varchar(64),
        "attribute_6_code" varchar(64),
        "length_cm" double precision,
        "width_cm" double precision,
        "height_cm" double precision,
        "weight_kg" double precision,
        "pieces" integer,
        "zone" varchar(50),
        "unit_type" varchar(50),
        "fragility" varchar(20),
        "stackability" varchar(20),
        "temperature_sensitivity" varchar(30),
        "pressure_sensitivity" varchar(20),
        "shape_type" varchar(30),
        "spill_risk" boolean,
        "pick_difficulty" integer,
        "shelf_height" varchar(20),
        "box_fit_rule" varchar(30),
        "class_confidence" integer,
        "class_source" varchar(30),
        "class_notes" text,
        "class_evidence" jsonb,
        "classified_at" timestamp,
        "last_sync_at" timestamp DEFAULT now() NOT NULL
      )
    `);
    await db.execute(sql`CREATE INDEX IF NOT EXISTS "items_category_code_idx" ON "items" ("category_code")`);
    console.log("✓ Created items table");

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS "category_defaults" (
        "category_code" varchar(64) PRIMARY KEY,
        "default_zone" varchar(50),
        "default_fragility" varchar(20),
        "default_stackability" varchar(20),
        "default_temperature_sensitivity" varchar(30),
        "default_pressure_sensitivity" varchar(20),
        "default_shape_type" varchar(30),
        "default_spill_risk" boolean,
        "default_pick_difficulty" integer,
        "default_shelf_height" varchar(20),
        "default_box_fit_rule" varchar(30),
        "is_active" boolean DEFAULT true NOT NULL,
        "notes" text,
        "updated_by" varchar(100),
        "updated_at" timestamp DEFAULT now() NOT NULL
      )
    `);
    console.log("✓ Created category_defaults table");

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS "item_overrides" (
        "item_code" varchar(64) PRIMARY KEY,
        "zone_override" varchar(50),
        "unit_type_override" varchar(50),
        "fragility_override" varchar(20),
        "stackability_override" varchar(20),
        "temperature_sensitivity_override" varchar(30),
        "pressure_sensitivity_override" varchar(20),
        "shape_type_override" varchar(30),
        "spill_risk_override" boolean,
        "pick_difficulty_override" integer,
        "shelf_height_override" varchar(20),
        "box_fit_rule_override" varchar(30),
        "override_reason" text,
        "is_active" boolean DEFAULT true NOT NULL,
        "updated_by" varchar(100),
        "updated_at" timestamp DEFAULT now() NOT NULL
      )
    `);
    console.log("✓ Created item_overrides table");

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS "classification_runs" (
        "id" integer PRIMARY KEY GENERATED ALWAYS AS IDENTITY,
        "started_at" timestamp DEFAULT now() NOT NULL,
        "finished_at" timestamp,
        "run_by" varchar(100),
        "mode" varchar(30) DEFAULT 'moderate_60',
        "items_scanned" integer,
        "items_updated" integer,
        "items_needing_review" integer,
        "items_failed" integer,
        "notes" text
      )
    `);
    console.log("✓ Created classification_runs table");

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS "orders" (
        "id" integer PRIMARY KEY GENERATED ALWAYS AS IDENTITY,
        "order_number" varchar(50) NOT NULL UNIQUE,
        "status" varchar(30) DEFAULT 'not_started' NOT NULL,
        "total_expected_minutes" double precision,
        "estimated_at" timestamp,
        "created_at" timestamp DEFAULT now() NOT NULL
      )
    `);
    console.log("✓ Created orders table");

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS "order_lines" (
        "id" integer PRIMARY KEY GENERATED ALWAYS AS IDENTITY,
        "order_id" integer NOT NULL REFERENCES "orders"("id") ON DELETE CASCADE,
        "item_code" varchar(64),
        "location" varchar(50),
        "zone" varchar(50),
        "unit_type" varchar(50),
        "quantity" integer DEFAULT 1 NOT NULL,
        "expected_minutes" double precision
      )
    `);
    await db.execute(sql`CREATE INDEX IF NOT EXISTS "order_lines_order_id_idx" ON "order_lines" ("order_id")`);
    console.log("✓ Created order_lines table");

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS "order_estimates" (
        "id" integer PRIMARY KEY GENERATED ALWAYS AS IDENTITY,
        "order_id" integer NOT NULL REFERENCES "orders"("id") ON DELETE CASCADE,
        "reason" varchar(30) DEFAULT 'manual' NOT NULL,
        "total_minutes" double precision NOT NULL,
        "breakdown" jsonb NOT NULL,
        "params_version" varchar(30),
        "params_revision" integer,
        "summer_mode" boolean DEFAULT false NOT NULL,
        "created_at" timestamp DEFAULT now() NOT NULL
      )
    `);
    console.log("✓ Created order_estimates table");

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS "settings" (
        "key" varchar(100) PRIMARY KEY,
        "value" jsonb,
        "updated_by" varchar(100),
        "updated_at" timestamp DEFAULT now() NOT NULL
      )
    `);
    console.log("✓ Created settings table");

    console.log("Migration complete!");
  } catch (error) {
    failed = true;
    console.error("Migration error:", error);
  } finally {
    await pool.end();
  }

  process.exit(failed ? 1 : 0);
}

migrate().catch((error) => {
  console.error("Migrate failed:", error);
  process.exit(1);
});
