/**
 * SettingsService: domain configuration kept in the `settings` table.
 *
 * Keys:
 *   - time_params               cost model parameters (validated by TimeParamsStore)
 *   - time_params_revision      bumped on every successful save
 *   - summer_mode               boolean, default false
 *   - classification_threshold  integer 0-100, default 60
 *
 * A stored time_params value that no longer validates is reported and the
 * previously active set stays in effect (the built-in defaults, before any
 * valid set was loaded).
 */

import { z } from "zod";
import type { Setting, SettingKey } from "@shared/schema";
import { DEFAULT_CONFIDENCE_THRESHOLD, confidenceThresholdSchema } from "../classification/resolver";
import { TimeParamsError, TimeParamsStore, loadTimeParams } from "../estimation/params";
import type { TimeParams } from "../estimation/params";

// ---------------------------------------------------------------------------
// Dependency interfaces (minimal, only methods actually called)
// ---------------------------------------------------------------------------

type Storage = {
  getSetting(key: SettingKey): Promise<Setting | undefined>;
  setSetting(key: SettingKey, value: unknown, updatedBy: string | null): Promise<Setting>;
};

// ---------------------------------------------------------------------------
// Error class
// ---------------------------------------------------------------------------

export class SettingsError extends Error {
  constructor(
    message: string,
    public statusCode: number = 400,
  ) {
    super(message);
    this.name = "SettingsError";
  }
}

export interface ActiveTimeParams {
  params: TimeParams;
  revision: number | null;
  /** False when the stored value was missing or invalid and was not applied. */
  fromSettings: boolean;
}

const revisionSchema = z.number().int().nonnegative();

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class SettingsService {
  constructor(
    private storage: Storage,
    private paramsStore: TimeParamsStore = new TimeParamsStore(),
  ) {}

  async getTimeParams(): Promise<ActiveTimeParams> {
    const [stored, revision] = await Promise.all([
      this.storage.getSetting("time_params"),
      this.getTimeParamsRevision(),
    ]);

    if (!stored || stored.value === null) {
      return { params: this.paramsStore.reset(), revision, fromSettings: false };
    }

    try {
      return { params: this.paramsStore.activate(stored.value), revision, fromSettings: true };
    } catch (error) {
      if (!(error instanceof TimeParamsError)) throw error;
      console.warn(`[Settings] Stored time_params rejected, keeping v${this.paramsStore.current.version}: ${error.message}`);
      return { params: this.paramsStore.current, revision, fromSettings: false };
    }
  }

  async saveTimeParams(raw: unknown, updatedBy: string | null): Promise<ActiveTimeParams> {
    // Throws TimeParamsError before anything is written
    const params = loadTimeParams(raw);

    const revision = ((await this.getTimeParamsRevision()) ?? 0) + 1;
    await this.storage.setSetting("time_params", params, updatedBy);
    await this.storage.setSetting("time_params_revision", revision, updatedBy);
    this.paramsStore.activate(params);

    console.log(`[Settings] time_params v${params.version} saved (revision ${revision}) by ${updatedBy ?? "unknown"}`);
    return { params, revision, fromSettings: true };
  }

  async getTimeParamsRevision(): Promise<number | null> {
    const stored = await this.storage.getSetting("time_params_revision");
    const parsed = revisionSchema.safeParse(stored?.value);
    return parsed.success ? parsed.data : null;
  }

  async getSummerMode(): Promise<boolean> {
    const stored = await this.storage.getSetting("summer_mode");
    return stored?.value === true;
  }

  async setSummerMode(enabled: boolean, updatedBy: string | null): Promise<boolean> {
    await this.storage.setSetting("summer_mode", enabled, updatedBy);
    console.log(`[Settings] summer_mode ${enabled ? "enabled" : "disabled"} by ${updatedBy ?? "unknown"}`);
    return enabled;
  }

  async getClassificationThreshold(): Promise<number> {
    const stored = await this.storage.getSetting("classification_threshold");
    if (!stored || stored.value === null) return DEFAULT_CONFIDENCE_THRESHOLD;

    const parsed = confidenceThresholdSchema.safeParse(stored.value);
    if (!parsed.success) {
      console.warn(
        `[Settings] Stored classification_threshold ${JSON.stringify(stored.value)} is invalid, using ${DEFAULT_CONFIDENCE_THRESHOLD}`,
      );
      return DEFAULT_CONFIDENCE_THRESHOLD;
    }
    return parsed.data;
  }

  async setClassificationThreshold(threshold: number, updatedBy: string | null): Promise<number> {
    const parsed = confidenceThresholdSchema.safeParse(threshold);
    if (!parsed.success) {
      throw new SettingsError(`Classification threshold must be an integer between 0 and 100, got ${threshold}`);
    }
    await this.storage.setSetting("classification_threshold", parsed.data, updatedBy);
    return parsed.data;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createSettingsService(storage: Storage, paramsStore?: TimeParamsStore) {
  return new SettingsService(storage, paramsStore);
}
