import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SettingsError, createSettingsService } from "../settings";
import { DEFAULT_TIME_PARAMS, TimeParamsError } from "../../estimation/params";
import { MemoryStorage } from "./memory-storage";

describe("SettingsService", () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    storage = new MemoryStorage();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("time params", () => {
    it("uses the built-in defaults when nothing is stored", async () => {
      const settings = createSettingsService(storage);
      const active = await settings.getTimeParams();

      expect(active.params).toBe(DEFAULT_TIME_PARAMS);
      expect(active.revision).toBeNull();
      expect(active.fromSettings).toBe(false);
    });

    it("saves a valid set and bumps the revision each time", async () => {
      const settings = createSettingsService(storage);

      const first = await settings.saveTimeParams(
        { version: "v2", travel: { sec_align_per_stop: 10 }, pick: {}, pack: {} },
        "ops",
      );
      expect(first.revision).toBe(1);
      expect(first.params.travel.sec_align_per_stop).toBe(10);
      expect(first.params.travel.sec_per_bay_step).toBe(2.5);

      const second = await settings.saveTimeParams({ version: "v3", travel: {}, pick: {}, pack: {} }, "ops");
      expect(second.revision).toBe(2);
      expect(storage.settings.get("time_params_revision")?.value).toBe(2);

      const loaded = await settings.getTimeParams();
      expect(loaded.params.version).toBe("v3");
      expect(loaded.revision).toBe(2);
      expect(loaded.fromSettings).toBe(true);
    });

    it("rejects an invalid set without writing anything", async () => {
      const settings = createSettingsService(storage);

      await expect(settings.saveTimeParams({ travel: {}, pick: {} }, "ops")).rejects.toBeInstanceOf(TimeParamsError);
      expect(storage.settings.size).toBe(0);
    });

    it("falls back to the defaults when the stored set is invalid and nothing was active", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      await storage.setSetting("time_params", { travel: { sec_per_bay_step: -1 }, pick: {}, pack: {} }, "ops");

      const active = await createSettingsService(storage).getTimeParams();

      expect(active.params).toBe(DEFAULT_TIME_PARAMS);
      expect(active.fromSettings).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("keeps the previously active set when the stored set becomes invalid", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const settings = createSettingsService(storage);
      await settings.saveTimeParams({ version: "v2", travel: { sec_align_per_stop: 10 }, pick: {}, pack: {} }, "ops");
      await storage.setSetting("time_params", { version: "v3" }, "ops");

      const active = await settings.getTimeParams();

      expect(active.params.version).toBe("v2");
      expect(active.params.travel.sec_align_per_stop).toBe(10);
      expect(active.revision).toBe(1);
      expect(active.fromSettings).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("summer mode", () => {
    it("defaults to off and can be switched on", async () => {
      const settings = createSettingsService(storage);
      expect(await settings.getSummerMode()).toBe(false);

      await settings.setSummerMode(true, "ops");
      expect(await settings.getSummerMode()).toBe(true);
    });
  });

  describe("classification threshold", () => {
    it("defaults to 60", async () => {
      expect(await createSettingsService(storage).getClassificationThreshold()).toBe(60);
    });

    it("stores a valid threshold", async () => {
      const settings = createSettingsService(storage);
      await settings.setClassificationThreshold(75, "ops");
      expect(await settings.getClassificationThreshold()).toBe(75);
    });

    it.each([101, -1, 60.5])("rejects %s", async (threshold) => {
      const settings = createSettingsService(storage);
      const attempt = settings.setClassificationThreshold(threshold, "ops");

      await expect(attempt).rejects.toBeInstanceOf(SettingsError);
      await expect(attempt).rejects.toMatchObject({ statusCode: 400 });
      expect(storage.settings.has("classification_threshold")).toBe(false);
    });

    it("ignores an invalid stored threshold", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => undefined);
      await storage.setSetting("classification_threshold", "high", null);
      expect(await createSettingsService(storage).getClassificationThreshold()).toBe(60);
    });
  });
});
