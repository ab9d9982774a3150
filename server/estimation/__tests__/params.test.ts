import { describe, it, expect } from "vitest";
import { DEFAULT_TIME_PARAMS, TimeParamsError, TimeParamsStore, loadTimeParams } from "../params";

const minimal = { travel: {}, pick: {}, pack: {} };

describe("loadTimeParams", () => {
  it("fills every missing key from the defaults", () => {
    expect(loadTimeParams(minimal)).toEqual(DEFAULT_TIME_PARAMS);
  });

  it("merges maps key by key over the defaults", () => {
    const params = loadTimeParams({ ...minimal, pick: { level_seconds: { B: 5, E: 20 } } });
    expect(params.pick.level_seconds).toEqual({ A: 0, B: 5, C: 12, D: 14, E: 20 });
    expect(params.pick.base_by_unit_type.case).toBe(13);
  });

  it("keeps explicit values and drops unknown keys", () => {
    const params = loadTimeParams({
      ...minimal,
      version: 7,
      travel: { sec_align_per_stop: 10, teleport_seconds: 1 },
      legacy: true,
    });
    expect(params.version).toBe("7");
    expect(params.travel.sec_align_per_stop).toBe(10);
    expect(params.travel.sec_per_bay_step).toBe(2.5);
    expect("teleport_seconds" in params.travel).toBe(false);
    expect("legacy" in params).toBe(false);
  });

  it("normalizes corridor and level codes", () => {
    const params = loadTimeParams({
      ...minimal,
      location: { upper_floor_corridors: [7, "80"], ladder_levels: ["e"] },
      pick: { ladder_rules: [{ corridors: [5], levels: ["d"], ladder_seconds: 9 }] },
    });
    expect(params.location.upper_floor_corridors).toEqual(["07", "80"]);
    expect(params.location.ladder_levels).toEqual(["E"]);
    expect(params.pick.ladder_rules).toEqual([{ corridors: ["05"], levels: ["D"], ladder_seconds: 9 }]);
  });

  it("requires travel, pick and pack", () => {
    expect(() => loadTimeParams({ travel: {}, pick: {} })).toThrow(TimeParamsError);
    try {
      loadTimeParams({ travel: {}, pick: {} });
    } catch (error) {
      expect(error).toBeInstanceOf(TimeParamsError);
      if (error instanceof TimeParamsError) {
        expect(error.statusCode).toBe(400);
        expect(error.issues).toEqual(["pack: Required"]);
      }
    }
  });

  it("rejects negative seconds", () => {
    expect(() => loadTimeParams({ ...minimal, pack: { base_seconds: -1 } })).toThrow(/pack\.base_seconds/);
  });

  it("rejects a location pattern without the location groups", () => {
    expect(() => loadTimeParams({ ...minimal, location: { pattern: "^(\\d{2})$" } })).toThrow(
      /missing named groups: corridor, bay, level, pos/,
    );
  });

  it("rejects non-objects", () => {
    expect(() => loadTimeParams("fast")).toThrow(TimeParamsError);
  });

  it("returns a frozen value", () => {
    const params = loadTimeParams(minimal);
    expect(Object.isFrozen(params)).toBe(true);
    expect(Object.isFrozen(params.pick.level_seconds)).toBe(true);
  });
});

describe("TimeParamsStore", () => {
  it("starts with the defaults", () => {
    expect(new TimeParamsStore().current).toBe(DEFAULT_TIME_PARAMS);
  });

  it("activates a valid candidate", () => {
    const store = new TimeParamsStore();
    const next = store.activate({ ...minimal, version: "v2" });
    expect(store.current).toBe(next);
    expect(store.current.version).toBe("v2");
  });

  it("keeps the previous set when a candidate is invalid", () => {
    const store = new TimeParamsStore();
    const valid = store.activate({ ...minimal, version: "v2" });

    expect(() => store.activate({ ...minimal, travel: { sec_stairs_up: -5 } })).toThrow(TimeParamsError);
    expect(store.current).toBe(valid);
  });
});
