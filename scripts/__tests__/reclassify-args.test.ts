import { describe, it, expect } from "vitest";
import { parseReclassifyArgs } from "../reclassify-args";

describe("parseReclassifyArgs", () => {
  it("reads the run owner alone", () => {
    expect(parseReclassifyArgs(["--run-by", "ops"])).toEqual({
      success: true,
      args: { runBy: "ops", threshold: undefined, summerMode: undefined },
    });
  });

  it("reads threshold and summer mode", () => {
    expect(parseReclassifyArgs(["--run-by=ops", "--threshold", "75", "--summer"])).toEqual({
      success: true,
      args: { runBy: "ops", threshold: 75, summerMode: true },
    });
    expect(parseReclassifyArgs(["--no-summer", "--threshold=0", "--run-by", "night-job"])).toEqual({
      success: true,
      args: { runBy: "night-job", threshold: 0, summerMode: false },
    });
  });

  it("requires a run owner", () => {
    expect(parseReclassifyArgs(["--summer"])).toEqual({ success: false, message: "--run-by is required" });
    expect(parseReclassifyArgs(["--run-by", "--summer"])).toEqual({
      success: false,
      message: "--run-by needs a name",
    });
  });

  it.each(["101", "-5", "6.5", "high", ""])("rejects threshold %j", (value) => {
    const result = parseReclassifyArgs(["--run-by", "ops", `--threshold=${value}`]);
    expect(result.success).toBe(false);
  });

  it("rejects unknown flags", () => {
    expect(parseReclassifyArgs(["--run-by", "ops", "--force"])).toEqual({
      success: false,
      message: "Unknown argument --force",
    });
  });
});
