/**
 * Time parameters: the tunable constants of the travel, pick and pack models.
 *
 * Raw parameter objects (from the settings table or a PUT body) are validated
 * and default-filled here once; everything downstream receives an immutable
 * `TimeParams` value and never re-checks it.
 *
 * Rules:
 *   - `travel`, `pick` and `pack` must be present at the top level.
 *   - Missing keys fall back to default-params.json; maps merge key by key.
 *   - Unknown keys are dropped.
 *   - Every seconds value and multiplier is a non-negative number.
 *   - The location pattern must compile and carry the four location groups.
 */

import { z } from "zod";
import defaults from "./default-params.json";
import { compileLocationPattern, normalizeCorridor, toJsPattern } from "./location";

// ---------------------------------------------------------------------------
// Error class
// ---------------------------------------------------------------------------

export class TimeParamsError extends Error {
  constructor(
    message: string,
    public statusCode: number = 400,
    public issues: string[] = [],
  ) {
    super(message);
    this.name = "TimeParamsError";
  }
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const seconds = z.number().finite().nonnegative();

const secondsMap = (fallback: Record<string, number>) =>
  z
    .record(z.string(), seconds)
    .default({})
    .transform((map) => ({ ...fallback, ...map }));

const corridorCode = z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform(normalizeCorridor);

const levelCode = z
  .string()
  .trim()
  .min(1)
  .transform((level) => level.toUpperCase());

const locationPattern = z
  .string()
  .transform(toJsPattern)
  .superRefine((pattern, ctx) => {
    const compiled = compileLocationPattern(pattern);
    if (!compiled.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: compiled.message });
    }
  });

const ladderRuleSchema = z.object({
  corridors: z.array(corridorCode),
  levels: z.array(levelCode),
  ladder_seconds: seconds,
});

export const timeParamsSchema = z.object({
  version: z
    .union([z.string(), z.number()])
    .transform((v) => String(v))
    .default(defaults.version),
  location: z
    .object({
      pattern: locationPattern.default(defaults.location.pattern),
      upper_floor_corridors: z.array(corridorCode).default(defaults.location.upper_floor_corridors),
      ladder_levels: z.array(levelCode).default(defaults.location.ladder_levels),
    })
    .default({}),
  overhead: z
    .object({
      start_seconds: seconds.default(defaults.overhead.start_seconds),
      end_seconds: seconds.default(defaults.overhead.end_seconds),
    })
    .default({}),
  travel: z.object({
    sec_align_per_stop: seconds.default(defaults.travel.sec_align_per_stop),
    sec_per_corridor_change: seconds.default(defaults.travel.sec_per_corridor_change),
    sec_per_corridor_step: seconds.default(defaults.travel.sec_per_corridor_step),
    sec_per_bay_step: seconds.default(defaults.travel.sec_per_bay_step),
    sec_per_pos_step: seconds.default(defaults.travel.sec_per_pos_step),
    sec_stairs_up: seconds.default(defaults.travel.sec_stairs_up),
    sec_stairs_down: seconds.default(defaults.travel.sec_stairs_down),
    upper_walk_multiplier: seconds.default(defaults.travel.upper_walk_multiplier),
    zone_switch_seconds: seconds.default(defaults.travel.zone_switch_seconds),
  }),
  pick: z.object({
    base_by_unit_type: secondsMap(defaults.pick.base_by_unit_type),
    per_qty_by_unit_type: secondsMap(defaults.pick.per_qty_by_unit_type),
    level_seconds: secondsMap(defaults.pick.level_seconds),
    difficulty_seconds: secondsMap(defaults.pick.difficulty_seconds),
    handling_seconds: secondsMap(defaults.pick.handling_seconds),
    sec_align_scan_per_line: seconds.default(defaults.pick.sec_align_scan_per_line),
    ladder_rules: z.array(ladderRuleSchema).default(defaults.pick.ladder_rules),
  }),
  pack: z.object({
    base_seconds: seconds.default(defaults.pack.base_seconds),
    per_line_seconds: seconds.default(defaults.pack.per_line_seconds),
    special_group_seconds: seconds.default(defaults.pack.special_group_seconds),
  }),
});

export type TimeParams = z.output<typeof timeParamsSchema>;
export type TravelParams = TimeParams["travel"];
export type PickParams = TimeParams["pick"];
export type PackParams = TimeParams["pack"];

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function deepFreeze(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  Object.values(value).forEach(deepFreeze);
  Object.freeze(value);
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/** Validates and default-fills a raw parameter object; throws TimeParamsError. */
export function loadTimeParams(raw: unknown): TimeParams {
  const result = timeParamsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new TimeParamsError(`Invalid time parameters: ${issues.join("; ")}`, 400, issues);
  }
  deepFreeze(result.data);
  return result.data;
}

export const DEFAULT_TIME_PARAMS: TimeParams = loadTimeParams(defaults);

// ---------------------------------------------------------------------------
// Active parameter set
// ---------------------------------------------------------------------------

/**
 * Holds the parameter set in effect. A candidate replaces it only after it
 * validates; a rejected candidate leaves the previous set active.
 */
export class TimeParamsStore {
  private active: TimeParams;

  constructor(initial: TimeParams = DEFAULT_TIME_PARAMS) {
    this.active = initial;
  }

  get current(): TimeParams {
    return this.active;
  }

  activate(raw: unknown): TimeParams {
    const next = loadTimeParams(raw);
    this.active = next;
    return next;
  }

  reset(): TimeParams {
    this.active = DEFAULT_TIME_PARAMS;
    return this.active;
  }
}
