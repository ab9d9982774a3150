/**
 * Warehouse location grammar.
 *
 * A location code names a corridor, a bay inside it, a shelf level and a
 * position on that level, e.g. `10-01-A02`. The grammar is a configurable
 * regular expression with the named groups `corridor`, `bay`, `level` and
 * `pos`.
 */

export const LOCATION_GROUPS = ["corridor", "bay", "level", "pos"] as const;

export interface LocationConfig {
  pattern: string;
  upper_floor_corridors: readonly string[];
  ladder_levels: readonly string[];
}

export interface LocationSpec {
  corridor: string;
  bay: string;
  level: string;
  position: string;
  isUpperFloor: boolean;
  isLadderLevel: boolean;
  /** Normalized code the fields were read from. */
  raw: string;
}

export type LocationParseError = "empty" | "invalid_pattern" | "pattern_mismatch";

export type LocationParseResult =
  | { success: true; location: LocationSpec }
  | { success: false; error: LocationParseError; message: string };

export type PatternCompileResult =
  | { success: true; regex: RegExp }
  | { success: false; message: string };

/** Strips all whitespace and uppercases: `" 31-04-e 02"` → `"31-04-E02"`. */
export function normalizeLocation(raw: string): string {
  return raw.replace(/\s+/g, "").toUpperCase();
}

/** Corridor codes compare zero-padded to two digits ("7" and "07" are the same corridor). */
export function normalizeCorridor(corridor: string | number): string {
  return String(corridor).trim().padStart(2, "0");
}

/** Accepts `(?P<name>...)` group syntax as an alias for `(?<name>...)`. */
export function toJsPattern(pattern: string): string {
  return pattern.replace(/\(\?P</g, "(?<");
}

export function compileLocationPattern(pattern: string): PatternCompileResult {
  const source = toJsPattern(pattern);
  let regex: RegExp;
  try {
    regex = new RegExp(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, message: `Location pattern does not compile: ${message}` };
  }

  const missing = LOCATION_GROUPS.filter((group) => !source.includes(`(?<${group}>`));
  if (missing.length > 0) {
    return { success: false, message: `Location pattern is missing named groups: ${missing.join(", ")}` };
  }

  return { success: true, regex };
}

export function parseLocation(raw: string | null | undefined, config: LocationConfig): LocationParseResult {
  const normalized = normalizeLocation(raw ?? "");
  if (!normalized) {
    return { success: false, error: "empty", message: "Location is empty" };
  }

  const compiled = compileLocationPattern(config.pattern);
  if (!compiled.success) {
    return { success: false, error: "invalid_pattern", message: compiled.message };
  }

  const groups = compiled.regex.exec(normalized)?.groups;
  if (!groups) {
    return {
      success: false,
      error: "pattern_mismatch",
      message: `Location "${normalized}" does not match the location pattern`,
    };
  }

  const { corridor, bay, level, pos } = groups;
  if (corridor === undefined || bay === undefined || level === undefined || pos === undefined) {
    return {
      success: false,
      error: "pattern_mismatch",
      message: `Location "${normalized}" matched without every location group`,
    };
  }

  const upperFloor = config.upper_floor_corridors.map(normalizeCorridor);
  const ladderLevels = config.ladder_levels.map((l) => l.toUpperCase());

  return {
    success: true,
    location: {
      corridor,
      bay,
      level,
      position: pos,
      isUpperFloor: upperFloor.includes(normalizeCorridor(corridor)),
      isLadderLevel: ladderLevels.includes(level),
      raw: normalized,
    },
  };
}
