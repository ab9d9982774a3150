import type {
  Fragility,
  PressureSensitivity,
  TemperatureSensitivity,
  UnitType,
} from "@shared/schema";
import { normalizeCorridor, parseLocation } from "./location";
import type { TimeParams } from "./params";

/** The classified attributes of an item that change how long it takes to pick and pack. */
export interface HandlingAttributes {
  unitType: UnitType | null;
  fragility: Fragility | null;
  spillRisk: boolean | null;
  pressureSensitivity: PressureSensitivity | null;
  temperatureSensitivity: TemperatureSensitivity | null;
  pickDifficulty: number | null;
}

export interface PickLine {
  location: string | null;
  unitType: string | null;
  quantity: number;
}

export interface PickBreakdown {
  unitType: UnitType;
  level: string | null;
  /** Shelf level is one of `location.ladder_levels`. */
  ladderLevel: boolean;
  baseSeconds: number;
  quantitySeconds: number;
  alignScanSeconds: number;
  levelSeconds: number;
  ladderSeconds: number;
  difficultySeconds: number;
  handlingSeconds: number;
  totalSeconds: number;
}

const UNIT_TYPE_ALIASES: Record<string, UnitType> = {
  PCS: "item",
  PIECE: "item",
  ITEM: "item",
  EA: "item",
  UNIT: "item",
  UNITS: "item",
  PK: "pack",
  PACK: "pack",
  BX: "box",
  BOX: "box",
  CS: "case",
  CASE: "case",
  VPACK: "virtual_pack",
  VIRTUAL_PACK: "virtual_pack",
  PIECES: "virtual_pack",
};

export function normalizeUnitType(raw: string | null | undefined): UnitType | null {
  const key = (raw ?? "").trim().toUpperCase();
  if (!key) return null;
  return UNIT_TYPE_ALIASES[key] ?? null;
}

export function handlingSeconds(
  attrs: HandlingAttributes | null,
  handling: Record<string, number>,
  summerMode: boolean,
): number {
  if (!attrs) return 0;
  let total = 0;
  if (attrs.fragility === "YES") total += handling.fragility_yes ?? 0;
  else if (attrs.fragility === "SEMI") total += handling.fragility_semi ?? 0;
  if (attrs.spillRisk === true) total += handling.spill_true ?? 0;
  if (attrs.pressureSensitivity === "high") total += handling.pressure_high ?? 0;
  if (summerMode && attrs.temperatureSensitivity === "heat_sensitive") {
    total += handling.heat_sensitive_summer ?? 0;
  }
  return total;
}

/** Seconds to pick one order line. Unknown attributes add nothing. */
export function pickSeconds(
  line: PickLine,
  attrs: HandlingAttributes | null,
  params: TimeParams,
  summerMode: boolean,
): PickBreakdown {
  const pick = params.pick;
  const unitType = normalizeUnitType(line.unitType) ?? attrs?.unitType ?? "item";

  const base = pick.base_by_unit_type[unitType] ?? pick.base_by_unit_type.item ?? 0;
  const perQty = pick.per_qty_by_unit_type[unitType] ?? pick.per_qty_by_unit_type.item ?? 0;
  const quantitySeconds = perQty * Math.max(0, line.quantity - 1);

  const parsed = parseLocation(line.location, params.location);
  const level = parsed.success ? parsed.location.level : null;
  const levelSeconds = level ? pick.level_seconds[level] ?? 0 : 0;

  let ladderSeconds = 0;
  if (parsed.success) {
    const corridor = normalizeCorridor(parsed.location.corridor);
    const shelf = parsed.location.level;
    const rule = pick.ladder_rules.find((r) => r.corridors.includes(corridor) && r.levels.includes(shelf));
    ladderSeconds = rule?.ladder_seconds ?? 0;
  }

  const difficulty = attrs?.pickDifficulty ?? null;
  const difficultySeconds = difficulty === null ? 0 : pick.difficulty_seconds[String(difficulty)] ?? 0;

  const handling = handlingSeconds(attrs, pick.handling_seconds, summerMode);

  return {
    unitType,
    level,
    ladderLevel: parsed.success && parsed.location.isLadderLevel,
    baseSeconds: base,
    quantitySeconds,
    alignScanSeconds: pick.sec_align_scan_per_line,
    levelSeconds,
    ladderSeconds,
    difficultySeconds,
    handlingSeconds: handling,
    totalSeconds:
      base + quantitySeconds + pick.sec_align_scan_per_line + levelSeconds + ladderSeconds + difficultySeconds + handling,
  };
}
