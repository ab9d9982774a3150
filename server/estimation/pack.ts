import type { HandlingAttributes } from "./pick";
import type { PackParams } from "./params";

/** Handling conditions that each add packing time once per order. */
export const specialGroupKinds = ["fragile", "spill", "pressure_high", "heat_sensitive_summer"] as const;
export type SpecialGroup = typeof specialGroupKinds[number];

export interface PackBreakdown {
  lineCount: number;
  specialGroups: SpecialGroup[];
  baseSeconds: number;
  lineSeconds: number;
  specialGroupSeconds: number;
  totalSeconds: number;
}

export function specialGroupsOf(attrs: HandlingAttributes | null, summerMode: boolean): SpecialGroup[] {
  if (!attrs) return [];
  const groups: SpecialGroup[] = [];
  if (attrs.fragility === "YES" || attrs.fragility === "SEMI") groups.push("fragile");
  if (attrs.spillRisk === true) groups.push("spill");
  if (attrs.pressureSensitivity === "high") groups.push("pressure_high");
  if (summerMode && attrs.temperatureSensitivity === "heat_sensitive") groups.push("heat_sensitive_summer");
  return groups;
}

/** One entry per order line; a line whose item has no attributes is null. */
export function packSeconds(
  lines: readonly (HandlingAttributes | null)[],
  params: PackParams,
  summerMode: boolean,
): PackBreakdown {
  const present = new Set<SpecialGroup>();
  for (const attrs of lines) {
    for (const group of specialGroupsOf(attrs, summerMode)) present.add(group);
  }
  const specialGroups = specialGroupKinds.filter((group) => present.has(group));

  const lineSeconds = params.per_line_seconds * lines.length;
  const specialGroupSeconds = params.special_group_seconds * specialGroups.length;

  return {
    lineCount: lines.length,
    specialGroups,
    baseSeconds: params.base_seconds,
    lineSeconds,
    specialGroupSeconds,
    totalSeconds: params.base_seconds + lineSeconds + specialGroupSeconds,
  };
}
