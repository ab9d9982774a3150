import { normalizeLocation, parseLocation } from "./location";
import type { LocationConfig, LocationSpec } from "./location";
import type { TravelParams } from "./params";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StopCoordinates {
  corridor: number;
  bay: number;
  position: number;
  level: string;
}

export interface Stop {
  /** Normalized location code (or the raw text when it does not parse). */
  raw: string;
  zone: string | null;
  location: LocationSpec | null;
  coordinates: StopCoordinates | null;
}

export interface StopSource {
  location: string | null;
  zone: string | null;
}

export interface CollectedStops {
  stops: Stop[];
  /** Indexes of the sources that had no location at all. */
  withoutLocation: number[];
}

export interface TravelBreakdown {
  alignSeconds: number;
  corridorChangeSeconds: number;
  walkingSeconds: number;
  zoneSwitchSeconds: number;
  stairsSeconds: number;
  totalSeconds: number;
  hasUpperFloor: boolean;
  orderedStops: string[];
  unparseableLocations: string[];
}

// ---------------------------------------------------------------------------
// Stops
// ---------------------------------------------------------------------------

function normalizeZone(zone: string | null): string | null {
  const trimmed = (zone ?? "").trim().toUpperCase();
  return trimmed || null;
}

function toCoordinates(location: LocationSpec): StopCoordinates | null {
  const corridor = Number.parseInt(location.corridor, 10);
  const bay = Number.parseInt(location.bay, 10);
  const position = Number.parseInt(location.position, 10);
  if (Number.isNaN(corridor) || Number.isNaN(bay) || Number.isNaN(position)) return null;
  return { corridor, bay, position, level: location.level };
}

/** One stop per distinct location; the first source naming a location decides its zone. */
export function collectStops(sources: readonly StopSource[], config: LocationConfig): CollectedStops {
  const byKey = new Map<string, Stop>();
  const withoutLocation: number[] = [];

  sources.forEach((source, index) => {
    const text = (source.location ?? "").trim();
    if (!text) {
      withoutLocation.push(index);
      return;
    }

    const parsed = parseLocation(text, config);
    const key = parsed.success ? parsed.location.raw : normalizeLocation(text);
    if (byKey.has(key)) return;

    const location = parsed.success ? parsed.location : null;
    byKey.set(key, {
      raw: key,
      zone: normalizeZone(source.zone),
      location,
      coordinates: location ? toCoordinates(location) : null,
    });
  });

  return { stops: Array.from(byKey.values()), withoutLocation };
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Parsed stops by corridor, bay, position, level; unparseable stops last by code. */
export function orderStops(stops: readonly Stop[]): Stop[] {
  const parsed = stops.filter((s) => s.coordinates !== null);
  const unparsed = stops.filter((s) => s.coordinates === null);

  parsed.sort((a, b) => {
    if (!a.coordinates || !b.coordinates) return 0;
    return (
      a.coordinates.corridor - b.coordinates.corridor ||
      a.coordinates.bay - b.coordinates.bay ||
      a.coordinates.position - b.coordinates.position ||
      compareText(a.coordinates.level, b.coordinates.level)
    );
  });
  unparsed.sort((a, b) => compareText(a.raw, b.raw));

  return [...parsed, ...unparsed];
}

// ---------------------------------------------------------------------------
// Travel time
// ---------------------------------------------------------------------------

/**
 * Walking time between the stops of one order, visited in canonical order.
 * The total is always the sum of the reported components.
 */
export function travelSeconds(stops: readonly Stop[], params: TravelParams): TravelBreakdown {
  const ordered = orderStops(stops);

  let alignSeconds = 0;
  let corridorChangeSeconds = 0;
  let walkingSeconds = 0;
  let zoneSwitchSeconds = 0;

  for (let i = 1; i < ordered.length; i++) {
    const from = ordered[i - 1];
    const to = ordered[i];

    let align = params.sec_align_per_stop;
    let change = 0;
    let walk = 0;

    if (from.coordinates && to.coordinates) {
      const a = from.coordinates;
      const b = to.coordinates;
      if (a.corridor !== b.corridor) {
        change = params.sec_per_corridor_change;
        walk = params.sec_per_corridor_step * Math.abs(b.corridor - a.corridor);
      } else if (a.bay !== b.bay) {
        walk = params.sec_per_bay_step * Math.abs(b.bay - a.bay);
      } else {
        walk = params.sec_per_pos_step * Math.abs(b.position - a.position);
      }

      if (from.location?.isUpperFloor || to.location?.isUpperFloor) {
        align *= params.upper_walk_multiplier;
        change *= params.upper_walk_multiplier;
        walk *= params.upper_walk_multiplier;
      }
    }

    alignSeconds += align;
    corridorChangeSeconds += change;
    walkingSeconds += walk;

    if (from.zone && to.zone && from.zone !== to.zone) {
      zoneSwitchSeconds += params.zone_switch_seconds;
    }
  }

  const hasUpperFloor = ordered.some((s) => s.location?.isUpperFloor === true);
  const stairsSeconds = hasUpperFloor ? params.sec_stairs_up + params.sec_stairs_down : 0;

  return {
    alignSeconds,
    corridorChangeSeconds,
    walkingSeconds,
    zoneSwitchSeconds,
    stairsSeconds,
    totalSeconds: alignSeconds + corridorChangeSeconds + walkingSeconds + zoneSwitchSeconds + stairsSeconds,
    hasUpperFloor,
    orderedStops: ordered.map((s) => s.raw),
    unparseableLocations: ordered.filter((s) => s.coordinates === null).map((s) => s.raw),
  };
}
