/**
 * Order time estimation.
 *
 *   total = overhead (start + end) + travel + Σ pick(line) + pack
 *
 * Pure and deterministic: the caller supplies the order, the classified
 * attributes of its items and one parameter snapshot, and decides what to
 * persist. Every component is reported in seconds and minutes so a number
 * can be explained after the fact.
 */

import { packSeconds } from "./pack";
import type { PackBreakdown, SpecialGroup } from "./pack";
import type { TimeParams } from "./params";
import { pickSeconds } from "./pick";
import type { HandlingAttributes, PickBreakdown } from "./pick";
import { collectStops, travelSeconds } from "./travel";
import type { TravelBreakdown } from "./travel";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EstimateLine {
  id: number;
  itemCode: string | null;
  location: string | null;
  zone: string | null;
  unitType: string | null;
  quantity: number;
}

export interface EstimateOrder {
  id: number;
  orderNumber: string;
  lines: readonly EstimateLine[];
}

/** Classified attributes keyed by item code. */
export type ItemAttributeLookup = ReadonlyMap<string, HandlingAttributes>;

export interface LineEstimate {
  lineId: number;
  itemCode: string | null;
  pickSeconds: number;
  expectedMinutes: number;
  pick: PickBreakdown;
}

export interface EstimateComponents {
  overhead: number;
  travel: number;
  pick: number;
  pack: number;
}

export interface EstimateDiagnostics {
  travel: TravelBreakdown;
  pack: PackBreakdown;
  unparseableLocations: string[];
  linesWithoutLocation: number[];
  /** Lines stored on a ladder-height shelf. */
  ladderLevelLines: number[];
  itemsWithoutAttributes: string[];
  specialGroups: SpecialGroup[];
  paramsVersion: string;
  summerMode: boolean;
}

export interface OrderEstimate {
  orderId: number;
  orderNumber: string;
  totalSeconds: number;
  totalMinutes: number;
  breakdownSeconds: EstimateComponents;
  breakdownMinutes: EstimateComponents;
  lines: LineEstimate[];
  diagnostics: EstimateDiagnostics;
}

export interface EstimateFailure {
  orderId: number;
  error: string;
}

export interface BatchEstimateResult {
  estimates: OrderEstimate[];
  failures: EstimateFailure[];
  /** Orders left out because the batch was full. */
  skipped: number;
}

// ---------------------------------------------------------------------------
// Single order
// ---------------------------------------------------------------------------

const toMinutes = (seconds: number): number => seconds / 60;

function minutesOf(components: EstimateComponents): EstimateComponents {
  return {
    overhead: toMinutes(components.overhead),
    travel: toMinutes(components.travel),
    pick: toMinutes(components.pick),
    pack: toMinutes(components.pack),
  };
}

export function estimateOrder(
  order: EstimateOrder,
  itemLookup: ItemAttributeLookup,
  params: TimeParams,
  summerMode: boolean,
): OrderEstimate {
  const attributesByLine = order.lines.map((line) => (line.itemCode ? itemLookup.get(line.itemCode) ?? null : null));
  const itemsWithoutAttributes = Array.from(
    new Set(
      order.lines
        .filter((line, i) => line.itemCode !== null && attributesByLine[i] === null)
        .map((line) => line.itemCode ?? ""),
    ),
  );

  const { stops, withoutLocation } = collectStops(order.lines, params.location);
  const travel = travelSeconds(stops, params.travel);

  const lines: LineEstimate[] = order.lines.map((line, i) => {
    const pick = pickSeconds(line, attributesByLine[i], params, summerMode);
    return {
      lineId: line.id,
      itemCode: line.itemCode,
      pickSeconds: pick.totalSeconds,
      expectedMinutes: toMinutes(pick.totalSeconds),
      pick,
    };
  });

  // An order with nothing to pick takes no time at all, not even pack base time
  const isEmpty = order.lines.length === 0;
  const pack: PackBreakdown = isEmpty
    ? { lineCount: 0, specialGroups: [], baseSeconds: 0, lineSeconds: 0, specialGroupSeconds: 0, totalSeconds: 0 }
    : packSeconds(attributesByLine, params.pack, summerMode);

  const components: EstimateComponents = {
    overhead: isEmpty ? 0 : params.overhead.start_seconds + params.overhead.end_seconds,
    travel: travel.totalSeconds,
    pick: lines.reduce((sum, line) => sum + line.pickSeconds, 0),
    pack: pack.totalSeconds,
  };
  const totalSeconds = components.overhead + components.travel + components.pick + components.pack;

  return {
    orderId: order.id,
    orderNumber: order.orderNumber,
    totalSeconds,
    totalMinutes: toMinutes(totalSeconds),
    breakdownSeconds: components,
    breakdownMinutes: minutesOf(components),
    lines,
    diagnostics: {
      travel,
      pack,
      unparseableLocations: travel.unparseableLocations,
      linesWithoutLocation: withoutLocation.map((i) => order.lines[i].id),
      ladderLevelLines: lines.filter((line) => line.pick.ladderLevel).map((line) => line.lineId),
      itemsWithoutAttributes,
      specialGroups: pack.specialGroups,
      paramsVersion: params.version,
      summerMode,
    },
  };
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

export function estimateBatch(
  orders: readonly EstimateOrder[],
  itemLookup: ItemAttributeLookup,
  params: TimeParams,
  summerMode: boolean,
  options: { maxBatchSize: number },
): BatchEstimateResult {
  const limit = Math.max(0, Math.floor(options.maxBatchSize));
  const batch = orders.slice(0, limit);

  const estimates: OrderEstimate[] = [];
  const failures: EstimateFailure[] = [];

  for (const order of batch) {
    try {
      estimates.push(estimateOrder(order, itemLookup, params, summerMode));
    } catch (error) {
      failures.push({ orderId: order.id, error: error instanceof Error ? error.message : String(error) });
    }
  }

  return { estimates, failures, skipped: orders.length - batch.length };
}
