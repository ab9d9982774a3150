/**
 * TimeEstimationService: expected pick/pack time for orders.
 *
 * Loads an order, its lines and the classified attributes of its items, runs
 * the pure estimator (../estimation/estimate) against one parameter snapshot
 * and, when asked to persist, writes line and order minutes plus an
 * `order_estimates` snapshot in one transaction.
 */

import type { Item, Order, OrderLine } from "@shared/schema";
import { estimateOrder } from "../estimation/estimate";
import type { EstimateOrder, ItemAttributeLookup, OrderEstimate } from "../estimation/estimate";
import type { TimeParams } from "../estimation/params";
import type { HandlingAttributes } from "../estimation/pick";
import { toHandlingAttributes } from "../item-utils";
import type { OrderEstimateWrite } from "../storage";

// ---------------------------------------------------------------------------
// Dependency interfaces (minimal, only methods actually called)
// ---------------------------------------------------------------------------

type Storage = {
  getOrderById(id: number): Promise<Order | undefined>;
  getOrderLines(orderId: number): Promise<OrderLine[]>;
  getItemsByCodes(itemCodes: string[]): Promise<Item[]>;
  getOrderIdsByStatus(statuses: string[], limit: number): Promise<number[]>;
  saveOrderEstimate(write: OrderEstimateWrite): Promise<void>;
};

type Settings = {
  getTimeParams(): Promise<{ params: TimeParams; revision: number | null }>;
  getSummerMode(): Promise<boolean>;
};

// ---------------------------------------------------------------------------
// Error class
// ---------------------------------------------------------------------------

export class EstimationError extends Error {
  constructor(
    message: string,
    public statusCode: number = 400,
  ) {
    super(message);
    this.name = "EstimationError";
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const estimateReasons = ["manual", "batch", "import"] as const;
export type EstimateReason = typeof estimateReasons[number];

export const OPEN_ORDER_STATUSES = ["not_started", "picking", "ready_for_dispatch"];

export const DEFAULT_MAX_BATCH_SIZE = 500;

export interface RecalculateParams {
  statuses?: string[];
  limit?: number;
}

export interface RecalculateResult {
  processed: number;
  updated: number;
  failed: number;
  failures: { orderId: number; error: string }[];
  maxBatchSize: number;
}

export interface EstimationServiceOptions {
  maxBatchSize?: number;
  now?: () => Date;
}

interface EstimationContext {
  params: TimeParams;
  revision: number | null;
  summerMode: boolean;
}

/** Batch bound from ESTIMATE_MAX_BATCH; anything unusable falls back to the default. */
export function maxBatchSizeFromEnv(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_MAX_BATCH_SIZE;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class TimeEstimationService {
  private maxBatchSize: number;
  private now: () => Date;

  constructor(
    private storage: Storage,
    private settings: Settings,
    options: EstimationServiceOptions = {},
  ) {
    this.maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this.now = options.now ?? (() => new Date());
  }

  /** Estimate without writing anything. */
  async previewOrderEstimate(orderId: number): Promise<OrderEstimate> {
    const context = await this.loadContext();
    return this.estimate(orderId, context);
  }

  async estimateAndPersist(orderId: number, reason: EstimateReason = "manual"): Promise<OrderEstimate> {
    const context = await this.loadContext();
    return this.estimateAndWrite(orderId, reason, context);
  }

  /**
   * Re-estimates open orders, at most maxBatchSize per call. One order failing
   * does not stop the others.
   */
  async recalculateOpenOrders(params: RecalculateParams = {}): Promise<RecalculateResult> {
    const statuses = params.statuses && params.statuses.length > 0 ? params.statuses : OPEN_ORDER_STATUSES;
    const limit = Math.min(params.limit ?? this.maxBatchSize, this.maxBatchSize);

    const context = await this.loadContext();
    const orderIds = await this.storage.getOrderIdsByStatus(statuses, limit);

    const failures: RecalculateResult["failures"] = [];
    let updated = 0;

    for (const orderId of orderIds) {
      try {
        await this.estimateAndWrite(orderId, "batch", context);
        updated++;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Estimation] Order ${orderId} failed:`, message);
        failures.push({ orderId, error: message });
      }
    }

    console.log(
      `[Estimation] Recalculated ${updated}/${orderIds.length} orders (statuses ${statuses.join(", ")}, ${failures.length} failed)`,
    );

    return { processed: orderIds.length, updated, failed: failures.length, failures, maxBatchSize: this.maxBatchSize };
  }

  // ---------------------------------------------------------------------------

  private async loadContext(): Promise<EstimationContext> {
    const [{ params, revision }, summerMode] = await Promise.all([
      this.settings.getTimeParams(),
      this.settings.getSummerMode(),
    ]);
    return { params, revision, summerMode };
  }

  private async estimate(orderId: number, context: EstimationContext): Promise<OrderEstimate> {
    const order = await this.storage.getOrderById(orderId);
    if (!order) {
      throw new EstimationError(`Order ${orderId} not found`, 404);
    }

    const lines = await this.storage.getOrderLines(orderId);
    const itemCodes = Array.from(new Set(lines.flatMap((line) => (line.itemCode ? [line.itemCode] : []))));
    const itemRows = await this.storage.getItemsByCodes(itemCodes);

    const lookup: ItemAttributeLookup = new Map<string, HandlingAttributes>(
      itemRows.map((row) => [row.itemCode, toHandlingAttributes(row)]),
    );

    const input: EstimateOrder = {
      id: order.id,
      orderNumber: order.orderNumber,
      lines: lines.map((line) => ({
        id: line.id,
        itemCode: line.itemCode,
        location: line.location,
        zone: line.zone,
        unitType: line.unitType,
        quantity: line.quantity,
      })),
    };

    return estimateOrder(input, lookup, context.params, context.summerMode);
  }

  private async estimateAndWrite(
    orderId: number,
    reason: EstimateReason,
    context: EstimationContext,
  ): Promise<OrderEstimate> {
    const estimate = await this.estimate(orderId, context);

    await this.storage.saveOrderEstimate({
      orderId,
      totalMinutes: estimate.totalMinutes,
      estimatedAt: this.now(),
      lines: estimate.lines.map((line) => ({ lineId: line.lineId, expectedMinutes: line.expectedMinutes })),
      snapshot: {
        orderId,
        reason,
        totalMinutes: estimate.totalMinutes,
        breakdown: {
          seconds: estimate.breakdownSeconds,
          minutes: estimate.breakdownMinutes,
          lines: estimate.lines,
          diagnostics: estimate.diagnostics,
        },
        paramsVersion: context.params.version,
        paramsRevision: context.revision,
        summerMode: context.summerMode,
      },
    });

    return estimate;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTimeEstimationService(storage: Storage, settings: Settings, options?: EstimationServiceOptions) {
  return new TimeEstimationService(storage, settings, options);
}
