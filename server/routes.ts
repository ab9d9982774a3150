import type { Express, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { insertCategoryDefaultSchema, insertItemOverrideSchema } from "@shared/schema";
import { confidenceThresholdSchema } from "./classification/resolver";
import { TimeParamsError } from "./estimation/params";
import type { Services } from "./services";
import { ClassificationError } from "./services/classification";
import { SettingsError } from "./services/settings";
import { EstimationError, estimateReasons } from "./services/time-estimation";

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const runClassificationBody = z.object({
  runBy: z.string().trim().min(1),
  threshold: confidenceThresholdSchema.optional(),
  summerMode: z.boolean().optional(),
});

const recentRunsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

const needsReviewQuery = z.object({
  threshold: z.coerce.number().pipe(confidenceThresholdSchema).optional(),
});

const categoryDefaultBody = insertCategoryDefaultSchema.omit({ categoryCode: true });
const itemOverrideBody = insertItemOverrideSchema.omit({ itemCode: true });

const timeParamsBody = z.object({
  params: z.unknown(),
  updatedBy: z.string().trim().min(1).optional(),
});

const summerModeBody = z.object({
  enabled: z.boolean(),
  updatedBy: z.string().trim().min(1).optional(),
});

const orderIdParam = z.coerce.number().int().positive();

const estimateBody = z.object({
  reason: z.enum(estimateReasons).optional(),
});

const estimateOpenBody = z.object({
  statuses: z.array(z.string().trim().min(1)).optional(),
  limit: z.number().int().positive().optional(),
});

// ---------------------------------------------------------------------------
// Error handling
// ---------------------------------------------------------------------------

/** Answers a service error with its status; anything else becomes a logged 500. */
function sendError(res: Response, error: unknown, context: string, fallback: string) {
  if (error instanceof TimeParamsError) {
    return res.status(error.statusCode).json({ error: error.message, details: error.issues });
  }
  if (error instanceof ClassificationError || error instanceof EstimationError || error instanceof SettingsError) {
    return res.status(error.statusCode).json({ error: error.message });
  }
  console.error(`Error ${context}:`, error);
  return res.status(500).json({ error: fallback });
}

export async function registerRoutes(httpServer: Server, app: Express, services: Services): Promise<Server> {
  const { classification, timeEstimation, settings } = services;

  // ===== CLASSIFICATION =====

  app.post("/api/classification/runs", async (req, res) => {
    try {
      const parsed = runClassificationBody.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request data", details: parsed.error.issues });
      }
      res.json(await classification.runClassification(parsed.data));
    } catch (error) {
      sendError(res, error, "running classification", "Failed to run classification");
    }
  });

  app.get("/api/classification/runs", async (req, res) => {
    try {
      const parsed = recentRunsQuery.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid query", details: parsed.error.issues });
      }
      res.json(await classification.getRecentRuns(parsed.data.limit));
    } catch (error) {
      sendError(res, error, "fetching classification runs", "Failed to fetch classification runs");
    }
  });

  app.get("/api/items/needs-review", async (req, res) => {
    try {
      const parsed = needsReviewQuery.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid query", details: parsed.error.issues });
      }
      res.json(await classification.getItemsNeedingReview(parsed.data.threshold));
    } catch (error) {
      sendError(res, error, "fetching review queue", "Failed to fetch items needing review");
    }
  });

  app.get("/api/items/:itemCode/classification", async (req, res) => {
    try {
      res.json(await classification.getItemClassification(req.params.itemCode));
    } catch (error) {
      sendError(res, error, "fetching item classification", "Failed to fetch item classification");
    }
  });

  app.put("/api/category-defaults/:categoryCode", async (req, res) => {
    try {
      const parsed = categoryDefaultBody.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request data", details: parsed.error.issues });
      }
      res.json(await classification.upsertCategoryDefault({ ...parsed.data, categoryCode: req.params.categoryCode }));
    } catch (error) {
      sendError(res, error, "saving category default", "Failed to save category default");
    }
  });

  app.put("/api/item-overrides/:itemCode", async (req, res) => {
    try {
      const parsed = itemOverrideBody.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request data", details: parsed.error.issues });
      }
      res.json(await classification.upsertItemOverride({ ...parsed.data, itemCode: req.params.itemCode }));
    } catch (error) {
      sendError(res, error, "saving item override", "Failed to save item override");
    }
  });

  // ===== SETTINGS =====

  app.get("/api/time-params", async (_req, res) => {
    try {
      res.json(await settings.getTimeParams());
    } catch (error) {
      sendError(res, error, "fetching time params", "Failed to fetch time params");
    }
  });

  app.put("/api/time-params", async (req, res) => {
    try {
      const parsed = timeParamsBody.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request data", details: parsed.error.issues });
      }
      res.json(await settings.saveTimeParams(parsed.data.params, parsed.data.updatedBy ?? null));
    } catch (error) {
      sendError(res, error, "saving time params", "Failed to save time params");
    }
  });

  app.get("/api/summer-mode", async (_req, res) => {
    try {
      res.json({ enabled: await settings.getSummerMode() });
    } catch (error) {
      sendError(res, error, "fetching summer mode", "Failed to fetch summer mode");
    }
  });

  app.put("/api/summer-mode", async (req, res) => {
    try {
      const parsed = summerModeBody.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request data", details: parsed.error.issues });
      }
      res.json({ enabled: await settings.setSummerMode(parsed.data.enabled, parsed.data.updatedBy ?? null) });
    } catch (error) {
      sendError(res, error, "saving summer mode", "Failed to save summer mode");
    }
  });

  // ===== ORDER ESTIMATES =====

  app.get("/api/orders/:id/estimate", async (req, res) => {
    try {
      const orderId = orderIdParam.safeParse(req.params.id);
      if (!orderId.success) {
        return res.status(400).json({ error: "Invalid order id" });
      }
      res.json(await timeEstimation.previewOrderEstimate(orderId.data));
    } catch (error) {
      sendError(res, error, "previewing order estimate", "Failed to estimate order");
    }
  });

  app.post("/api/orders/:id/estimate", async (req, res) => {
    try {
      const orderId = orderIdParam.safeParse(req.params.id);
      if (!orderId.success) {
        return res.status(400).json({ error: "Invalid order id" });
      }
      const parsed = estimateBody.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request data", details: parsed.error.issues });
      }
      res.json(await timeEstimation.estimateAndPersist(orderId.data, parsed.data.reason ?? "manual"));
    } catch (error) {
      sendError(res, error, "estimating order", "Failed to estimate order");
    }
  });

  app.post("/api/orders/estimate-open", async (req, res) => {
    try {
      const parsed = estimateOpenBody.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request data", details: parsed.error.issues });
      }
      res.json(await timeEstimation.recalculateOpenOrders(parsed.data));
    } catch (error) {
      sendError(res, error, "recalculating open orders", "Failed to recalculate open orders");
    }
  });

  return httpServer;
}
