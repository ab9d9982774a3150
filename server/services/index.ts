/**
 * Service wiring module.
 *
 * Creates all service instances with their dependencies injected and
 * exports them as a single object.
 *
 * ```ts
 * import { storage } from "./storage";
 * import { createServices } from "./services";
 *
 * const services = createServices(storage);
 * await services.classification.runClassification({ runBy: "ops" });
 * ```
 *
 * Dependency graph:
 *   settings (foundation, storage only)
 *     ├── classification  (threshold + summer mode)
 *     └── timeEstimation  (time params + summer mode)
 */

import { createSettingsService } from "./settings";
import { createClassificationService } from "./classification";
import { createTimeEstimationService, maxBatchSizeFromEnv } from "./time-estimation";
import type { IStorage } from "../storage";

export function createServices(storage: IStorage) {
  // Foundation
  const settings = createSettingsService(storage);

  // Depends on settings
  const classification = createClassificationService(storage, settings);
  const timeEstimation = createTimeEstimationService(storage, settings, {
    maxBatchSize: maxBatchSizeFromEnv(process.env.ESTIMATE_MAX_BATCH),
  });

  return {
    settings,
    classification,
    timeEstimation,
  };
}

export type Services = ReturnType<typeof createServices>;

// Re-export factory functions for individual service creation
export { createSettingsService } from "./settings";
export { createClassificationService } from "./classification";
export { createTimeEstimationService } from "./time-estimation";

// Re-export service types
export type { SettingsService, SettingsError, ActiveTimeParams } from "./settings";
export type {
  ClassificationService,
  ClassificationError,
  RunClassificationParams,
  ClassificationRunSummary,
  ItemClassificationView,
} from "./classification";
export type { TimeEstimationService, EstimationError, RecalculateParams, RecalculateResult } from "./time-estimation";
