// src/bootstrap/buildDeps.ts

/**
 * Composition Root
 * ----------------
 * This module is the ONLY place that wires infrastructure + application services.
 *
 * Standards applied:
 * - Clean Architecture: infrastructure is constructed at the edge (composition root).
 * - DIP (Dependency Inversion Principle): app.ts depends on route ports, not concrete infra.
 * - Single source of wiring: tests never load the publishing API client or touch the real store.
 */

import { config, getServiceAccountKeyFile } from '../shared/config/Config';
import { logger } from '../shared/logging/Logger';

import { FilePlanStore } from '../experiments/infrastructure/FilePlanStore';
import {
  AndroidPublisherContentApi,
  createAndroidPublisherClient,
} from '../experiments/infrastructure/AndroidPublisherContentApi';

import { ExperimentPlanService } from '../experiments/application/ExperimentPlanService';
import { ListingEditor } from '../experiments/application/ListingEditor';
import { ReadinessGuard } from '../experiments/application/ReadinessGuard';
import { createRandomSource } from '../experiments/application/RandomSource';
import {
  DEFAULT_SIGNIFICANCE_CONFIG,
  SignificanceEngine,
} from '../experiments/application/SignificanceEngine';
import { WinnerPromoter } from '../experiments/application/WinnerPromoter';

import type { ExperimentRouteDeps } from '../http/routes/experimentRoutes';

export type RuntimeDeps = {
  experiments: ExperimentRouteDeps;

  /**
   * Called during graceful shutdown to flush buffered logs.
   */
  shutdown: () => Promise<void>;
};

/**
 * Builds runtime dependencies for the service.
 *
 * NOTE:
 * - ONE plan store instance is shared by the plan service and the promoter.
 * - A fixed SIGNIFICANCE_SEED makes every evaluation replay the same stream.
 */
export function buildRuntimeDeps(): RuntimeDeps {
  // Infrastructure
  const planStore = new FilePlanStore(config.experimentsDir);
  const contentApi = new AndroidPublisherContentApi(
    createAndroidPublisherClient(getServiceAccountKeyFile()),
  );

  // Application services
  const seed = config.significanceSeed;
  const significanceEngine = new SignificanceEngine({
    config: DEFAULT_SIGNIFICANCE_CONFIG,
    randomSourceFactory: () => createRandomSource(seed),
  });

  const listingEditor = new ListingEditor(contentApi);

  const planService = new ExperimentPlanService({ planStore, significanceEngine });
  const winnerPromoter = new WinnerPromoter({ planStore, listingEditor });
  const readinessGuard = new ReadinessGuard(listingEditor);

  return {
    experiments: { planService, winnerPromoter, readinessGuard },
    shutdown: async () => {
      logger.flush();
    },
  };
}
