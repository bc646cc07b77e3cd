// src/http/routes/experimentRoutes.ts

/**
 * Experiment Routes
 * -----------------
 * Exposes every orchestrator operation over HTTP.
 *
 * Design principles used:
 * - Thin HTTP layer: parse DTO -> call application service -> return JSON.
 * - Errors bubble to the global error handler for standard envelopes.
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';

import type { ExperimentPlanService } from '../../experiments/application/ExperimentPlanService';
import type { WinnerPromoter } from '../../experiments/application/WinnerPromoter';
import type { ReadinessGuard } from '../../experiments/application/ReadinessGuard';
import { parseCreatePlanDto } from '../../experiments/dto/CreatePlanDto';
import {
  parseApplyWinnerDto,
  parseReadinessQuery,
  parseSignificanceDto,
} from '../../experiments/dto/PlanActionDtos';

/**
 * Port interfaces (Dependency Inversion Principle):
 * routes depend on the operations they call, not on concrete wiring.
 */
export type ExperimentPlanPort = Pick<
  ExperimentPlanService,
  | 'createPlan'
  | 'listPlans'
  | 'getPlan'
  | 'deletePlan'
  | 'startManual'
  | 'computeSignificance'
  | 'stop'
>;

export type ExperimentRouteDeps = {
  planService: ExperimentPlanPort;
  winnerPromoter: Pick<WinnerPromoter, 'applyWinner'>;
  readinessGuard: Pick<ReadinessGuard, 'check'>;
};

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function handle(fn: AsyncHandler) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await fn(req, res);
    } catch (err) {
      next(err);
    }
  };
}

export function createExperimentRoutes(deps: ExperimentRouteDeps): Router {
  const router = Router();
  const { planService, winnerPromoter, readinessGuard } = deps;

  /**
   * GET /v1/experiments/readiness?packageName=...&language=...
   * Advisory: is the target locale already on the live listing?
   */
  router.get(
    '/v1/experiments/readiness',
    handle(async (req, res) => {
      const query = parseReadinessQuery(req.query);
      const report = await readinessGuard.check(query.packageName, query.language);
      res.status(200).json(report);
    }),
  );

  router.post(
    '/v1/experiments/plans',
    handle(async (req, res) => {
      const input = parseCreatePlanDto(req.body);
      const plan = await planService.createPlan(input);
      res.status(201).json({ plan });
    }),
  );

  router.get(
    '/v1/experiments/plans',
    handle(async (_req, res) => {
      const plans = await planService.listPlans();
      res.status(200).json({ plans });
    }),
  );

  router.get(
    '/v1/experiments/plans/:planId',
    handle(async (req, res) => {
      const plan = await planService.getPlan(req.params.planId);
      res.status(200).json({ plan });
    }),
  );

  router.delete(
    '/v1/experiments/plans/:planId',
    handle(async (req, res) => {
      const deleted = await planService.deletePlan(req.params.planId);
      res.status(200).json({ deleted });
    }),
  );

  router.post(
    '/v1/experiments/plans/:planId/start',
    handle(async (req, res) => {
      const result = await planService.startManual(req.params.planId);
      res.status(200).json(result);
    }),
  );

  /**
   * POST /v1/experiments/plans/:planId/significance
   * Body: { metrics: { [variantId]: { visitors, conversions } }, samples? }
   */
  router.post(
    '/v1/experiments/plans/:planId/significance',
    handle(async (req, res) => {
      const { metrics, samples } = parseSignificanceDto(req.body);
      const outcome = await planService.computeSignificance(req.params.planId, metrics, samples);
      res.status(200).json(outcome);
    }),
  );

  /**
   * POST /v1/experiments/plans/:planId/apply-winner
   * Body: { variantId, changesNotSentForReview? }
   */
  router.post(
    '/v1/experiments/plans/:planId/apply-winner',
    handle(async (req, res) => {
      const { variantId, changesNotSentForReview } = parseApplyWinnerDto(req.body);
      const result = await winnerPromoter.applyWinner(req.params.planId, variantId, {
        changesNotSentForReview,
      });
      res.status(200).json(result);
    }),
  );

  router.post(
    '/v1/experiments/plans/:planId/stop',
    handle(async (req, res) => {
      const result = await planService.stop(req.params.planId);
      res.status(200).json(result);
    }),
  );

  return router;
}
