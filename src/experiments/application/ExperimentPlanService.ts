// src/experiments/application/ExperimentPlanService.ts

import type {
  ExperimentPlan,
  ExperimentType,
  PlanStatus,
  SignificanceSnapshot,
  Variant,
  VariantCounts,
} from '../domain/ExperimentPlan';
import { clampTrafficProportion } from '../domain/ExperimentPlan';
import type { IPlanStore } from '../domain/PlanStore';
import { InvalidInputError } from '../domain/ExperimentErrors';
import { nextStatus } from '../domain/PlanLifecycle';
import { logger } from '../../shared/logging/Logger';

import { createVariantId } from './PlanIdGenerator';
import type { SignificanceEngine } from './SignificanceEngine';

export type VariantInput = Omit<Variant, 'variantId'>;

export type CreatePlanInput = {
  packageName: string;
  language: string;
  name: string;
  hypothesis?: string;
  metric: string;
  trafficProportion?: number;
  type: ExperimentType;
  variants: VariantInput[];
  notes?: string;
};

export type StartManualResult = {
  planId: string;
  status: PlanStatus;
  instructions: string[];
  variants: Variant[];
  note: string;
};

export type SignificanceOutcome = {
  planId: string;
  result: SignificanceSnapshot;
};

export type StopResult = {
  planId: string;
  status: PlanStatus;
};

/**
 * Dependencies for plan lifecycle operations.
 * Injected for testability; clock and id providers default to real ones.
 */
export type ExperimentPlanServiceDeps = {
  planStore: IPlanStore;
  significanceEngine: Pick<SignificanceEngine, 'evaluate'>;
  now?: () => Date;
  variantIdProvider?: () => string;
};

/**
 * ExperimentPlanService owns every plan operation except promotion.
 * Each mutation reads the stored plan, changes it in memory and writes it back whole.
 */
export class ExperimentPlanService {
  private readonly now: () => Date;
  private readonly variantIdProvider: () => string;

  public constructor(private readonly deps: ExperimentPlanServiceDeps) {
    this.now = deps.now ?? (() => new Date());
    this.variantIdProvider = deps.variantIdProvider ?? createVariantId;
  }

  /**
   * Create a local plan in `draft`. Nothing is started on the store console.
   */
  public async createPlan(input: CreatePlanInput): Promise<ExperimentPlan> {
    const timestamp = this.now().toISOString();
    const trafficProportion = clampTrafficProportion(input.trafficProportion);

    if (input.trafficProportion !== undefined && trafficProportion !== input.trafficProportion) {
      logger.warn(
        { requested: input.trafficProportion, applied: trafficProportion },
        'Traffic proportion clamped into [0.1, 1.0]',
      );
    }

    const plan = await this.deps.planStore.create({
      packageName: input.packageName,
      language: input.language,
      name: input.name,
      ...(input.hypothesis !== undefined ? { hypothesis: input.hypothesis } : {}),
      metric: input.metric,
      trafficProportion,
      type: input.type,
      variants: this.assignVariantIds(input.variants),
      status: 'draft',
      createdAt: timestamp,
      updatedAt: timestamp,
      ...(input.notes !== undefined ? { notes: input.notes } : {}),
    });

    logger.info(
      { planId: plan.planId, packageName: plan.packageName, language: plan.language },
      'Experiment plan created',
    );

    return plan;
  }

  public async listPlans(): Promise<ExperimentPlan[]> {
    return this.deps.planStore.list();
  }

  public async getPlan(planId: string): Promise<ExperimentPlan> {
    return this.deps.planStore.get(planId);
  }

  public async deletePlan(planId: string): Promise<boolean> {
    const deleted = await this.deps.planStore.delete(planId);
    if (deleted) {
      logger.info({ planId }, 'Experiment plan deleted');
    }
    return deleted;
  }

  /**
   * Mark the plan running and return the steps to mirror it on the store console,
   * which does the actual traffic split.
   */
  public async startManual(planId: string): Promise<StartManualResult> {
    const plan = await this.deps.planStore.get(planId);
    plan.status = nextStatus(plan, 'start');
    plan.updatedAt = this.now().toISOString();
    await this.deps.planStore.save(plan);

    logger.info({ planId }, 'Experiment plan started');

    const instructions = [
      'Open Play Console and select the app',
      'Store presence → Store listing → Experiments',
      `Create new experiment: ${plan.type} | Locale: ${plan.language} | Traffic: ${Math.round(
        plan.trafficProportion * 100,
      )}%`,
      `Name: ${plan.name}`,
      'Add variants and paste the following fields per variant:',
    ];

    return {
      planId: plan.planId,
      status: plan.status,
      instructions,
      variants: plan.variants,
      note: 'Once the console declares a winner, call apply-winner with its variantId to promote it.',
    };
  }

  /**
   * Evaluate observed metrics and store them as the plan's lastResults.
   * The status is left unchanged.
   */
  public async computeSignificance(
    planId: string,
    metrics: ReadonlyMap<string, VariantCounts>,
    samples?: number,
  ): Promise<SignificanceOutcome> {
    const plan = await this.deps.planStore.get(planId);
    nextStatus(plan, 'computeSignificance');

    const unknown = [...metrics.keys()].filter(
      (variantId) => !plan.variants.some((v) => v.variantId === variantId),
    );
    if (unknown.length > 0) {
      throw new InvalidInputError(
        'Metrics reference variants that are not part of the plan',
        unknown.map((variantId) => `Unknown variantId "${variantId}".`),
      );
    }

    const { bayes, recommendation } = this.deps.significanceEngine.evaluate(metrics, samples);
    const evaluatedAt = this.now().toISOString();

    plan.lastResults = {
      metrics: Object.fromEntries(metrics),
      bayes,
      recommendation,
      evaluatedAt,
    };
    plan.updatedAt = evaluatedAt;
    await this.deps.planStore.save(plan);

    logger.info(
      { planId, winner: bayes.winner, winnerProbability: bayes.winnerProbability, recommendation },
      'Significance computed',
    );

    return { planId: plan.planId, result: plan.lastResults };
  }

  /**
   * Stop a plan without touching the live listing.
   */
  public async stop(planId: string): Promise<StopResult> {
    const plan = await this.deps.planStore.get(planId);
    plan.status = nextStatus(plan, 'stop');
    plan.updatedAt = this.now().toISOString();
    await this.deps.planStore.save(plan);

    logger.info({ planId }, 'Experiment plan stopped');

    return { planId: plan.planId, status: plan.status };
  }

  private assignVariantIds(variants: VariantInput[]): Variant[] {
    const used = new Set<string>();

    return variants.map((variant) => {
      let variantId = this.variantIdProvider();
      while (used.has(variantId)) {
        variantId = this.variantIdProvider();
      }
      used.add(variantId);

      return { ...variant, variantId };
    });
  }
}
