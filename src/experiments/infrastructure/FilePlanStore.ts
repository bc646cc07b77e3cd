// src/experiments/infrastructure/FilePlanStore.ts

/**
 * FilePlanStore
 *
 * Infrastructure implementation of IPlanStore: one pretty-printed JSON document
 * per plan, `<root>/<planId>.json`.
 *
 * Standards applied:
 * - SRP: only stores and retrieves plan documents.
 * - Boundary mapping: JSON text <-> domain object is localized here.
 * - No caching: every call reads or writes the file system.
 */

import path from 'path';
import { mkdir, open, readFile, readdir, unlink } from 'fs/promises';

import type { ExperimentPlan } from '../domain/ExperimentPlan';
import { isPlanStatus } from '../domain/ExperimentPlan';
import type { IPlanStore, NewExperimentPlan } from '../domain/PlanStore';
import { NotFoundError } from '../domain/ExperimentErrors';
import { createPlanId } from '../application/PlanIdGenerator';
import { logger } from '../../shared/logging/Logger';

const PLAN_FILE_SUFFIX = '.json';
const PLAN_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export class FilePlanStore implements IPlanStore {
  public constructor(
    private readonly rootDir: string,
    private readonly planIdProvider: () => string = createPlanId,
  ) {}

  public async create(plan: NewExperimentPlan): Promise<ExperimentPlan> {
    const stored: ExperimentPlan = { ...plan, planId: plan.planId ?? this.planIdProvider() };
    await this.write(stored);
    return stored;
  }

  public async get(planId: string): Promise<ExperimentPlan> {
    const filePath = this.pathFor(planId);
    if (filePath === null) {
      throw new NotFoundError('plan', planId);
    }

    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (err) {
      if (isMissingFileError(err)) {
        throw new NotFoundError('plan', planId);
      }
      throw err;
    }

    const plan = parsePlanDocument(raw);
    if (plan === null) {
      throw new NotFoundError('plan', planId, `Stored plan ${planId} could not be parsed`);
    }

    return plan;
  }

  public async list(): Promise<ExperimentPlan[]> {
    await this.ensureRoot();

    const entries = await readdir(this.rootDir);
    const plans: ExperimentPlan[] = [];

    for (const entry of entries.filter((name) => name.endsWith(PLAN_FILE_SUFFIX)).sort()) {
      const raw = await readFile(path.join(this.rootDir, entry), 'utf8');
      const plan = parsePlanDocument(raw);

      if (plan === null) {
        logger.warn({ file: entry }, 'Skipping unreadable plan document');
        continue;
      }

      plans.push(plan);
    }

    return plans;
  }

  public async save(plan: ExperimentPlan): Promise<void> {
    await this.write(plan);
  }

  public async delete(planId: string): Promise<boolean> {
    const filePath = this.pathFor(planId);
    if (filePath === null) return false;

    try {
      await unlink(filePath);
      return true;
    } catch (err) {
      if (isMissingFileError(err)) return false;
      throw err;
    }
  }

  private async write(plan: ExperimentPlan): Promise<void> {
    const filePath = this.pathFor(plan.planId);
    if (filePath === null) {
      throw new Error(`Invalid planId for storage: ${plan.planId}`);
    }

    await this.ensureRoot();

    const handle = await open(filePath, 'w');
    try {
      await handle.writeFile(`${JSON.stringify(plan, null, 2)}\n`, 'utf8');
    } finally {
      await handle.close();
    }
  }

  private async ensureRoot(): Promise<void> {
    await mkdir(this.rootDir, { recursive: true });
  }

  /**
   * Ids never contain path separators; anything else cannot resolve to a plan.
   */
  private pathFor(planId: string): string | null {
    if (!PLAN_ID_PATTERN.test(planId)) return null;
    return path.join(this.rootDir, `${planId}${PLAN_FILE_SUFFIX}`);
  }
}

/**
 * Parse a stored document, returning null when it is not a plan.
 * Only the fields the services rely on structurally are checked.
 */
export function parsePlanDocument(raw: string): ExperimentPlan | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  return isExperimentPlan(parsed) ? parsed : null;
}

function isExperimentPlan(value: unknown): value is ExperimentPlan {
  if (!isRecord(value)) return false;

  return (
    typeof value.planId === 'string' &&
    typeof value.packageName === 'string' &&
    typeof value.language === 'string' &&
    typeof value.name === 'string' &&
    typeof value.trafficProportion === 'number' &&
    isPlanStatus(value.status) &&
    typeof value.createdAt === 'string' &&
    typeof value.updatedAt === 'string' &&
    Array.isArray(value.variants) &&
    value.variants.every(
      (v: unknown) =>
        isRecord(v) && typeof v.variantId === 'string' && typeof v.label === 'string',
    )
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFileError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
