/**
 * IPlanStore
 * ----------
 * Domain contract for persisting and retrieving experiment plans.
 *
 * Why this exists:
 * - Lifecycle services depend on a domain interface, not the file system.
 * - Infrastructure (FilePlanStore) implements this.
 * - Tests swap in an in-memory implementation.
 *
 * All writes replace the whole document; there is no partial patch.
 */

import type { ExperimentPlan } from './ExperimentPlan';

export type NewExperimentPlan = Omit<ExperimentPlan, 'planId'> & { planId?: string };

export interface IPlanStore {
  /**
   * Persist a new plan, assigning a planId when absent.
   */
  create(plan: NewExperimentPlan): Promise<ExperimentPlan>;

  /**
   * Load a plan. Throws NotFoundError when missing or unreadable.
   */
  get(planId: string): Promise<ExperimentPlan>;

  list(): Promise<ExperimentPlan[]>;

  /**
   * Overwrite the stored document of an existing plan.
   */
  save(plan: ExperimentPlan): Promise<void>;

  /**
   * Remove a plan. Returns false when nothing was stored under the id.
   */
  delete(planId: string): Promise<boolean>;
}
