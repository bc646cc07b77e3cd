// src/experiments/domain/PlanLifecycle.ts

/**
 * Plan lifecycle transition table.
 *
 * Every (status, operation) pair is listed explicitly. A `null` target means the
 * operation is allowed but leaves the status as it is.
 */

import type { ExperimentPlan, PlanStatus } from './ExperimentPlan';
import { TransitionDeniedError } from './ExperimentErrors';

export type PlanOperation = 'start' | 'computeSignificance' | 'applyWinner' | 'stop';

type Transition = { allowed: false } | { allowed: true; to: PlanStatus | null };

const DENY: Transition = { allowed: false };
const KEEP: Transition = { allowed: true, to: null };

function to(status: PlanStatus): Transition {
  return { allowed: true, to: status };
}

export const PLAN_TRANSITIONS: Readonly<Record<PlanStatus, Record<PlanOperation, Transition>>> = {
  draft: {
    start: to('running'),
    computeSignificance: DENY,
    applyWinner: DENY,
    stop: to('stopped'),
  },
  running: {
    start: to('running'),
    computeSignificance: KEEP,
    applyWinner: to('applied'),
    stop: to('stopped'),
  },
  stopped: {
    start: DENY,
    computeSignificance: KEEP,
    applyWinner: to('applied'),
    stop: to('stopped'),
  },
  applied: {
    start: DENY,
    computeSignificance: DENY,
    applyWinner: DENY,
    stop: DENY,
  },
  archived: {
    start: DENY,
    computeSignificance: DENY,
    applyWinner: DENY,
    stop: DENY,
  },
};

export function isTransitionAllowed(status: PlanStatus, operation: PlanOperation): boolean {
  return PLAN_TRANSITIONS[status][operation].allowed;
}

/**
 * Resolve the status a plan moves to, or throw TransitionDeniedError.
 */
export function nextStatus(plan: ExperimentPlan, operation: PlanOperation): PlanStatus {
  const transition = PLAN_TRANSITIONS[plan.status][operation];
  if (!transition.allowed) {
    throw new TransitionDeniedError(plan.planId, plan.status, operation);
  }
  return transition.to ?? plan.status;
}
