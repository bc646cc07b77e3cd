// src/experiments/application/PlanIdGenerator.ts

import { randomUUID } from 'crypto';

/**
 * Create a globally unique planId for experiment plans.
 *
 * Format: exp_<uuid_without_dashes>
 */
export function createPlanId(): string {
  return `exp_${randomUUID().replace(/-/g, '')}`;
}

/**
 * Create a variantId. Only needs to be unique within its plan.
 *
 * Format: var_<12 hex chars>
 */
export function createVariantId(): string {
  return `var_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
