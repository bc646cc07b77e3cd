// src/experiments/dto/PlanActionDtos.ts

/**
 * Parsers for the plan action endpoints:
 * - POST .../significance
 * - POST .../apply-winner
 * - GET  /v1/experiments/readiness (query string)
 *
 * Count ranges (conversions <= visitors, samples >= 1) are checked by the
 * significance engine; this layer only guarantees shapes and types.
 */

import type { VariantCounts } from '../domain/ExperimentPlan';

import { ExperimentDtoValidationError } from './ExperimentDtoValidationError';
import {
  isRecord,
  readNonEmptyString,
  readNonNegativeInteger,
  readOptionalBoolean,
  readOptionalNumber,
} from './readers';

export type SignificanceRequest = {
  metrics: Map<string, VariantCounts>;
  samples?: number;
};

export type ApplyWinnerRequest = {
  variantId: string;
  changesNotSentForReview: boolean;
};

export type ReadinessQuery = {
  packageName: string;
  language: string;
};

/**
 * Metrics keep the payload's key order; the first key is the baseline.
 */
export function parseSignificanceDto(payload: unknown): SignificanceRequest {
  const issues: string[] = [];

  if (!isRecord(payload)) {
    throw new ExperimentDtoValidationError('Invalid significance payload', [
      'Payload must be a JSON object.',
    ]);
  }

  const metrics = new Map<string, VariantCounts>();
  const rawMetrics = payload.metrics;

  if (!isRecord(rawMetrics) || Object.keys(rawMetrics).length === 0) {
    issues.push('"metrics" must be a non-empty object keyed by variantId.');
  } else {
    for (const [variantId, counts] of Object.entries(rawMetrics)) {
      if (!isRecord(counts)) {
        issues.push(`"metrics.${variantId}" must be an object with visitors and conversions.`);
        continue;
      }

      metrics.set(variantId, {
        visitors: readNonNegativeInteger(counts, 'visitors', issues, `metrics.${variantId}.visitors`),
        conversions: readNonNegativeInteger(
          counts,
          'conversions',
          issues,
          `metrics.${variantId}.conversions`,
        ),
      });
    }
  }

  const samples = readOptionalNumber(payload, 'samples', issues);

  if (issues.length > 0) {
    throw new ExperimentDtoValidationError('Invalid significance payload', issues);
  }

  return {
    metrics,
    ...(samples !== undefined ? { samples } : {}),
  };
}

export function parseApplyWinnerDto(payload: unknown): ApplyWinnerRequest {
  const issues: string[] = [];

  if (!isRecord(payload)) {
    throw new ExperimentDtoValidationError('Invalid apply-winner payload', [
      'Payload must be a JSON object.',
    ]);
  }

  const variantId = readNonEmptyString(payload, 'variantId', issues);
  const changesNotSentForReview = readOptionalBoolean(payload, 'changesNotSentForReview', issues);

  if (issues.length > 0) {
    throw new ExperimentDtoValidationError('Invalid apply-winner payload', issues);
  }

  return { variantId, changesNotSentForReview: changesNotSentForReview ?? false };
}

export function parseReadinessQuery(query: unknown): ReadinessQuery {
  const issues: string[] = [];

  if (!isRecord(query)) {
    throw new ExperimentDtoValidationError('Invalid readiness query', [
      'packageName and language query parameters are required.',
    ]);
  }

  const packageName = readNonEmptyString(query, 'packageName', issues);
  const language = readNonEmptyString(query, 'language', issues);

  if (issues.length > 0) {
    throw new ExperimentDtoValidationError('Invalid readiness query', issues);
  }

  return { packageName, language };
}
