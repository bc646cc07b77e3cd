// src/experiments/dto/CreatePlanDto.ts

/**
 * CreatePlan DTO parser/validator
 *
 * HTTP boundary validator for POST /v1/experiments/plans.
 *
 * Standards applied:
 * - Validate at boundaries (do not trust external JSON).
 * - Return a strongly typed service input or throw a structured error.
 * - trafficProportion is range-adjusted by the service, not rejected here.
 */

import type { ExperimentType, VariantAsset } from '../domain/ExperimentPlan';
import { EXPERIMENT_TYPES, IMAGE_TYPES, isExperimentType, isImageType } from '../domain/ExperimentPlan';
import type { CreatePlanInput, VariantInput } from '../application/ExperimentPlanService';

import { ExperimentDtoValidationError } from './ExperimentDtoValidationError';
import {
  isRecord,
  readEnum,
  readNonEmptyString,
  readOptionalNumber,
  readOptionalString,
} from './readers';

export function parseCreatePlanDto(payload: unknown): CreatePlanInput {
  const issues: string[] = [];

  if (!isRecord(payload)) {
    throw new ExperimentDtoValidationError('Invalid create plan payload', [
      'Payload must be a JSON object.',
    ]);
  }

  const packageName = readNonEmptyString(payload, 'packageName', issues);
  const language = readNonEmptyString(payload, 'language', issues);
  const name = readNonEmptyString(payload, 'name', issues);
  const metric = readNonEmptyString(payload, 'metric', issues);

  const hypothesis = readOptionalString(payload, 'hypothesis', issues);
  const notes = readOptionalString(payload, 'notes', issues);
  const trafficProportion = readOptionalNumber(payload, 'trafficProportion', issues);

  const type = readEnum<ExperimentType>(payload, 'type', isExperimentType, EXPERIMENT_TYPES, issues);
  const variants = readVariants(payload.variants, issues);

  if (issues.length > 0 || type === undefined) {
    throw new ExperimentDtoValidationError('Invalid create plan payload', issues);
  }

  return {
    packageName,
    language,
    name,
    metric,
    type,
    variants,
    ...(hypothesis !== undefined ? { hypothesis } : {}),
    ...(notes !== undefined ? { notes } : {}),
    ...(trafficProportion !== undefined ? { trafficProportion } : {}),
  };
}

function readVariants(value: unknown, issues: string[]): VariantInput[] {
  if (!Array.isArray(value) || value.length === 0) {
    issues.push('"variants" must be a non-empty array.');
    return [];
  }

  return value.map((item: unknown, index) => readVariant(item, `variants[${index}]`, issues));
}

function readVariant(value: unknown, path: string, issues: string[]): VariantInput {
  if (!isRecord(value)) {
    issues.push(`"${path}" must be an object.`);
    return { label: '' };
  }

  const label = readNonEmptyString(value, 'label', issues, `${path}.label`);
  const title = readOptionalString(value, 'title', issues, `${path}.title`);
  const shortDescription = readOptionalString(
    value,
    'shortDescription',
    issues,
    `${path}.shortDescription`,
  );
  const fullDescription = readOptionalString(
    value,
    'fullDescription',
    issues,
    `${path}.fullDescription`,
  );
  const video = readOptionalString(value, 'video', issues, `${path}.video`);
  const assets = readAssets(value.assets, `${path}.assets`, issues);

  return {
    label,
    ...(title !== undefined ? { title } : {}),
    ...(shortDescription !== undefined ? { shortDescription } : {}),
    ...(fullDescription !== undefined ? { fullDescription } : {}),
    ...(video !== undefined ? { video } : {}),
    ...(assets !== undefined ? { assets } : {}),
  };
}

function readAssets(value: unknown, path: string, issues: string[]): VariantAsset[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    issues.push(`"${path}" must be an array when provided.`);
    return undefined;
  }

  const assets: VariantAsset[] = [];
  value.forEach((item: unknown, index) => {
    const itemPath = `${path}[${index}]`;
    if (!isRecord(item)) {
      issues.push(`"${itemPath}" must be an object with imageType and filePath.`);
      return;
    }

    const imageType = readEnum(item, 'imageType', isImageType, IMAGE_TYPES, issues, `${itemPath}.imageType`);
    const filePath = readNonEmptyString(item, 'filePath', issues, `${itemPath}.filePath`);

    if (imageType !== undefined && filePath) {
      assets.push({ imageType, filePath });
    }
  });

  return assets;
}
