/**
 * Domain error taxonomy for the experiment orchestrator.
 *
 * Each error carries a stable `code` so the HTTP layer can map it to a status
 * and error envelope without string matching.
 */

import type { ImageType, PlanStatus } from './ExperimentPlan';
import type { PlanOperation } from './PlanLifecycle';

export abstract class ExperimentError extends Error {
  public abstract readonly code: string;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type NotFoundResource = 'plan' | 'variant' | 'asset_file';

export class NotFoundError extends ExperimentError {
  public readonly code = 'NOT_FOUND';

  public constructor(
    public readonly resource: NotFoundResource,
    public readonly id: string,
    message?: string,
  ) {
    super(message ?? `Unknown ${resource}: ${id}`);
  }
}

export class InvalidInputError extends ExperimentError {
  public readonly code = 'INVALID_INPUT';

  public constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export class TransitionDeniedError extends ExperimentError {
  public readonly code = 'INVALID_TRANSITION';

  public constructor(
    public readonly planId: string,
    public readonly status: PlanStatus,
    public readonly operation: PlanOperation,
  ) {
    super(`Operation "${operation}" is not allowed for plan ${planId} in status "${status}"`);
  }
}

export type ExternalApiOperation =
  | 'listListings'
  | 'getListing'
  | 'patchListing'
  | 'listImages'
  | 'deleteAllImages'
  | 'uploadImage';

export interface ExternalApiContext {
  operation: ExternalApiOperation;
  packageName: string;
  language?: string;
  imageType?: ImageType;
  filePath?: string;
}

/**
 * Failure reported by the content-API collaborator. Never retried here.
 */
export class ExternalApiError extends ExperimentError {
  public readonly code = 'EXTERNAL_API_ERROR';

  public constructor(
    public readonly context: ExternalApiContext,
    cause: unknown,
  ) {
    super(`${describeOperation(context)}: ${causeMessage(cause)}`, { cause });
  }
}

/**
 * A promotion that committed some remote steps before failing.
 * Completed steps are recorded on the plan; a retry resumes after them.
 */
export class PartialFailureError extends ExperimentError {
  public readonly code = 'PARTIAL_FAILURE';

  public constructor(
    public readonly planId: string,
    public readonly completedSteps: string[],
    public readonly failedStep: string,
    cause: unknown,
  ) {
    super(
      `Promotion of plan ${planId} failed at "${failedStep}" after ${completedSteps.length} completed step(s): ${causeMessage(cause)}`,
      { cause },
    );
  }
}

function describeOperation(context: ExternalApiContext): string {
  const scope = [context.language, context.imageType].filter(Boolean).join('/');
  const target = scope ? `${context.packageName} [${scope}]` : context.packageName;

  switch (context.operation) {
    case 'listListings':
      return `Failed to list listings for ${target}`;
    case 'getListing':
      return `Failed to get listing for ${target}`;
    case 'patchListing':
      return `Failed to patch listing for ${target}`;
    case 'listImages':
      return `Failed to list images for ${target}`;
    case 'deleteAllImages':
      return `Failed to delete images for ${target}`;
    case 'uploadImage':
      return `Failed to upload image for ${target} from ${context.filePath ?? 'unknown file'}`;
  }
}

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
