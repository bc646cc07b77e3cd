// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * - Request payload validation failures -> 400 VALIDATION_ERROR
 * - Domain errors -> status by error code (see STATUS_BY_CODE)
 * - Unknown errors -> 500
 * - Always returns the standard error envelope, with the correlationId
 */

import type { NextFunction, Request, Response } from 'express';
import { buildErrorEnvelope } from '../errors/errorEnvelope';

import { ExperimentDtoValidationError } from '../../experiments/dto/ExperimentDtoValidationError';
import {
  ExperimentError,
  ExternalApiError,
  InvalidInputError,
  NotFoundError,
  PartialFailureError,
  TransitionDeniedError,
} from '../../experiments/domain/ExperimentErrors';
import { logger } from '../../shared/logging/Logger';

const STATUS_BY_CODE: Record<string, number> = {
  NOT_FOUND: 404,
  INVALID_INPUT: 400,
  INVALID_TRANSITION: 409,
  EXTERNAL_API_ERROR: 502,
  PARTIAL_FAILURE: 502,
};

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  // 400: request payload validation failures (boundary protection)
  if (err instanceof ExperimentDtoValidationError) {
    logger.debug({ correlationId: req.correlationId, issues: err.issues }, 'Request validation failed');

    res.status(400).json(
      buildErrorEnvelope({
        code: 'VALIDATION_ERROR',
        message: err.message,
        correlationId: req.correlationId,
        issues: err.issues,
      }),
    );
    return;
  }

  if (err instanceof ExperimentError) {
    const status = STATUS_BY_CODE[err.code] ?? 500;

    if (status >= 500) {
      logger.error({ correlationId: req.correlationId, err }, 'Experiment operation failed');
    } else {
      logger.debug({ correlationId: req.correlationId, code: err.code }, err.message);
    }

    res.status(status).json(
      buildErrorEnvelope({
        code: err.code,
        message: err.message,
        correlationId: req.correlationId,
        ...(err instanceof InvalidInputError && err.issues.length > 0 ? { issues: err.issues } : {}),
        details: errorDetails(err),
      }),
    );
    return;
  }

  // 500: unknown/unexpected failures
  logger.error({ correlationId: req.correlationId, err }, 'Unhandled error in request pipeline');

  res.status(500).json(
    buildErrorEnvelope({
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred.',
      correlationId: req.correlationId,
    }),
  );
}

function errorDetails(err: ExperimentError): unknown {
  if (err instanceof NotFoundError) {
    return { resource: err.resource, id: err.id };
  }
  if (err instanceof TransitionDeniedError) {
    return { planId: err.planId, status: err.status, operation: err.operation };
  }
  if (err instanceof ExternalApiError) {
    return err.context;
  }
  if (err instanceof PartialFailureError) {
    return { planId: err.planId, completedSteps: err.completedSteps, failedStep: err.failedStep };
  }
  return undefined;
}
