// src/http/errors/errorEnvelope.ts

/**
 * Standard error envelope
 *
 * All error responses follow this structure so API clients can parse them reliably.
 */

export type ErrorEnvelope = {
  error: {
    code: string;
    message: string;
    correlationId?: string;
    issues?: string[];
    details?: unknown;
  };
};

export function buildErrorEnvelope(params: {
  code: string;
  message: string;
  correlationId?: string;
  issues?: string[];
  details?: unknown;
}): ErrorEnvelope {
  return {
    error: {
      code: params.code,
      message: params.message,
      ...(params.correlationId ? { correlationId: params.correlationId } : {}),
      ...(params.issues ? { issues: params.issues } : {}),
      ...(params.details !== undefined ? { details: params.details } : {}),
    },
  };
}
