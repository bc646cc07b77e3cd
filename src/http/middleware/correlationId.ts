// src/http/middleware/correlationId.ts

/**
 * Correlation ID middleware
 *
 * Purpose:
 * - Ensure every request has a correlationId so log lines and error envelopes
 *   of one request can be joined.
 *
 * Rules:
 * 1) Prefer header: x-correlation-id
 * 2) Otherwise generate a UUID
 *
 * Outputs:
 * - req.correlationId (typed via module augmentation in src/types/express.d.ts)
 * - response header x-correlation-id
 */

import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header('x-correlation-id');

  const correlationId =
    typeof headerId === 'string' && headerId.trim().length > 0 ? headerId : randomUUID();

  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);

  next();
}
