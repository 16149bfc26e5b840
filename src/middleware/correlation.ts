// src/middleware/correlation.ts: correlation ID for request tracing
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const CORRELATION_HEADER = 'x-correlation-id';

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header(CORRELATION_HEADER)?.trim();
  const correlationId = headerId || uuidv4();

  res.locals.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);
  next();
}

export function correlationIdOf(res: Response): string | undefined {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : undefined;
}
