import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/utils/logger';
import { correlationIdOf } from './correlation';

/** An error whose message is safe to show the client. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ success: false, message: `Route ${req.method} ${req.path} not found`, code: 'not_found' });
}

export function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const correlationId = correlationIdOf(res);

  if (err instanceof HttpError) {
    res.status(err.status).json({ success: false, message: err.message, code: err.code });
    return;
  }

  // Body parser failures (malformed JSON, oversized payloads) carry their own 4xx status.
  const status = statusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    res.status(status).json({ success: false, message: 'Invalid request body', code: 'bad_request' });
    return;
  }

  logger.error('http:unhandled_error', {
    correlationId,
    path: req.path,
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json({ success: false, message: 'Internal Server Error', code: 'internal_error' });
}
