import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isGameError } from '../lib/errors';
import { errorMeta, logger } from '../lib/logger';

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({ error: 'not_found' });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    return res.status(400).json({ error: 'invalid_input', details: err.issues });
  }
  if (isGameError(err)) {
    if (err.retryable) res.setHeader('Retry-After', '1');
    return res.status(err.status).json({ error: err.code.toLowerCase(), message: err.message });
  }
  logger.error('[http] unhandled error', { method: req.method, path: req.path, ...errorMeta(err) });
  return res.status(500).json({ error: 'internal_error' });
}
