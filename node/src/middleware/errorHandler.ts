// node/src/middleware/errorHandler.ts — JSON error responses for the host
import type { NextFunction, Request, Response } from 'express';
import { ConfigError, PipelineError } from '@/services/errors';
import { logger } from '@/services/logger';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: 'not_found', message: `No route for ${req.method} ${req.path}` });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof PipelineError) {
    const status = err.code === 'INVALID_REQUEST' ? 400 : 422;
    logger.warn('http:pipeline_error', { path: req.path, code: err.code, stage: err.stage });
    res.status(status).json({
      error: err.code,
      message: err.message,
      stage: err.stage,
      errors: err.snapshot?.errors ?? [],
      executionMetadata: err.snapshot?.executionMetadata ?? null,
    });
    return;
  }

  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ error: 'invalid_json', message: 'Request body is not valid JSON' });
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  logger.error('http:unhandled_error', {
    path: req.path,
    method: req.method,
    error: message,
    code: err instanceof ConfigError ? err.code : undefined,
  });
  res.status(500).json({
    error: 'internal_error',
    message: process.env.NODE_ENV === 'production' ? 'Internal server error' : message,
  });
}
