// node/src/middleware/correlation.ts — correlation ID echoed on every response
import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const correlationId = req.header('x-correlation-id') ?? randomUUID();
  res.setHeader('x-correlation-id', correlationId);
  next();
}
