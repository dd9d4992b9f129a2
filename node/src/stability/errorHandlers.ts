// node/src/stability/errorHandlers.ts — process-level handlers, graceful shutdown, request timeout
import type { Server } from 'http';
import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/services/logger';

const SHUTDOWN_GRACE_MS = 15_000;

let serverInstance: Server | null = null;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    if (process.env.NODE_ENV !== 'production') process.exit(1);
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.on(signal, () => gracefulShutdown(signal, 0));
  }
}

function gracefulShutdown(reason: string, exitCode: number): void {
  logger.info('process:shutdown', { reason });
  const forced = setTimeout(() => {
    logger.error('process:shutdown_forced', { afterMs: SHUTDOWN_GRACE_MS });
    process.exit(1);
  }, SHUTDOWN_GRACE_MS);
  forced.unref();

  const server = serverInstance;
  if (server) {
    server.close((err) => {
      if (err) logger.error('process:server_close_failed', { error: err.message });
      process.exit(err ? 1 : exitCode);
    });
  } else {
    process.exit(exitCode);
  }
}

/** Answers 408 when a request is still open after `timeoutMs`. */
export function requestTimeout(timeoutMs: number) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const timer = setTimeout(() => {
      if (!res.headersSent) {
        logger.warn('http:request_timeout', { path: req.path, timeoutMs });
        res.status(408).json({ error: 'request_timeout', message: `Request exceeded ${timeoutMs}ms` });
      }
    }, timeoutMs);
    res.on('finish', () => clearTimeout(timer));
    res.on('close', () => clearTimeout(timer));
    next();
  };
}
