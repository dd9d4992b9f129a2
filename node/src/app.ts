// node/src/app.ts — express app for the pipeline host
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import type { AnalyticsPipeline } from '@/pipeline/orchestrator';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { askRateLimiter } from '@/middleware/rate-limit-query';
import { createAskRouter } from '@/routes/ask';
import { logger } from '@/services/logger';
import { requestTimeout } from '@/stability/errorHandlers';

export interface AppOptions {
  nodeEnv: string;
  /** Pipeline runs make several LLM round trips; keep this generous. */
  requestTimeoutMs?: number;
  corsOrigin?: string[];
}

export function createApp(pipeline: Pick<AnalyticsPipeline, 'run'>, options: AppOptions): express.Express {
  const app = express();
  const production = options.nodeEnv === 'production';

  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? ['http://localhost:3000'] }));
  app.use(attachCorrelationId);
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());
  if (options.nodeEnv !== 'test') {
    app.use(
      morgan(production ? 'combined' : 'dev', {
        stream: { write: (line: string) => logger.info('http:access', { line: line.trim() }) },
      }),
    );
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: options.nodeEnv,
    });
  });

  const ask = createAskRouter(pipeline);
  if (production) app.use('/api/ask', askRateLimiter);
  app.use('/api/ask', requestTimeout(options.requestTimeoutMs ?? 180_000), ask);

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
