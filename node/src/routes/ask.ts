// node/src/routes/ask.ts — POST /api/ask: run the chart pipeline for one question
import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AnalyticsPipeline } from '@/pipeline/orchestrator';
import { logger } from '@/services/logger';

const askBodySchema = z.object({
  question: z.string().trim().min(1, 'question is required'),
  apiKey: z.string().trim().min(1).optional(),
  verbose: z.boolean().optional(),
  interpretationPrompt: z.string().trim().min(1).optional(),
  planet: z
    .object({
      ssoUrl: z.string().url().optional(),
      apiUrl: z.string().url().optional(),
      clientId: z.string().trim().min(1).optional(),
      clientSecret: z.string().trim().min(1).optional(),
    })
    .strict()
    .optional(),
});

export function createAskRouter(pipeline: Pick<AnalyticsPipeline, 'run'>): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = askBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'invalid_request',
        details: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      });
      return;
    }

    const correlationId = res.getHeader('x-correlation-id');
    logger.info('ask:received', { correlationId, chars: parsed.data.question.length });
    try {
      const result = await pipeline.run(parsed.data);
      res.status(200).json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
