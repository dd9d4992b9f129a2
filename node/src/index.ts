// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { loadAppConfig } from '@/config/app.config';
import { AnalyticsPipeline } from '@/pipeline/orchestrator';
import { logger, setLogLevel } from '@/services/logger';
import { getPipelineDeps } from '@/services/pipeline-deps';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';
import { createApp } from './app';

const config = loadAppConfig();
setLogLevel(config.logLevel);

const pipeline = new AnalyticsPipeline(getPipelineDeps(config));
const app = createApp(pipeline, {
  nodeEnv: config.nodeEnv,
  corsOrigin: config.corsOrigin,
  requestTimeoutMs: config.requestTimeoutMs,
});

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();
setupGracefulShutdown();

const server = app.listen(config.port, '0.0.0.0', () => {
  logger.info('server:listening', {
    url: `http://localhost:${config.port}`,
    environment: config.nodeEnv,
    planetApi: config.planet.apiUrl,
    defaultLlmKey: Boolean(config.llm.defaultApiKey),
  });
});
setServerInstance(server);
