// node/src/services/pipeline-deps.ts — production collaborators for the pipeline (OpenAI-SDK gateway, axios data client)
import type { AppConfig } from '@/config/app.config';
import type { PipelineDeps } from '@/pipeline/orchestrator';
import { HttpDataPlanetClient } from './data-planet-client';
import { OpenAiLlmGateway } from './llm-client';

/** One LLM gateway per request (the key decides the provider); one data client per request (token per credentials). */
export function getPipelineDeps(config: AppConfig): PipelineDeps {
  return {
    config,
    createLlm: (apiKey) => new OpenAiLlmGateway(apiKey, config.llm),
    createDataClient: (planet) => new HttpDataPlanetClient(planet),
  };
}
