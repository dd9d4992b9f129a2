// node/src/pipeline/orchestrator.ts — AnalyticsPipeline: one question, five stages, strictly in order
import { randomUUID } from 'crypto';
import type { AppConfig, PlanetConfig } from '@/config/app.config';
import { adminLevels as defaultAdminLevels, type AdminLevelCatalog } from '@/services/admin-levels';
import type { DataPlanetClient } from '@/services/data-planet-client';
import { PipelineError, errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import { defaultPromptTemplates, type PromptTemplateSet } from '@/services/prompt-templates';
import type { LlmGateway } from '@/types/llm';
import { runStage, type Stage } from './stage-runner';
import { STAGE_ORDER, type StageName } from './stage-names';
import { createInitialState, snapshotState, type PipelineResult } from './state';
import { executionStage } from './stages/execution';
import { filterDecisionStage } from './stages/filter-decision';
import { interpretationStage } from './stages/interpretation';
import { planningStage } from './stages/planning';
import { searchStage } from './stages/search';

export interface PlanetOverrides {
  ssoUrl?: string;
  apiUrl?: string;
  clientId?: string;
  clientSecret?: string;
}

export interface PipelineRequest {
  question: string;
  /** LLM key; the provider follows from its prefix. Falls back to the configured default key. */
  apiKey?: string;
  planet?: PlanetOverrides;
  verbose?: boolean;
  /** Replaces the default analyst instructions of the interpretation prompt. */
  interpretationPrompt?: string;
}

export interface PipelineDeps {
  config: Pick<AppConfig, 'planet' | 'llm' | 'pipeline'>;
  createLlm: (apiKey: string) => LlmGateway;
  createDataClient: (planet: PlanetConfig) => DataPlanetClient;
  templates?: PromptTemplateSet;
  adminLevels?: AdminLevelCatalog;
}

/** Stages keyed by name; run in STAGE_ORDER. */
export const DEFAULT_STAGES: Readonly<Record<StageName, Stage>> = {
  search: searchStage,
  planning: planningStage,
  filterDecision: filterDecisionStage,
  execution: executionStage,
  interpretation: interpretationStage,
};

export class AnalyticsPipeline {
  private readonly templates: PromptTemplateSet;
  private readonly adminLevels: AdminLevelCatalog;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly stages: Readonly<Record<StageName, Stage>> = DEFAULT_STAGES,
  ) {
    this.templates = deps.templates ?? defaultPromptTemplates;
    this.adminLevels = deps.adminLevels ?? defaultAdminLevels;
  }

  async run(request: PipelineRequest): Promise<PipelineResult> {
    const question = request.question.trim();
    if (!question) {
      throw new PipelineError('Question must not be empty', 'INVALID_REQUEST', null, false);
    }
    const apiKey = request.apiKey?.trim() || this.deps.config.llm.defaultApiKey;
    if (!apiKey) {
      throw new PipelineError('No LLM API key in the request and none configured', 'INVALID_REQUEST', null, false);
    }

    const runId = randomUUID();
    const planet: PlanetConfig = { ...this.deps.config.planet, ...definedOnly(request.planet) };
    const state = createInitialState({
      question,
      llm: this.deps.createLlm(apiKey),
      dataClient: this.deps.createDataClient(planet),
      verbose: request.verbose,
      interpretationPrompt: request.interpretationPrompt,
    });
    const stageDeps = { templates: this.templates, config: this.deps.config.pipeline, adminLevels: this.adminLevels };

    logger.info('pipeline:start', { runId, question });
    try {
      for (const name of STAGE_ORDER) {
        await runStage(this.stages[name], state, stageDeps);
      }
    } catch (err) {
      const snapshot = snapshotState(state);
      logger.error('pipeline:failed', {
        runId,
        stage: state.executionMetadata.currentStage,
        error: errorMessage(err),
      });
      if (err instanceof PipelineError) {
        err.snapshot = snapshot;
        throw err;
      }
      const wrapped = new PipelineError(errorMessage(err), 'STAGE_FAILED', state.executionMetadata.currentStage, false);
      wrapped.snapshot = snapshot;
      throw wrapped;
    }

    const result = snapshotState(state);
    logger.info('pipeline:done', {
      runId,
      charts: result.executionMetadata.chartCount,
      tokens: result.executionMetadata.tokenUsage.totalTokens,
    });
    return result;
  }
}

function definedOnly(overrides: PlanetOverrides | undefined): PlanetOverrides {
  if (!overrides) return {};
  const out: PlanetOverrides = {};
  if (overrides.ssoUrl) out.ssoUrl = overrides.ssoUrl;
  if (overrides.apiUrl) out.apiUrl = overrides.apiUrl;
  if (overrides.clientId) out.clientId = overrides.clientId;
  if (overrides.clientSecret) out.clientSecret = overrides.clientSecret;
  return out;
}
