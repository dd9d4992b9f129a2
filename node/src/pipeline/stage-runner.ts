// node/src/pipeline/stage-runner.ts — runs one stage against the shared state: timing, tokens, delta merge, failure policy
import type { PipelineConfig } from '@/config/app.config';
import type { AdminLevelCatalog } from '@/services/admin-levels';
import type { DataPlanetClient } from '@/services/data-planet-client';
import { errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import type { PromptTemplateSet } from '@/services/prompt-templates';
import { MeteredLlmGateway, addUsage } from '@/services/token-usage';
import { mergeStateDelta, type PipelineState, type StateDelta } from './state';
import type { StageName } from './stage-names';

export interface StageContext {
  /** Read-only view; stages return a delta instead of mutating. */
  readonly state: Readonly<PipelineState>;
  readonly llm: MeteredLlmGateway;
  readonly dataClient: DataPlanetClient;
  readonly templates: PromptTemplateSet;
  readonly config: PipelineConfig;
  readonly adminLevels: AdminLevelCatalog;
  progress(message: string, data?: Record<string, unknown>): void;
}

export interface Stage {
  readonly name: StageName;
  /** Fatal stages stop the run on failure; the others record the error and continue. */
  readonly fatal: boolean;
  execute(ctx: StageContext): Promise<StateDelta>;
}

export interface StageDeps {
  templates: PromptTemplateSet;
  config: PipelineConfig;
  adminLevels: AdminLevelCatalog;
}

function progressFn(stage: StageName, verbose: boolean) {
  return (message: string, data: Record<string, unknown> = {}): void => {
    const payload = { stage, message, ...data };
    if (verbose) logger.info('pipeline:progress', payload);
    else logger.debug('pipeline:progress', payload);
  };
}

export async function runStage(stage: Stage, state: PipelineState, deps: StageDeps): Promise<PipelineState> {
  const llm = new MeteredLlmGateway(state.llm);
  const startedAt = Date.now();
  state.executionMetadata.currentStage = stage.name;
  logger.info('stage:start', { stage: stage.name });

  const ctx: StageContext = {
    state,
    llm,
    dataClient: state.dataClient,
    templates: deps.templates,
    config: deps.config,
    adminLevels: deps.adminLevels,
    progress: progressFn(stage.name, state.verbose),
  };

  const account = (): void => {
    const meta = state.executionMetadata;
    const usage = llm.usage;
    meta.stageTimings = { ...meta.stageTimings, [stage.name]: Date.now() - startedAt };
    meta.stageTokenUsage = { ...meta.stageTokenUsage, [stage.name]: usage };
    meta.tokenUsage = addUsage(meta.tokenUsage, usage);
  };

  try {
    const delta = await stage.execute(ctx);
    mergeStateDelta(state, delta);
    account();
    state.executionMetadata.completedStages = [...state.executionMetadata.completedStages, stage.name];
    logger.info('stage:done', {
      stage: stage.name,
      ms: state.executionMetadata.stageTimings[stage.name],
      tokens: llm.usage.totalTokens,
    });
    return state;
  } catch (err) {
    const message = errorMessage(err);
    account();
    mergeStateDelta(state, {
      errors: [`${stage.name} stage error: ${message}`],
      executionMetadata: {
        failedStages: { ...state.executionMetadata.failedStages, [stage.name]: message },
      },
    });
    logger.error('stage:failed', { stage: stage.name, fatal: stage.fatal, error: message });
    if (stage.fatal) throw err;
    return state;
  }
}
