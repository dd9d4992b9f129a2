// node/src/pipeline/state.ts — per-question pipeline state and the delta merge rules
import type { DataPlanetClient } from '@/services/data-planet-client';
import { emptyUsage } from '@/services/token-usage';
import type { ChartSpec, DatasetRecord, ExecutedChart, ExplorationQuery } from '@/types/core';
import type { LlmGateway, TokenUsage } from '@/types/llm';
import type { StageName } from './stage-names';

export interface ExecutionMetadata {
  startTime: string;
  currentStage: StageName | null;
  completedStages: StageName[];
  failedStages: Partial<Record<StageName, string>>;
  /** Milliseconds per stage. */
  stageTimings: Partial<Record<StageName, number>>;
  stageTokenUsage: Partial<Record<StageName, TokenUsage>>;
  tokenUsage: TokenUsage;
  totalDatasetsFound: number;
  selectedDatasetCount: number;
  chartCount: number;
  failedChartCount: number;
}

export interface PipelineState {
  readonly question: string;
  readonly llm: LlmGateway;
  readonly dataClient: DataPlanetClient;
  readonly verbose: boolean;
  readonly interpretationPrompt?: string;

  datasets: Record<string, DatasetRecord>;
  selectedDatasetIds: string[];
  chartSpecs: ChartSpec[];
  explorationQueries: ExplorationQuery[];
  searchResults: ExecutedChart[];
  finalResponse?: string;
  errors: string[];
  executionMetadata: ExecutionMetadata;
}

/** What a stage hands back; merged into the state by `mergeStateDelta`. */
export interface StateDelta {
  datasets?: Record<string, DatasetRecord>;
  selectedDatasetIds?: string[];
  chartSpecs?: ChartSpec[];
  explorationQueries?: ExplorationQuery[];
  searchResults?: ExecutedChart[];
  finalResponse?: string;
  errors?: string[];
  executionMetadata?: Partial<ExecutionMetadata>;
}

export interface PipelineResult {
  question: string;
  finalResponse: string | null;
  searchResults: ExecutedChart[];
  chartSpecs: ChartSpec[];
  errors: string[];
  executionMetadata: ExecutionMetadata;
}

export interface InitialStateInput {
  question: string;
  llm: LlmGateway;
  dataClient: DataPlanetClient;
  verbose?: boolean;
  interpretationPrompt?: string;
}

export function createInitialState(input: InitialStateInput, now: Date = new Date()): PipelineState {
  return {
    question: input.question,
    llm: input.llm,
    dataClient: input.dataClient,
    verbose: input.verbose ?? false,
    interpretationPrompt: input.interpretationPrompt,
    datasets: {},
    selectedDatasetIds: [],
    chartSpecs: [],
    explorationQueries: [],
    searchResults: [],
    errors: [],
    executionMetadata: {
      startTime: now.toISOString(),
      currentStage: null,
      completedStages: [],
      failedStages: {},
      stageTimings: {},
      stageTokenUsage: {},
      tokenUsage: emptyUsage(),
      totalDatasetsFound: 0,
      selectedDatasetCount: 0,
      chartCount: 0,
      failedChartCount: 0,
    },
  };
}

/**
 * Apply a stage delta in place.
 * searchResults and errors append; datasets merge by id; executionMetadata merges shallowly;
 * every other field is replaced.
 */
export function mergeStateDelta(state: PipelineState, delta: StateDelta): PipelineState {
  if (delta.searchResults) state.searchResults = [...state.searchResults, ...delta.searchResults];
  if (delta.errors) state.errors = [...state.errors, ...delta.errors];
  if (delta.datasets) {
    const merged = { ...state.datasets };
    for (const [id, record] of Object.entries(delta.datasets)) {
      merged[id] = { ...merged[id], ...record };
    }
    state.datasets = merged;
  }
  if (delta.executionMetadata) {
    state.executionMetadata = { ...state.executionMetadata, ...delta.executionMetadata };
  }
  if (delta.selectedDatasetIds) state.selectedDatasetIds = delta.selectedDatasetIds;
  if (delta.chartSpecs) state.chartSpecs = delta.chartSpecs;
  if (delta.explorationQueries) state.explorationQueries = delta.explorationQueries;
  if (delta.finalResponse !== undefined) state.finalResponse = delta.finalResponse;
  return state;
}

export function snapshotState(state: PipelineState): PipelineResult {
  return {
    question: state.question,
    finalResponse: state.finalResponse ?? null,
    searchResults: state.searchResults,
    chartSpecs: state.chartSpecs,
    errors: [...state.errors],
    executionMetadata: { ...state.executionMetadata },
  };
}
