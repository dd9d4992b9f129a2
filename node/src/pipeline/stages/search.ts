// node/src/pipeline/stages/search.ts — dataset discovery: keyword search, then LLM narrows the candidates
import { LlmOutputError, NoDatasetFoundError } from '@/services/errors';
import { logger } from '@/services/logger';
import { attempt } from '@/services/retry';
import type { DatasetRecord, DatasetSummary } from '@/types/core';
import { DatasetExtractOutput } from '../schemas';
import type { Stage } from '../stage-runner';

export const SEARCH_PAGE_SIZE = 50;

export const searchStage: Stage = {
  name: 'search',
  fatal: true,

  async execute({ state, llm, dataClient, templates, config, progress }) {
    const hits = await dataClient.searchDatasets(state.question, SEARCH_PAGE_SIZE);
    const candidates = new Map<string, DatasetSummary>(hits.map((hit) => [hit.id, hit]));
    const totalDatasetsFound = candidates.size;

    progress(`Searched the data planet and found ${totalDatasetsFound} candidate dataset(s).`, {
      totalDatasetsFound,
    });
    if (totalDatasetsFound === 0) {
      throw new NoDatasetFoundError({ reason: 'empty search result' });
    }

    const prompt = templates.datasetExtract({
      question: state.question,
      datasets: Object.fromEntries(candidates),
    });

    const result = await attempt(
      async () => {
        const { object } = await llm.invokeStructured(prompt, DatasetExtractOutput, 'DatasetExtractOutput');
        const selected = object.datasetKeys.flatMap((key) => {
          const hit = candidates.get(key);
          return hit ? [hit] : [];
        });
        if (selected.length === 0) {
          throw new LlmOutputError('No returned dataset key matches a candidate', { keys: object.datasetKeys });
        }
        return selected;
      },
      config.maxAttempts,
      {
        onFailure: (error, n) => logger.warn('search:extract_retry', { attempt: n, error: error.message }),
      },
    );

    if (!result.ok) {
      throw new NoDatasetFoundError({ attempts: result.error.attempts, lastError: result.error.lastError?.message });
    }

    // A key listed twice still selects the dataset once.
    const selected = [...new Map(result.value.map((hit) => [hit.id, hit])).values()];
    const datasets: Record<string, DatasetRecord> = {};
    for (const hit of selected) datasets[hit.id] = { ...hit };
    const selectedDatasetIds = selected.map((hit) => hit.id);
    const names = selected.map((hit) => hit.name);

    progress(`Kept the datasets most relevant to the question: ${names.join(', ')}.`, {
      selectedDatasetIds,
    });
    logger.info('search:selected', { found: totalDatasetsFound, selected: selectedDatasetIds.length });

    return {
      datasets,
      selectedDatasetIds,
      executionMetadata: { totalDatasetsFound, selectedDatasetCount: selectedDatasetIds.length },
    };
  },
};
