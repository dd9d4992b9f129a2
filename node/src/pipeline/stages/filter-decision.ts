// node/src/pipeline/stages/filter-decision.ts — filter domains, then LLM picks operator/value for every filter
import { FilterSelectionError, LlmOutputError } from '@/services/errors';
import { logger } from '@/services/logger';
import { attempt } from '@/services/retry';
import {
  isFilterOperator,
  isOperatorAllowed,
  keepsFormatAfterFilterDecision,
  type AxisField,
  type ChartSpec,
  type DatasetRecord,
  type ExplorationQuery,
  type FilterField,
  type FilterOperator,
} from '@/types/core';
import { QueryList } from '../schemas';
import type { Stage } from '../stage-runner';

type DecidedQuery = QueryList['queries'][number];

function cloneChart(chart: ChartSpec): ChartSpec {
  return {
    ...chart,
    x: chart.x.map((field) => ({ ...field })),
    y: chart.y.map((field) => ({ ...field })),
    filter: chart.filter.map((field) => ({ ...field })),
  };
}

function stripAxisFormat(field: AxisField): AxisField {
  if (keepsFormatAfterFilterDecision(field.type)) return field;
  const copy = { ...field };
  delete copy.format;
  return copy;
}

/** The decided filter carries operator and value only; the domain stays on the dataset column. */
function decidedFilter(field: FilterField, operator: FilterOperator, value: string[]): FilterField {
  const copy: FilterField = { ...field, operator, value };
  delete copy.values;
  if (!keepsFormatAfterFilterDecision(field.type)) delete copy.format;
  return copy;
}

/**
 * Merge the LLM's decision into the input chart. Only operator and value are taken from the
 * reply; a changed chart or filter identity, or an operator the column type forbids, is rejected.
 */
export function applyFilterDecision(chart: ChartSpec, decided: DecidedQuery): ExplorationQuery {
  if (decided.id !== chart.id) {
    throw new LlmOutputError(`Query for chart "${chart.id}" came back as "${decided.id}"`);
  }
  if (decided.filter.length !== chart.filter.length) {
    throw new LlmOutputError(`Chart "${chart.id}" has ${chart.filter.length} filter(s), reply has ${decided.filter.length}`);
  }

  const filters = chart.filter.map((field, i): FilterField => {
    const choice = decided.filter[i];
    if (choice.columnID !== field.columnID) {
      throw new LlmOutputError(`Filter ${i} of chart "${chart.id}" changed from "${field.columnID}" to "${choice.columnID}"`);
    }
    if (!isFilterOperator(choice.operator) || !isOperatorAllowed(field.type, choice.operator)) {
      throw new LlmOutputError(`Operator "${choice.operator}" is not allowed on ${field.type} column "${field.columnID}"`);
    }
    return decidedFilter(field, choice.operator, choice.value);
  });

  return {
    id: chart.id,
    name: chart.name,
    sourceURL: chart.sourceURL,
    x: chart.x.map(stripAxisFormat),
    y: chart.y,
    filter: [filters],
  };
}

export const filterDecisionStage: Stage = {
  name: 'filterDecision',
  fatal: true,

  async execute({ state, llm, dataClient, templates, config, progress }) {
    const charts = state.chartSpecs.map(cloneChart);
    const datasets: Record<string, DatasetRecord> = {};

    for (const chart of charts) {
      if (chart.filter.length === 0) continue;
      await dataClient.getFilterOptions(chart.id, chart.sourceURL, chart.filter);

      const dataset = datasets[chart.id] ?? state.datasets[chart.id];
      if (dataset?.columns) {
        const columns = { ...dataset.columns };
        for (const field of chart.filter) {
          const column = columns[field.columnID];
          if (column) columns[field.columnID] = { ...column, values: field.values ?? [] };
        }
        datasets[chart.id] = { ...dataset, columns };
      }
    }

    progress('Choosing filter values for each chart.', { charts: charts.length });
    const prompt = templates.queryGeneration({ question: state.question, charts });

    const result = await attempt(
      async () => {
        const { object } = await llm.invokeStructured(prompt, QueryList, 'QueryList');
        if (object.queries.length !== charts.length) {
          throw new LlmOutputError(`Expected ${charts.length} queries, reply has ${object.queries.length}`);
        }
        return charts.map((chart, i) => applyFilterDecision(chart, object.queries[i]));
      },
      config.maxAttempts,
      {
        onFailure: (error, n) => logger.warn('filterDecision:retry', { attempt: n, error: error.message }),
      },
    );

    if (!result.ok) {
      throw new FilterSelectionError({ attempts: result.error.attempts, lastError: result.error.lastError?.message });
    }

    logger.info('filterDecision:queries', { queries: result.value.length, attempts: result.attempts });
    return { datasets, explorationQueries: result.value };
  },
};
