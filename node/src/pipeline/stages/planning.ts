// node/src/pipeline/stages/planning.ts — column metadata, LLM chart plan, and spec reconstruction from the catalog
import { LlmOutputError, NoDataRetrievableError, QueryGenerationError } from '@/services/errors';
import { logger } from '@/services/logger';
import { attempt } from '@/services/retry';
import { parseLastJsonBlock } from '@/services/safe-parse-json';
import {
  allowedCalculations,
  defaultOperator,
  isAdminLevelFormat,
  isCalculation,
  isDateFormat,
  isFilterOperator,
  isOperatorAllowed,
  isSpatialType,
  isTemporalType,
  type AxisField,
  type ChartSpec,
  type ColumnMeta,
  type DatasetRecord,
  type FilterField,
  type MetricField,
} from '@/types/core';
import { ChartPlanOutput, type PlannedChart } from '../schemas';
import type { Stage } from '../stage-runner';

type EnrichedDataset = DatasetRecord & { columns: Record<string, ColumnMeta> };

/**
 * Temporal and spatial fields keep a format; an out-of-enum value is passed through with a warning.
 * Every other type gets an empty format.
 */
export function normalizeFormat(column: ColumnMeta, planned: string | null | undefined): string {
  const format = planned || column.format || '';
  if (isTemporalType(column.type)) {
    if (format && !isDateFormat(format)) {
      logger.warn('planning:format_out_of_enum', { columnID: column.columnID, type: column.type, format });
    }
    return format;
  }
  if (isSpatialType(column.type)) {
    if (format && !isAdminLevelFormat(format)) {
      logger.warn('planning:format_out_of_enum', { columnID: column.columnID, type: column.type, format });
    }
    return format;
  }
  return '';
}

function lookupColumn(dataset: EnrichedDataset, columnID: string): ColumnMeta {
  const column = Object.prototype.hasOwnProperty.call(dataset.columns, columnID)
    ? dataset.columns[columnID]
    : undefined;
  if (!column) {
    throw new LlmOutputError(`Unknown column "${columnID}" for dataset ${dataset.id}`, {
      datasetId: dataset.id,
      columnID,
    });
  }
  return column;
}

function toAxisField(column: ColumnMeta, plannedFormat: string | null | undefined): AxisField {
  return {
    columnID: column.columnID,
    displayName: column.displayName,
    type: column.type,
    format: normalizeFormat(column, plannedFormat),
  };
}

/** Rebuild one planned chart from the dataset's own column metadata. */
export function buildChartSpec(planned: PlannedChart, dataset: EnrichedDataset): ChartSpec {
  const x = planned.x.map((field) => toAxisField(lookupColumn(dataset, field.columnID), field.format));

  const y: MetricField[] = [];
  for (const field of planned.y) {
    const column = lookupColumn(dataset, field.columnID);
    const calculation = field.calculation;
    if (!isCalculation(calculation) || !allowedCalculations(column.type).includes(calculation)) {
      logger.debug('planning:metric_dropped', { columnID: column.columnID, type: column.type, calculation });
      continue;
    }
    y.push({ ...toAxisField(column, field.format), calculation });
  }

  const filter: FilterField[] = planned.filter.map((field) => {
    const column = lookupColumn(dataset, field.columnID);
    const operator =
      isFilterOperator(field.operator) && isOperatorAllowed(column.type, field.operator) ? field.operator : null;
    return {
      ...toAxisField(column, field.format),
      operator: operator ?? defaultOperator(column.type),
      value: operator ? (field.value ?? []) : [],
    };
  });

  return {
    id: dataset.id,
    name: planned.name || dataset.name,
    sourceURL: dataset.sourceURL,
    x,
    y,
    filter,
  };
}

function parseChartPlan(content: string): ChartPlanOutput {
  const parsed = ChartPlanOutput.safeParse(parseLastJsonBlock(content, 'chartPlanning'));
  if (!parsed.success) {
    throw new LlmOutputError('chartPlanning: json block does not match the chart plan shape', {
      issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data;
}

export const planningStage: Stage = {
  name: 'planning',
  fatal: true,

  async execute({ state, llm, dataClient, templates, config, adminLevels, progress }) {
    const enriched = new Map<string, EnrichedDataset>();
    for (const id of state.selectedDatasetIds) {
      const record = state.datasets[id];
      if (!record) continue;
      const metadata = await dataClient.getDatasetMetadata(record.id, record.sourceURL);
      if (!metadata) {
        logger.warn('planning:metadata_missing', { datasetId: record.id });
        continue;
      }
      enriched.set(record.id, { ...record, columns: metadata.columns });
    }

    if (enriched.size === 0) {
      throw new NoDataRetrievableError({ datasetIds: state.selectedDatasetIds });
    }

    progress('Analyzing which data to request for each chart.', { datasets: enriched.size });
    const prompt = templates.chartPlanning({
      question: state.question,
      datasets: Object.fromEntries(enriched),
      adminLevels,
    });

    const result = await attempt(
      async () => {
        const { content } = await llm.invoke(prompt);
        const plan = parseChartPlan(content);
        if (plan.charts.length === 0) {
          throw new LlmOutputError('chartPlanning: no charts proposed');
        }
        return plan.charts.map((chart) => {
          const dataset = enriched.get(chart.id);
          if (!dataset) {
            throw new LlmOutputError(`chartPlanning: unknown dataset "${chart.id}"`, { datasetId: chart.id });
          }
          return buildChartSpec(chart, dataset);
        });
      },
      config.maxAttempts,
      {
        onFailure: (error, n) => logger.warn('planning:plan_retry', { attempt: n, error: error.message }),
      },
    );

    if (!result.ok) {
      throw new QueryGenerationError({ attempts: result.error.attempts, lastError: result.error.lastError?.message });
    }

    logger.info('planning:charts', { charts: result.value.length, attempts: result.attempts });
    return {
      datasets: Object.fromEntries(enriched),
      chartSpecs: result.value,
    };
  },
};
