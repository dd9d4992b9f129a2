// node/src/pipeline/stages/execution.ts — run each exploration query; a failing chart never stops the others
import { exportTableCsv } from '@/services/csv-export';
import { errorMessage } from '@/services/errors';
import {
  flattenExplorationRows,
  toRecords,
  type ExplorationTable,
} from '@/services/exploration-table';
import { logger } from '@/services/logger';
import type { ExecutedChart, ExplorationQuery, ExplorationRow } from '@/types/core';
import type { StageContext, Stage } from '../stage-runner';

async function fetchRows(ctx: StageContext, query: ExplorationQuery): Promise<ExplorationRow[]> {
  const { explorationPageSize: pageSize, explorationMaxPages } = ctx.config;
  const rows: ExplorationRow[] = [];

  for (let page = 0; page < explorationMaxPages; page++) {
    const batch = await ctx.dataClient.executeExploration(query, { start: page * pageSize, pageSize });
    rows.push(...batch);
    if (batch.length < pageSize) break;
  }
  return rows;
}

async function exportCsv(dir: string, query: ExplorationQuery, table: ExplorationTable): Promise<void> {
  try {
    const file = await exportTableCsv(dir, query.name, table);
    logger.debug('execution:csv_written', { datasetId: query.id, file });
  } catch (err) {
    logger.warn('execution:csv_failed', { datasetId: query.id, error: errorMessage(err) });
  }
}

export async function executeChart(ctx: StageContext, query: ExplorationQuery): Promise<ExecutedChart> {
  try {
    const rows = await fetchRows(ctx, query);
    if (rows.length === 0) {
      return { ...query, json_data: null, rowCount: 0, error: 'No data available' };
    }

    const table = flattenExplorationRows(
      rows,
      query.x.map((field) => field.displayName),
      query.y.map((field) => field.displayName),
    );
    if (ctx.config.csvExportDir) await exportCsv(ctx.config.csvExportDir, query, table);

    return {
      ...query,
      json_data: toRecords(table, ctx.config.jsonDataRowLimit),
      rowCount: table.rows.length,
    };
  } catch (err) {
    const message = errorMessage(err);
    logger.error('execution:chart_failed', { datasetId: query.id, chart: query.name, error: message });
    return { ...query, json_data: null, rowCount: 0, error: message };
  }
}

export const executionStage: Stage = {
  name: 'execution',
  fatal: false,

  async execute(ctx) {
    const results: ExecutedChart[] = [];
    for (const query of ctx.state.explorationQueries) {
      results.push(await executeChart(ctx, query));
    }

    const failed = results.filter((chart) => chart.json_data === null);
    ctx.progress(`Retrieved data for ${results.length - failed.length} of ${results.length} chart(s).`, {
      failed: failed.length,
    });

    return {
      searchResults: results,
      errors: failed.map((chart) => `execution: chart "${chart.name}" (${chart.id}) failed: ${chart.error ?? 'unknown error'}`),
      executionMetadata: { chartCount: results.length, failedChartCount: failed.length },
    };
  },
};
