import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { mergeStateDelta, type PipelineState } from '@/pipeline/state';
import { executionStage } from '@/pipeline/stages/execution';
import type { ExplorationQuery, ExplorationRow } from '@/types/core';
import { FakeDataClient, FakeLlm, makeContext, makeState } from '../helpers/fakes';

function query(id: string, name = `chart ${id}`): ExplorationQuery {
  return {
    id,
    name,
    sourceURL: 'https://planet.test',
    x: [{ columnID: 'col-city', displayName: 'city', type: 'space', format: 'admin_level_4' }],
    y: [{ columnID: 'col-alerts', displayName: 'count', type: 'integer', format: '', calculation: 'count' }],
    filter: [[]],
  };
}

const cityRows: ExplorationRow[] = [
  { x: [['A']], values: [10] },
  { x: [['B']], values: [20] },
];

function withQueries(state: PipelineState, queries: ExplorationQuery[]): PipelineState {
  return mergeStateDelta(state, { explorationQueries: queries });
}

describe('executionStage', () => {
  it('flattens exploration rows into labelled records', async () => {
    const data = new FakeDataClient({ exploration: () => cityRows });
    const state = withQueries(makeState(new FakeLlm(), data), [query('ds-air')]);

    const delta = await executionStage.execute(makeContext(state));

    expect(delta.searchResults).toEqual([
      {
        ...query('ds-air'),
        json_data: [
          { city: 'A', count: 10 },
          { city: 'B', count: 20 },
        ],
        rowCount: 2,
      },
    ]);
    expect(delta.executionMetadata).toEqual({ chartCount: 1, failedChartCount: 0 });
    expect(delta.errors).toEqual([]);
    expect(data.explorationCalls).toEqual([{ datasetId: 'ds-air', page: { start: 0, pageSize: 1000 } }]);
  });

  it('isolates a failing chart from the others', async () => {
    const data = new FakeDataClient({
      exploration: (q) => {
        if (q.id === 'ds-2') throw new Error('exploration timed out');
        return cityRows;
      },
    });
    const state = withQueries(makeState(new FakeLlm(), data), [query('ds-1'), query('ds-2', 'broken'), query('ds-3')]);

    const delta = await executionStage.execute(makeContext(state));
    const results = delta.searchResults ?? [];

    expect(results.map((r) => r.id)).toEqual(['ds-1', 'ds-2', 'ds-3']);
    expect(results.filter((r) => r.json_data === null)).toHaveLength(1);
    expect(results[1]).toMatchObject({ json_data: null, rowCount: 0, error: 'exploration timed out' });
    expect(results[0].json_data).toHaveLength(2);
    expect(results[2].json_data).toHaveLength(2);
    expect(delta.executionMetadata).toEqual({ chartCount: 3, failedChartCount: 1 });
    expect(delta.errors).toEqual(['execution: chart "broken" (ds-2) failed: exploration timed out']);
  });

  it('records an empty exploration as a chart without data', async () => {
    const state = withQueries(makeState(new FakeLlm(), new FakeDataClient({ exploration: () => [] })), [query('ds-air')]);

    const delta = await executionStage.execute(makeContext(state));

    expect(delta.searchResults?.[0]).toMatchObject({ json_data: null, rowCount: 0, error: 'No data available' });
  });

  it('reads only the first page by default', async () => {
    const data = new FakeDataClient({ exploration: () => cityRows });
    const state = withQueries(makeState(new FakeLlm(), data), [query('ds-air')]);

    await executionStage.execute(makeContext(state, { explorationPageSize: 2 }));

    expect(data.explorationCalls).toHaveLength(1);
  });

  it('follows full pages up to the page limit', async () => {
    const pages: ExplorationRow[][] = [cityRows, cityRows, [{ x: [['C']], values: [30] }]];
    const data = new FakeDataClient({ exploration: (_q, page) => pages[page.start / 2] ?? [] });
    const state = withQueries(makeState(new FakeLlm(), data), [query('ds-air')]);

    const delta = await executionStage.execute(makeContext(state, { explorationPageSize: 2, explorationMaxPages: 5 }));

    expect(data.explorationCalls.map((c) => c.page.start)).toEqual([0, 2, 4]);
    expect(delta.searchResults?.[0].rowCount).toBe(5);
  });

  it('caps json_data at the row limit but counts every row', async () => {
    const rows = Array.from({ length: 5 }, (_, i) => ({ x: [[`c${i}`]], values: [i] }));
    const state = withQueries(makeState(new FakeLlm(), new FakeDataClient({ exploration: () => rows })), [query('ds-air')]);

    const delta = await executionStage.execute(makeContext(state, { jsonDataRowLimit: 3 }));

    expect(delta.searchResults?.[0].json_data).toEqual([
      { city: 'c0', count: 0 },
      { city: 'c1', count: 1 },
      { city: 'c2', count: 2 },
    ]);
    expect(delta.searchResults?.[0].rowCount).toBe(5);
  });

  describe('CSV export', () => {
    let dir = '';

    afterEach(async () => {
      if (dir) await rm(dir, { recursive: true, force: true });
    });

    it('writes the full table when an export directory is configured', async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'execution-csv-'));
      const state = withQueries(makeState(new FakeLlm(), new FakeDataClient({ exploration: () => cityRows })), [
        query('ds-air', 'alerts/city'),
      ]);

      await executionStage.execute(makeContext(state, { csvExportDir: dir }));

      expect(await readFile(path.join(dir, 'alerts_city.csv'), 'utf8')).toBe('\uFEFFcity,count\nA,10\nB,20');
    });

    it('keeps the chart when the export fails', async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'execution-csv-'));
      const blocker = path.join(dir, 'not-a-directory');
      await writeFile(blocker, 'x');
      const state = withQueries(makeState(new FakeLlm(), new FakeDataClient({ exploration: () => cityRows })), [
        query('ds-air'),
      ]);

      const delta = await executionStage.execute(makeContext(state, { csvExportDir: blocker }));

      expect(delta.searchResults?.[0].rowCount).toBe(2);
      expect(delta.executionMetadata?.failedChartCount).toBe(0);
    });
  });
});
