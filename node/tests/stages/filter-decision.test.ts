import { describe, it, expect } from 'vitest';
import { FilterSelectionError } from '@/services/errors';
import { mergeStateDelta, type PipelineState } from '@/pipeline/state';
import { executionStage } from '@/pipeline/stages/execution';
import { filterDecisionStage } from '@/pipeline/stages/filter-decision';
import type { ChartSpec } from '@/types/core';
import { FakeDataClient, FakeLlm, airColumns, airQuality, makeContext, makeState, rainfall } from '../helpers/fakes';

const alertsChart: ChartSpec = {
  id: 'ds-air',
  name: 'Alerts by city',
  sourceURL: 'https://planet.test',
  x: [
    { columnID: 'col-city', displayName: 'city', type: 'space', format: 'admin_level_4' },
    { columnID: 'col-station', displayName: 'station', type: 'nominal', format: '' },
  ],
  y: [{ columnID: 'col-alerts', displayName: 'count', type: 'integer', format: '', calculation: 'sum' }],
  filter: [
    { columnID: 'col-date', displayName: 'date', type: 'date', format: 'month', operator: 'in', value: [] },
    { columnID: 'col-station', displayName: 'station', type: 'nominal', format: '', operator: 'in', value: [] },
    { columnID: 'col-alerts', displayName: 'count', type: 'integer', format: '', operator: 'range', value: [] },
  ],
};

const rainChart: ChartSpec = {
  id: 'ds-rain',
  name: 'Rainfall by month',
  sourceURL: 'https://planet.test',
  x: [{ columnID: 'col-month', displayName: 'month', type: 'date', format: 'year_month' }],
  y: [{ columnID: 'col-mm', displayName: 'mm', type: 'float', format: '', calculation: 'avg' }],
  filter: [],
};

const goodReply = {
  queries: [
    {
      id: 'ds-air',
      name: 'Alerts by city',
      filter: [
        { columnID: 'col-date', operator: 'in', value: ['2024-01'] },
        { columnID: 'col-station', operator: 'in', value: ['S1'] },
        { columnID: 'col-alerts', operator: 'gte', value: [10] },
      ],
    },
  ],
};

const filterValues = { 'col-date': ['2024-01', '2024-02'], 'col-station': ['S1', 'S2'] };

function withCharts(state: PipelineState, charts: ChartSpec[]): PipelineState {
  return mergeStateDelta(state, {
    datasets: { 'ds-air': { ...airQuality, columns: airColumns }, 'ds-rain': { ...rainfall } },
    chartSpecs: charts,
  });
}

describe('filterDecisionStage', () => {
  it('takes operator and value from the LLM and wraps the filters in one group', async () => {
    const llm = new FakeLlm([], [goodReply]);
    const state = withCharts(makeState(llm, new FakeDataClient({ filterValues })), [alertsChart]);

    const delta = await filterDecisionStage.execute(makeContext(state));

    expect(delta.explorationQueries).toEqual([
      {
        id: 'ds-air',
        name: 'Alerts by city',
        sourceURL: 'https://planet.test',
        x: [
          { columnID: 'col-city', displayName: 'city', type: 'space', format: 'admin_level_4' },
          { columnID: 'col-station', displayName: 'station', type: 'nominal' },
        ],
        y: alertsChart.y,
        filter: [
          [
            {
              columnID: 'col-date',
              displayName: 'date',
              type: 'date',
              format: 'month',
              operator: 'in',
              value: ['2024-01'],
            },
            {
              columnID: 'col-station',
              displayName: 'station',
              type: 'nominal',
              operator: 'in',
              value: ['S1'],
            },
            {
              columnID: 'col-alerts',
              displayName: 'count',
              type: 'integer',
              operator: 'gte',
              value: ['10'],
            },
          ],
        ],
      },
    ]);
    const query = delta.explorationQueries?.[0];
    expect(query?.x.map((field) => 'format' in field)).toEqual([true, false]);
    expect(query?.filter[0].map((field) => 'format' in field)).toEqual([true, false, false]);
    expect(query?.filter[0].some((field) => 'values' in field)).toBe(false);
  });

  it('keeps unchosen filter values out of the exploration body and the results', async () => {
    const stations = Array.from({ length: 1000 }, (_, i) => `station-${i}`);
    const reply = {
      queries: [{ id: 'ds-air', filter: [{ columnID: 'col-station', operator: 'in', value: ['station-7'] }] }],
    };
    const chart: ChartSpec = { ...alertsChart, filter: [alertsChart.filter[1]] };
    const data = new FakeDataClient({
      filterValues: { 'col-station': stations },
      exploration: () => [{ x: [['Taipei'], ['station-7']], values: [3] }],
    });
    const state = withCharts(makeState(new FakeLlm([], [reply]), data), [chart]);

    mergeStateDelta(state, await filterDecisionStage.execute(makeContext(state)));
    const executed = await executionStage.execute(makeContext(state));

    expect(data.explorationBodies).toHaveLength(1);
    expect(data.explorationBodies[0].filter).toEqual([
      [{ columnID: 'col-station', displayName: 'station', type: 'nominal', operator: 'in', value: ['station-7'] }],
    ]);
    expect(JSON.stringify(executed.searchResults)).not.toContain('station-999');
    expect(state.datasets['ds-air'].columns?.['col-station'].values).toHaveLength(1000);
  });

  it('fetches domains only for charts with filters and copies them onto the dataset columns', async () => {
    const data = new FakeDataClient({ filterValues });
    const reply = { queries: [goodReply.queries[0], { id: 'ds-rain', filter: [] }] };
    const state = withCharts(makeState(new FakeLlm([], [reply]), data), [alertsChart, rainChart]);

    const delta = await filterDecisionStage.execute(makeContext(state));

    expect(data.filterOptionCalls).toEqual([{ datasetId: 'ds-air', columnIDs: ['col-date', 'col-station', 'col-alerts'] }]);
    expect(delta.datasets?.['ds-air'].columns?.['col-station'].values).toEqual(['S1', 'S2']);
    expect(delta.datasets?.['ds-air'].columns?.['col-city'].values).toBeUndefined();
    expect(delta.explorationQueries?.[1].filter).toEqual([[]]);
    expect(state.chartSpecs[0].filter[0].values).toBeUndefined();
  });

  it('keeps filter count and identity, retrying replies that change them', async () => {
    const dropped = { queries: [{ id: 'ds-air', filter: goodReply.queries[0].filter.slice(0, 2) }] };
    const renamed = {
      queries: [
        {
          id: 'ds-air',
          filter: [
            { columnID: 'col-city', operator: 'in', value: ['Taipei'] },
            ...goodReply.queries[0].filter.slice(1),
          ],
        },
      ],
    };
    const llm = new FakeLlm([], [dropped, renamed, goodReply]);
    const state = withCharts(makeState(llm, new FakeDataClient({ filterValues })), [alertsChart]);

    const delta = await filterDecisionStage.execute(makeContext(state));

    expect(llm.structuredCalls).toHaveLength(3);
    const output = delta.explorationQueries?.[0].filter[0] ?? [];
    expect(output.map((f) => f.columnID)).toEqual(alertsChart.filter.map((f) => f.columnID));
  });

  it('retries an operator the column type forbids', async () => {
    const wrongOperator = {
      queries: [
        {
          id: 'ds-air',
          filter: [
            { columnID: 'col-date', operator: 'range', value: ['2024-01', '2024-02'] },
            ...goodReply.queries[0].filter.slice(1),
          ],
        },
      ],
    };
    const llm = new FakeLlm([], [wrongOperator, goodReply]);
    const state = withCharts(makeState(llm, new FakeDataClient({ filterValues })), [alertsChart]);

    const delta = await filterDecisionStage.execute(makeContext(state));

    expect(llm.structuredCalls).toHaveLength(2);
    for (const field of delta.explorationQueries?.[0].filter[0] ?? []) {
      if (['date', 'datetime', 'nominal', 'space'].includes(field.type)) expect(field.operator).toBe('in');
      if (['integer', 'float'].includes(field.type)) expect(['range', 'lt', 'gt', 'lte', 'gte']).toContain(field.operator);
    }
  });

  it('raises FilterSelectionError after exactly 5 malformed replies', async () => {
    const llm = new FakeLlm([], [{ charts: 'wrong key' }]);
    const state = withCharts(makeState(llm, new FakeDataClient({ filterValues })), [alertsChart]);

    const error = await filterDecisionStage.execute(makeContext(state)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FilterSelectionError);
    expect(error).toMatchObject({ message: 'AI cannot select accurate filter value', stage: 'filterDecision' });
    expect(llm.structuredCalls).toHaveLength(5);
  });
});
