// node/src/pipeline/schemas.ts — shapes the LLM must return at each stage
import { z } from 'zod';

const idString = z.union([z.string(), z.number()]).transform((v) => String(v));

const filterValue = z
  .union([z.array(z.union([z.string(), z.number()])), z.string(), z.number()])
  .transform((v) => (Array.isArray(v) ? v : [v]).map((item) => String(item)));

/** Search: which candidate datasets to keep. */
export const DatasetExtractOutput = z.object({
  datasetKeys: z.array(idString),
  datasetNames: z.array(z.string()).default([]),
});
export type DatasetExtractOutput = z.infer<typeof DatasetExtractOutput>;

const plannedAxis = z.object({
  columnID: idString,
  name: z.string().optional(),
  type: z.string().optional(),
  format: z.string().nullish(),
});

const plannedMetric = plannedAxis.extend({
  calculation: z.string().optional(),
});

const plannedFilter = plannedAxis.extend({
  operator: z.string().optional(),
  value: filterValue.optional(),
});

/** Planning: the ```json block of the chart-planning reply. Only ids are trusted; metadata is re-read from the catalog. */
export const ChartPlanOutput = z.object({
  charts: z.array(
    z.object({
      id: idString,
      name: z.string().optional(),
      x: z.array(plannedAxis).default([]),
      y: z.array(plannedMetric).default([]),
      filter: z.array(plannedFilter).default([]),
    }),
  ),
});
export type ChartPlanOutput = z.infer<typeof ChartPlanOutput>;
export type PlannedChart = ChartPlanOutput['charts'][number];

/** Filter decision: chart specs echoed back with operator/value filled in. */
export const QueryList = z.object({
  queries: z.array(
    z
      .object({
        id: idString,
        filter: z.array(
          z
            .object({
              columnID: idString,
              operator: z.string(),
              value: filterValue,
            })
            .passthrough(),
        ),
      })
      .passthrough(),
  ),
});
export type QueryList = z.infer<typeof QueryList>;
