// node/src/services/prompt-templates.ts — prompt text for every LLM-backed stage, injectable as one set
import {
  ADMIN_LEVEL_FORMATS,
  CALCULATIONS,
  DATE_FORMATS,
  NOMINAL_CALCULATIONS,
  type ChartSpec,
  type DatasetRecord,
  type DatasetSummary,
  type ExecutedChart,
} from '@/types/core';
import type { AdminLevelCatalog } from './admin-levels';

export interface DatasetExtractParams {
  question: string;
  datasets: Record<string, DatasetSummary>;
}

export interface ChartPlanningParams {
  question: string;
  datasets: Record<string, DatasetRecord>;
  adminLevels: AdminLevelCatalog;
}

export interface QueryGenerationParams {
  question: string;
  charts: ChartSpec[];
}

export interface InterpretationParams {
  question: string;
  /** Executed charts, or planned specs when nothing was executed. */
  results: ExecutedChart[] | ChartSpec[];
  /** Replaces the default analyst instructions; language and json_data rules still apply. */
  instructions?: string;
}

export interface PromptTemplateSet {
  datasetExtract(params: DatasetExtractParams): string;
  chartPlanning(params: ChartPlanningParams): string;
  queryGeneration(params: QueryGenerationParams): string;
  interpretation(params: InterpretationParams): string;
}

const json = (value: unknown): string => JSON.stringify(value, null, 2);
const list = (values: readonly string[]): string => values.map((v) => `"${v}"`).join(', ');

function buildDatasetExtractPrompt({ question, datasets }: DatasetExtractParams): string {
  const candidates = Object.fromEntries(
    Object.entries(datasets).map(([key, d]) => [key, { name: d.name, description: d.description }]),
  );
  return `
You are filtering a dataset catalog down to the datasets that can answer a question.

Question: ${question}

Candidate datasets (keyed by dataset key):
${json(candidates)}

Instructions:
- Work out what the question asks for: the entities, metrics, places and time span.
- Keep only datasets that directly hold that information. Drop indirect, redundant or loosely related ones.
- Fewer, clearly relevant datasets are better than many.
- Use the keys exactly as given above.

Reply with "datasetKeys" (the kept keys) and "datasetNames" (their names, same order).
`.trim();
}

function buildChartPlanningPrompt({ question, datasets, adminLevels }: ChartPlanningParams): string {
  return `
# Role
You are a senior data analyst who designs charts that answer questions from statistical datasets.
For each dataset that can help, propose exactly one chart. Skip datasets that cannot help.

# Input
Question: ${question}

Datasets (with column metadata keyed by columnID):
${json(datasets)}

admin_level catalog per region:
${json(adminLevels)}

# Steps (write your reasoning for each)
1. Question analysis: list the metrics, the primary axis dimension (usually time or a continuous range) and any grouping dimensions (categories to compare).
2. Dataset choice: keep only the datasets best suited to the question.
3. Column choice: the smallest set of columns that answers the question. Use columnIDs from the metadata only.
4. Axes: columns of type date, datetime, space, nominal, ordinal, point, line or polygon go on "x"; integer and float metrics go on "y".
5. Filters: time ranges, places and categories the question narrows to. A grouping dimension often appears both in "x" and in "filter".
6. Format and calculation:
   - date, datetime: "format" is one of [${list(DATE_FORMATS)}]; filter "operator" is "in".
   - space, point, line, polygon: "format" is the most general admin level (lowest number) that fits the question, one of [${list(ADMIN_LEVEL_FORMATS)}].
   - nominal, ordinal, integer, float: "format" is "".
   - integer, float metrics: "calculation" is one of [${list(CALCULATIONS)}].
   - nominal metrics: "calculation" is one of [${list(NOMINAL_CALCULATIONS)}].

# Output
End your reply with one fenced \`\`\`json block in this shape:
\`\`\`json
{
  "charts": [
    {
      "id": "dataset_id",
      "name": "chart name",
      "x": [{ "columnID": "column_id", "name": "display name", "type": "", "format": "" }],
      "y": [{ "columnID": "column_id", "name": "display name", "type": "", "calculation": "count" }],
      "filter": [{ "columnID": "column_id", "name": "display name", "type": "", "format": "", "operator": "in", "value": [] }]
    }
  ]
}
\`\`\`
`.trim();
}

function buildQueryGenerationPrompt({ question, charts }: QueryGenerationParams): string {
  return `
You are a senior data analyst turning chart plans into exact data queries.

Question: ${question}

Chart configurations (each filter lists its allowed "values"):
${json(charts)}

Rules:
- Return every chart and every filter, in the same order, with the same ids and columnIDs.
- Change only "operator" and "value" on filter objects. Do not add, remove or rename anything else.
- date, datetime, nominal and space filters use "in", with "value" picked from that filter's "values".
- integer and float filters use one of "range", "lt", "gt", "lte", "gte".
- Pick values that match the question exactly. For places, think about where something actually is:
  an office named after one city may sit in a neighbouring one.

Reply with {"queries": [...]} holding the updated chart configurations.
`.trim();
}

const DEFAULT_ANALYST_INSTRUCTIONS = `
You are a data analyst answering a question from retrieved chart data.
Structure the answer as:
1. Data overview: which datasets and charts were used.
2. Key findings: the main patterns in the data.
3. Direct answer: the specific answer to the question.
4. Conclusion: implications in under 300 words.
Only claim what the data supports.
`.trim();

function buildInterpretationPrompt({ question, results, instructions }: InterpretationParams): string {
  return `
${instructions?.trim() || DEFAULT_ANALYST_INSTRUCTIONS}

Rules that always apply:
- Reply in the same language as the question.
- "json_data" in each result is the authoritative data. Base every number and conclusion on it.

Question: ${question}

Data results:
${json(results)}
`.trim();
}

export const defaultPromptTemplates: PromptTemplateSet = {
  datasetExtract: buildDatasetExtractPrompt,
  chartPlanning: buildChartPlanningPrompt,
  queryGeneration: buildQueryGenerationPrompt,
  interpretation: buildInterpretationPrompt,
};
