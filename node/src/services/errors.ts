// node/src/services/errors.ts — typed errors for the pipeline, its clients and config
import type { StageName } from '@/pipeline/stage-names';
import type { PipelineResult } from '@/pipeline/state';

export class PipelineError extends Error {
  /** Run snapshot at the time the error reached the orchestrator. */
  public snapshot?: PipelineResult;

  constructor(
    message: string,
    public readonly code: string,
    public readonly stage: StageName | null,
    public readonly retryable: boolean,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PipelineError';
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      stage: this.stage,
      message: this.message,
      details: this.details,
    };
  }
}

/** Malformed or inconsistent LLM output; stages retry on it. */
export class LlmOutputError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_OUTPUT_INVALID', null, true, details);
    this.name = 'LlmOutputError';
  }
}

export class NoDatasetFoundError extends PipelineError {
  constructor(details?: Record<string, unknown>) {
    super(
      'Search was unable to find a dataset capable of answering the question',
      'NO_DATASET_FOUND',
      'search',
      false,
      details,
    );
    this.name = 'NoDatasetFoundError';
  }
}

export class NoDataRetrievableError extends PipelineError {
  constructor(details?: Record<string, unknown>) {
    super(
      'Unable to retrieve column metadata for any selected dataset',
      'NO_DATA_RETRIEVABLE',
      'planning',
      false,
      details,
    );
    this.name = 'NoDataRetrievableError';
  }
}

export class QueryGenerationError extends PipelineError {
  constructor(details?: Record<string, unknown>) {
    super('AI unable to generate accurate API calls', 'QUERY_GENERATION_FAILED', 'planning', false, details);
    this.name = 'QueryGenerationError';
  }
}

export class FilterSelectionError extends PipelineError {
  constructor(details?: Record<string, unknown>) {
    super('AI cannot select accurate filter value', 'FILTER_SELECTION_FAILED', 'filterDecision', false, details);
    this.name = 'FilterSelectionError';
  }
}

export class DataPlanetRequestError extends PipelineError {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly url: string,
  ) {
    super(message, 'DATA_PLANET_REQUEST_FAILED', null, false, { status, url });
    this.name = 'DataPlanetRequestError';
  }
}

export class ConfigError extends Error {
  public readonly code = 'CONFIG_INVALID';

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
