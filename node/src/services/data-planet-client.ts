// node/src/services/data-planet-client.ts — authenticated axios client for the data planet REST API
import axios, { type AxiosInstance, type Method } from 'axios';
import { z } from 'zod';
import type { PlanetConfig } from '@/config/app.config';
import {
  isColumnType,
  type ColumnMeta,
  type DatasetMetadata,
  type DatasetSummary,
  type ExplorationPage,
  type ExplorationQuery,
  type ExplorationRow,
  type FilterField,
} from '@/types/core';
import { DataPlanetRequestError, errorMessage } from './errors';
import { logger } from './logger';

/** What the pipeline needs from the data planet. */
export interface DataPlanetClient {
  searchDatasets(keyword: string, pageSize: number): Promise<DatasetSummary[]>;
  /** Null when the dataset catalog cannot be fetched. */
  getDatasetMetadata(datasetId: string, sourceURL: string): Promise<DatasetMetadata | null>;
  /** Fills `values` on each filter in place; a failing column gets `[]`. */
  getFilterOptions(datasetId: string, sourceURL: string, filters: FilterField[]): Promise<void>;
  executeExploration(query: ExplorationQuery, page: ExplorationPage): Promise<ExplorationRow[]>;
}

const tokenResponseSchema = z.object({ access_token: z.string().min(1) });

const envelopeSchema = z.object({ data: z.unknown() });

const datasetHitSchema = z
  .object({
    id: z.coerce.string(),
    name: z.string().default(''),
    description: z.string().nullish(),
    sourceURL: z.string().default(''),
  })
  .passthrough();

const columnSchema = z
  .object({
    id: z.coerce.string(),
    displayName: z.string().nullish(),
    name: z.string().nullish(),
    type: z.string(),
    format: z.string().nullish(),
    visible: z.boolean().nullish(),
  })
  .passthrough();

const catalogSchema = z.object({ columns: z.array(columnSchema).default([]) }).passthrough();

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const explorationRowSchema = z.object({
  x: z.array(z.array(cellSchema)).default([]),
  values: z.array(cellSchema).default([]),
});

type ColumnPayload = z.infer<typeof columnSchema>;

function toColumnMeta(column: ColumnPayload, virtual: boolean): ColumnMeta | null {
  if (!isColumnType(column.type) || column.type === 'undefined') return null;
  if (column.visible === false) return null;
  const meta: ColumnMeta = {
    columnID: column.id,
    displayName: column.displayName ?? column.name ?? column.id,
    type: column.type,
  };
  if (column.format) meta.format = column.format;
  if (virtual) meta.virtual = true;
  return meta;
}

function stripAdminSuffix(sourceURL: string): string {
  const idx = sourceURL.indexOf('/admin');
  return idx === -1 ? sourceURL : sourceURL.slice(0, idx);
}

/** Response payloads come wrapped as `{ data: { list } }` or `{ data }`. */
function unwrapPayload(body: unknown): unknown {
  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) return body;
  const data = envelope.data.data;
  if (typeof data === 'object' && data !== null && 'list' in data) {
    return data.list ?? data;
  }
  return data;
}

interface RequestSpec {
  method: Method;
  url: string;
  params?: Record<string, string | number>;
  data?: unknown;
}

export class HttpDataPlanetClient implements DataPlanetClient {
  private token: string | null = null;
  private http: AxiosInstance;

  constructor(
    private readonly config: PlanetConfig,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({ timeout: config.timeoutMs });
  }

  private async authenticate(): Promise<string> {
    const { clientId, clientSecret } = this.config;
    const url = `${this.config.ssoUrl.replace(/\/+$/, '')}/realms/stellar/protocol/openid-connect/token`;
    if (!clientId || !clientSecret) {
      throw new DataPlanetRequestError('Data planet credentials are not configured', null, url);
    }

    logger.info('planet:authenticate', { ssoUrl: this.config.ssoUrl });
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: clientId,
      client_secret: clientSecret,
    });
    const res = await this.http.post<unknown>(url, form.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      timeout: this.config.timeoutMs,
      validateStatus: () => true,
    });
    if (res.status !== 200) {
      throw new DataPlanetRequestError(`SSO token request failed with status ${res.status}`, res.status, url);
    }
    const parsed = tokenResponseSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new DataPlanetRequestError('SSO token response has no access_token', res.status, url);
    }
    this.token = parsed.data.access_token;
    return this.token;
  }

  /** Two attempts: a non-200 or transport failure on the first one re-authenticates and retries. */
  private async request(spec: RequestSpec): Promise<unknown> {
    let lastError: DataPlanetRequestError | null = null;

    for (let attemptNumber = 1; attemptNumber <= 2; attemptNumber++) {
      try {
        const token = attemptNumber === 1 && this.token ? this.token : await this.authenticate();
        const res = await this.http.request<unknown>({
          method: spec.method,
          url: spec.url,
          params: spec.params,
          data: spec.data,
          headers: { Authorization: `Bearer ${token}` },
          timeout: this.config.timeoutMs,
          validateStatus: () => true,
        });
        if (res.status === 200) return unwrapPayload(res.data);
        lastError = new DataPlanetRequestError(
          `${spec.method} ${spec.url} failed with status ${res.status}`,
          res.status,
          spec.url,
        );
      } catch (err) {
        lastError =
          err instanceof DataPlanetRequestError
            ? err
            : new DataPlanetRequestError(`${spec.method} ${spec.url} failed: ${errorMessage(err)}`, null, spec.url);
      }
      if (attemptNumber === 1) {
        logger.warn('planet:retry_with_fresh_token', { url: spec.url, error: lastError.message });
      }
    }

    throw lastError ?? new DataPlanetRequestError(`${spec.method} ${spec.url} failed`, null, spec.url);
  }

  async searchDatasets(keyword: string, pageSize: number): Promise<DatasetSummary[]> {
    const payload = await this.request({
      method: 'GET',
      url: `${this.config.apiUrl.replace(/\/+$/, '')}/api/galaxy/dataset`,
      params: { keyword, pageSize },
    });
    const hits = z.array(datasetHitSchema).safeParse(payload);
    if (!hits.success) {
      throw new DataPlanetRequestError('Dataset search returned an unexpected payload', 200, '/api/galaxy/dataset');
    }

    const datasets = hits.data.map((hit) => ({
      id: hit.id,
      name: hit.name,
      description: hit.description ?? '',
      sourceURL: stripAdminSuffix(hit.sourceURL),
    }));
    logger.info('planet:search', { keyword, found: datasets.length });
    return datasets;
  }

  async getDatasetMetadata(datasetId: string, sourceURL: string): Promise<DatasetMetadata | null> {
    let catalog: z.infer<typeof catalogSchema>;
    try {
      const payload = await this.request({ method: 'GET', url: `${sourceURL}/api/dataset/${datasetId}` });
      const parsed = catalogSchema.safeParse(payload);
      if (!parsed.success) {
        logger.error('planet:metadata_invalid', { datasetId });
        return null;
      }
      catalog = parsed.data;
    } catch (err) {
      logger.error('planet:metadata_failed', { datasetId, error: errorMessage(err) });
      return null;
    }

    const columns: Record<string, ColumnMeta> = {};
    for (const column of catalog.columns) {
      const meta = toColumnMeta(column, false);
      if (meta) columns[meta.columnID] = meta;
    }

    try {
      const payload = await this.request({
        method: 'GET',
        url: `${sourceURL}/api/dataset/${datasetId}/virtual-variables`,
      });
      const virtuals = z.array(columnSchema).safeParse(payload);
      if (virtuals.success) {
        for (const variable of virtuals.data) {
          const meta = toColumnMeta(variable, true);
          if (meta) columns[meta.columnID] = meta;
        }
      }
    } catch (err) {
      logger.warn('planet:virtual_variables_failed', { datasetId, error: errorMessage(err) });
    }

    return { columns };
  }

  async getFilterOptions(datasetId: string, sourceURL: string, filters: FilterField[]): Promise<void> {
    for (const filter of filters) {
      try {
        const payload = await this.request({
          method: 'POST',
          url: `${sourceURL}/api/exploration/${datasetId}/filter-options`,
          params: { start: 0, pageSize: 1000 },
          data: { x: [filter] },
        });
        const rows = z.array(explorationRowSchema).parse(payload);
        filter.values = rows.flatMap((row) => {
          const cell = row.x[0]?.[0];
          return cell === undefined || cell === null ? [] : [String(cell)];
        });
      } catch (err) {
        logger.error('planet:filter_options_failed', { datasetId, columnID: filter.columnID, error: errorMessage(err) });
        filter.values = [];
      }
    }
  }

  async executeExploration(query: ExplorationQuery, page: ExplorationPage): Promise<ExplorationRow[]> {
    const url = `${query.sourceURL}/api/exploration/${query.id}`;
    const payload = await this.request({
      method: 'POST',
      url,
      params: { start: page.start, pageSize: page.pageSize },
      data: query,
    });
    const rows = z.array(explorationRowSchema).safeParse(payload);
    if (!rows.success) {
      throw new DataPlanetRequestError('Exploration returned an unexpected payload', 200, url);
    }
    logger.debug('planet:exploration', { datasetId: query.id, rows: rows.data.length, start: page.start });
    return rows.data;
  }
}
