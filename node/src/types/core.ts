// src/types/core.ts
export const COLUMN_TYPES = [
  'date',
  'datetime',
  'space',
  'point',
  'line',
  'polygon',
  'nominal',
  'ordinal',
  'integer',
  'float',
  'undefined',
] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

export type TemporalColumnType = Extract<ColumnType, 'date' | 'datetime'>;
export type SpatialColumnType = Extract<ColumnType, 'space' | 'point' | 'line' | 'polygon'>;
export type NumericColumnType = Extract<ColumnType, 'integer' | 'float'>;

export const DATE_FORMATS = [
  'year',
  'quarter',
  'month',
  'week',
  'date',
  'day',
  'weekday',
  'year_month',
  'year_quarter',
  'year_week',
  'month_day',
  'day_hour',
  'hour',
  'minute',
  'second',
  'hour_minute',
  'time',
] as const;

export type DateFormat = (typeof DATE_FORMATS)[number];

export const ADMIN_LEVEL_FORMATS = [
  'admin_level_2',
  'admin_level_3',
  'admin_level_4',
  'admin_level_5',
  'admin_level_6',
  'admin_level_7',
  'admin_level_8',
  'admin_level_9',
  'admin_level_10',
] as const;

export type AdminLevelFormat = (typeof ADMIN_LEVEL_FORMATS)[number];

export const CALCULATIONS = ['count', 'sum', 'avg', 'min', 'max', 'distinct_count'] as const;
export type Calculation = (typeof CALCULATIONS)[number];

/** Nominal metrics can only be counted. */
export const NOMINAL_CALCULATIONS = ['count', 'distinct_count'] as const satisfies readonly Calculation[];

export const FILTER_OPERATORS = ['eq', 'lt', 'gt', 'lte', 'gte', 'in', 'range'] as const;
export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export const RANGE_OPERATORS = ['range', 'lt', 'gt', 'lte', 'gte'] as const satisfies readonly FilterOperator[];

export function isTemporalType(type: ColumnType): type is TemporalColumnType {
  return type === 'date' || type === 'datetime';
}

export function isSpatialType(type: ColumnType): type is SpatialColumnType {
  return type === 'space' || type === 'point' || type === 'line' || type === 'polygon';
}

export function isNumericType(type: ColumnType): type is NumericColumnType {
  return type === 'integer' || type === 'float';
}

/** Types whose filters select discrete members and must use the `in` operator. */
export function requiresInOperator(type: ColumnType): boolean {
  return type === 'date' || type === 'datetime' || type === 'nominal' || type === 'space';
}

/** Only these types keep a `format` once filters are decided. */
export function keepsFormatAfterFilterDecision(type: ColumnType): boolean {
  return type === 'date' || type === 'datetime' || type === 'space';
}

export function isColumnType(value: unknown): value is ColumnType {
  return typeof value === 'string' && (COLUMN_TYPES as readonly string[]).includes(value);
}

export function isDateFormat(value: string): value is DateFormat {
  return (DATE_FORMATS as readonly string[]).includes(value);
}

export function isAdminLevelFormat(value: string): value is AdminLevelFormat {
  return (ADMIN_LEVEL_FORMATS as readonly string[]).includes(value);
}

export function isCalculation(value: unknown): value is Calculation {
  return typeof value === 'string' && (CALCULATIONS as readonly string[]).includes(value);
}

export function isFilterOperator(value: unknown): value is FilterOperator {
  return typeof value === 'string' && (FILTER_OPERATORS as readonly string[]).includes(value);
}

/** Calculations a y-axis field of this type may use; empty means it cannot be a metric. */
export function allowedCalculations(type: ColumnType): readonly Calculation[] {
  if (isNumericType(type)) return CALCULATIONS;
  if (type === 'nominal') return NOMINAL_CALCULATIONS;
  return [];
}

export function isOperatorAllowed(type: ColumnType, operator: FilterOperator): boolean {
  if (requiresInOperator(type)) return operator === 'in';
  if (isNumericType(type)) return (RANGE_OPERATORS as readonly FilterOperator[]).includes(operator);
  return true;
}

export function defaultOperator(type: ColumnType): FilterOperator {
  return isNumericType(type) ? 'range' : 'in';
}

// ---------- Datasets ----------

export interface ColumnMeta {
  columnID: string;
  displayName: string;
  type: ColumnType;
  format?: string;
  /** Filter domain (distinct values), filled by the filter decision stage. */
  values?: string[];
  /** True for virtual-variable columns derived on the data planet side. */
  virtual?: boolean;
}

export interface DatasetSummary {
  id: string;
  name: string;
  description: string;
  sourceURL: string;
}

export interface DatasetRecord extends DatasetSummary {
  /** Absent until planning has fetched the column catalog. */
  columns?: Record<string, ColumnMeta>;
}

export interface DatasetMetadata {
  columns: Record<string, ColumnMeta>;
}

// ---------- Charts ----------

export interface AxisField {
  columnID: string;
  displayName: string;
  type: ColumnType;
  format?: string;
}

export interface MetricField extends AxisField {
  calculation: Calculation;
}

export interface FilterField extends AxisField {
  operator: FilterOperator;
  value: string[];
  values?: string[];
}

interface ChartBase {
  /** Dataset id the chart is drawn from. */
  id: string;
  name: string;
  sourceURL: string;
  x: AxisField[];
  y: MetricField[];
}

export interface ChartSpec extends ChartBase {
  filter: FilterField[];
}

/** Wire shape taken by the exploration endpoint: filters travel as one group. */
export interface ExplorationQuery extends ChartBase {
  filter: FilterField[][];
}

export type TableCell = string | number | boolean | null;
export type TableRecord = Record<string, TableCell>;

export interface ExecutedChart extends ExplorationQuery {
  /** First rows of the result table as records; null when the exploration failed. */
  json_data: TableRecord[] | null;
  rowCount: number;
  error?: string;
}

export interface ExplorationRow {
  x: TableCell[][];
  values: TableCell[];
}

export interface ExplorationPage {
  start: number;
  pageSize: number;
}
