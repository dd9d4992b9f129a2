// node/src/services/exploration-table.ts — exploration rows → labelled table, records and CSV
import { csvFormatRows } from 'd3-dsv';
import type { ExplorationRow, TableCell, TableRecord } from '@/types/core';

export interface ExplorationTable {
  columns: string[];
  rows: TableCell[][];
}

/** Use `labels` when they line up with the data width, otherwise `prefix1..N`. */
function labelColumns(labels: string[], width: number, prefix: string): string[] {
  if (labels.length === width) return [...labels];
  return Array.from({ length: width }, (_, i) => `${prefix}${i + 1}`);
}

/** A repeated name gets `_2`, `_3`, ... so every column keeps its own record key. */
function uniqueColumnNames(names: string[]): string[] {
  const taken = new Set<string>();
  return names.map((name) => {
    let candidate = name;
    for (let n = 2; taken.has(candidate); n++) candidate = `${name}_${n}`;
    taken.add(candidate);
    return candidate;
  });
}

/**
 * Flatten `{ x: [[v], ...], values: [...] }` rows into one column per x dimension
 * followed by one column per value. Widths come from the first row.
 */
export function flattenExplorationRows(
  rows: ExplorationRow[],
  xLabels: string[],
  valueLabels: string[],
): ExplorationTable {
  const first = rows[0];
  if (!first) return { columns: [], rows: [] };

  const xWidth = first.x.length;
  const valueWidth = first.values.length;
  const columns = uniqueColumnNames([
    ...labelColumns(xLabels, xWidth, 'x'),
    ...labelColumns(valueLabels, valueWidth, 'value'),
  ]);

  const table = rows.map((row) => {
    const cells: TableCell[] = [];
    for (let i = 0; i < xWidth; i++) cells.push(row.x[i]?.[0] ?? null);
    for (let i = 0; i < valueWidth; i++) cells.push(row.values[i] ?? null);
    return cells;
  });

  return { columns, rows: table };
}

export function toRecords(table: ExplorationTable, limit = Infinity): TableRecord[] {
  return table.rows.slice(0, limit).map((cells) => {
    const record: TableRecord = {};
    table.columns.forEach((column, i) => {
      record[column] = cells[i] ?? null;
    });
    return record;
  });
}

export function toCsv(table: ExplorationTable): string {
  const rows = table.rows.map((cells) => cells.map((cell) => (cell === null ? '' : String(cell))));
  return csvFormatRows([table.columns, ...rows]);
}
