// node/src/services/csv-export.ts
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { toCsv, type ExplorationTable } from './exploration-table';

export function csvFileName(chartName: string): string {
  return `${chartName.replace(/\//g, '_')}.csv`;
}

/** Writes `<dir>/<chartName>.csv` (UTF-8 with BOM) and returns the path. */
export async function exportTableCsv(dir: string, chartName: string, table: ExplorationTable): Promise<string> {
  await mkdir(dir, { recursive: true });
  const file = path.join(dir, csvFileName(chartName));
  // BOM so spreadsheet apps read non-ASCII headers as UTF-8
  await writeFile(file, `\uFEFF${toCsv(table)}`, 'utf8');
  return file;
}
