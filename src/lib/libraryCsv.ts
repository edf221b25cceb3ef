import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { ExportRecord } from './types';

const COLUMNS: Array<{ key: keyof ExportRecord; header: string }> = [
  { key: 'authors', header: 'authors' },
  { key: 'title', header: 'title' },
  { key: 'narrators', header: 'narrators' },
  { key: 'runtimeMinutes', header: 'runtime_mmm' },
  { key: 'runtimeFormatted', header: 'runtime_hm' },
  { key: 'released', header: 'released' },
  { key: 'purchased', header: 'purchased' }
];

export const LIBRARY_CSV_HEADER = COLUMNS.map((column) => column.header);

export function formatLibraryCsv(records: ExportRecord[]): string {
  return stringify(records, {
    header: true,
    columns: COLUMNS,
    record_delimiter: 'unix'
  });
}

export async function writeLibraryCsv(filePath: string, records: ExportRecord[]): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, formatLibraryCsv(records), 'utf8');
}
