import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { formatLibraryCsv, LIBRARY_CSV_HEADER, SAMPLE_LIBRARY, silentLogger, toExportRecords, writeLibraryCsv } from '@shared';

const records = toExportRecords(SAMPLE_LIBRARY, silentLogger);

describe('formatLibraryCsv', () => {
  it('writes the fixed header followed by one row per record', () => {
    const csv = formatLibraryCsv(records);

    expect(csv.trimEnd().split('\n')).toEqual([
      'authors,title,narrators,runtime_mmm,runtime_hm,released,purchased',
      'J. R. R. Tolkien,The Fellowship of the Ring,Andy Serkis,1343,22:23,2021-09-23,2025-08-15T10:12:00.000Z',
      'Terry Pratchett;Neil Gaiman,Good Omens,Martin Jarvis,758,12:38,2006-09-26,2025-09-01T08:00:00.000Z',
      'Anonymous,"Short Story, Abridged",,45,0:45,Unknown Release Date,Unknown Purchase Date'
    ]);
  });

  it('writes only the header for an empty library', () => {
    expect(formatLibraryCsv([]).trimEnd()).toBe(LIBRARY_CSV_HEADER.join(','));
  });
});

describe('writeLibraryCsv', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), 'library-csv-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('creates missing parent directories and writes parseable UTF-8 CSV', async () => {
    const outputFile = path.join(workDir, 'nested', 'data', 'library.csv');
    await writeLibraryCsv(outputFile, records);

    const contents = await readFile(outputFile, 'utf8');
    const rows = parse(contents, { columns: true }) as Array<Record<string, string>>;

    expect(rows).toHaveLength(3);
    expect(Object.keys(rows[0])).toEqual(LIBRARY_CSV_HEADER);
    expect(rows[2]).toEqual({
      authors: 'Anonymous',
      title: 'Short Story, Abridged',
      narrators: '',
      runtime_mmm: '45',
      runtime_hm: '0:45',
      released: 'Unknown Release Date',
      purchased: 'Unknown Purchase Date'
    });
  });
});
