import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  formatOutputCsv,
  makeCsvResultWriter,
  NETWORK_COLUMNS,
  PRACTICE_COLUMNS,
} from '@/modules/deprivation/index.js';

import type { OutputRow } from '@/modules/deprivation/index.js';

const makeTempDir = async (): Promise<string> => mkdtemp(path.join(tmpdir(), 'imd-output-'));

const rows: OutputRow[] = [
  { code: 'P1', name: 'Alpha Surgery', locationCode: 'AA1 1AA', parentCode: '00A', score: 25, decile: 2 },
  {
    code: 'P3',
    name: 'Smith, Jones & Partners',
    locationCode: 'Unknown',
    parentCode: 'UNK',
    score: 7.5,
    decile: 1,
  },
];

describe('formatOutputCsv', () => {
  it('writes a header and one line per entity', () => {
    const csv = formatOutputCsv(rows, PRACTICE_COLUMNS);

    expect(csv.trimEnd().split('\n')).toEqual([
      'practice_code,practice_name,postcode,subicb_code,imd_score,imd_decile',
      'P1,Alpha Surgery,AA1 1AA,00A,25,2',
      'P3,"Smith, Jones & Partners",Unknown,UNK,7.5,1',
    ]);
  });

  it('uses network column names', () => {
    const csv = formatOutputCsv([], NETWORK_COLUMNS);

    expect(csv.trimEnd()).toBe('pcn_code,pcn_name,postcode,subicb_code,imd_score,imd_decile');
  });
});

describe('makeCsvResultWriter', () => {
  it('creates the output directory and writes both files', async () => {
    const outputDir = path.join(await makeTempDir(), 'nested', 'outputs');
    const writer = makeCsvResultWriter({ outputDir });

    const practicePath = await writer.writePracticeScores(rows);
    const networkPath = await writer.writeNetworkScores([]);

    expect(practicePath._unsafeUnwrap()).toBe(path.join(outputDir, 'practice_imd.csv'));
    expect(networkPath._unsafeUnwrap()).toBe(path.join(outputDir, 'pcn_imd.csv'));
    expect(await readFile(path.join(outputDir, 'practice_imd.csv'), 'utf8')).toBe(
      formatOutputCsv(rows, PRACTICE_COLUMNS)
    );
  });

  it('returns a write error when the directory cannot be created', async () => {
    const dir = await makeTempDir();
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf8');

    const writer = makeCsvResultWriter({ outputDir: blocker });
    const result = await writer.writePracticeScores(rows);

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'WRITE_ERROR',
      path: path.join(blocker, 'practice_imd.csv'),
    });
  });
});
