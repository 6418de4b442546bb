import fs from 'node:fs/promises';
import path from 'node:path';

import { stringify } from 'csv-stringify/sync';
import { err, ok, type Result } from 'neverthrow';

import { createWriteError, type WriteError } from '../../core/errors.js';

import type { RollupResultWriter } from '../../core/ports.js';
import type { OutputRow } from '../../core/types.js';

export const PRACTICE_OUTPUT_FILE = 'practice_imd.csv';
export const NETWORK_OUTPUT_FILE = 'pcn_imd.csv';

/**
 * Output header for one level. Column order is fixed:
 * code, name, location, parent, score, decile.
 */
interface OutputColumns {
  code: string;
  name: string;
  locationCode: string;
  parentCode: string;
  score: string;
  decile: string;
}

export const PRACTICE_COLUMNS: OutputColumns = {
  code: 'practice_code',
  name: 'practice_name',
  locationCode: 'postcode',
  parentCode: 'subicb_code',
  score: 'imd_score',
  decile: 'imd_decile',
};

export const NETWORK_COLUMNS: OutputColumns = {
  code: 'pcn_code',
  name: 'pcn_name',
  locationCode: 'postcode',
  parentCode: 'subicb_code',
  score: 'imd_score',
  decile: 'imd_decile',
};

/**
 * Renders rows as CSV with a header line and no index column.
 */
export const formatOutputCsv = (rows: readonly OutputRow[], columns: OutputColumns): string => {
  const header = [
    columns.code,
    columns.name,
    columns.locationCode,
    columns.parentCode,
    columns.score,
    columns.decile,
  ];
  const records = rows.map((row) => [
    row.code,
    row.name,
    row.locationCode,
    row.parentCode,
    String(row.score),
    String(row.decile),
  ]);

  return stringify([header, ...records]);
};

export interface CsvResultWriterOptions {
  outputDir: string;
}

export const makeCsvResultWriter = (options: CsvResultWriterOptions): RollupResultWriter => {
  const write = async (
    fileName: string,
    rows: readonly OutputRow[],
    columns: OutputColumns
  ): Promise<Result<string, WriteError>> => {
    const filePath = path.resolve(options.outputDir, fileName);

    try {
      await fs.mkdir(options.outputDir, { recursive: true });
      await fs.writeFile(filePath, formatOutputCsv(rows, columns), 'utf8');
    } catch (error) {
      return err(createWriteError(filePath, (error as Error).message));
    }

    return ok(filePath);
  };

  return {
    writePracticeScores: (rows) => write(PRACTICE_OUTPUT_FILE, rows, PRACTICE_COLUMNS),
    writeNetworkScores: (rows) => write(NETWORK_OUTPUT_FILE, rows, NETWORK_COLUMNS),
  };
};
