/**
 * End-to-end roll-up over source files written to a temp directory.
 */

import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import ExcelJS from 'exceljs';
import { describe, expect, it } from 'vitest';

import {
  makeCsvResultWriter,
  makeSourceFilesRepo,
  PCN_DETAILS_SHEET,
  PCN_MEMBERS_SHEET,
  publishRollupResult,
  runDeprivationRollup,
} from '@/modules/deprivation/index.js';
import { silentLogger } from '../fixtures/builders.js';

const FILES = {
  imdScoresFile: 'imd.csv',
  practicePopulationFile: 'practice-lsoa.csv',
  practiceDirectoryFile: 'epraccur.csv',
  pcnWorkbookFile: 'ePCN.xlsx',
} as const;

/**
 * Builds a row of `width` cells with values at the given 1-based positions.
 */
const sparseRow = (width: number, values: Record<number, string>): string[] =>
  Array.from({ length: width }, (_, index) => values[index + 1] ?? '');

const toCsv = (rows: string[][]): string =>
  rows
    .map((row) => row.map((cell) => (cell.includes(',') ? `"${cell}"` : cell)).join(','))
    .join('\n') + '\n';

const imdCsv = (): string =>
  toCsv([
    sparseRow(53, { 1: 'LSOA code (2011)', 5: 'IMD Score', 53: 'Total population' }),
    sparseRow(53, { 1: 'E01000001', 5: '10.000', 53: '1500' }),
    sparseRow(53, { 1: 'E01000002', 5: '40.000', 53: '1600' }),
  ]);

const practicePopulationCsv = (): string =>
  toCsv([
    ['PUBLICATION', 'EXTRACT_DATE', 'PRACTICE_CODE', 'POSTCODE', 'LSOA_CODE', 'SEX', 'NUMBER_OF_PATIENTS'],
    ['GP_PRAC_PAT_LIST', '01APR2024', 'P1', 'AA1 1AA', 'E01000001', 'ALL', '100'],
    ['GP_PRAC_PAT_LIST', '01APR2024', 'P1', 'AA1 1AA', 'E01000002', 'ALL', '100'],
    ['GP_PRAC_PAT_LIST', '01APR2024', 'P2', 'BB2 2BB', 'E01000001', 'ALL', '300'],
    ['GP_PRAC_PAT_LIST', '01APR2024', 'P2', 'BB2 2BB', 'NO2011', 'ALL', '20'],
    ['GP_PRAC_PAT_LIST', '01APR2024', 'P3', 'CC3 3CC', 'E01000002', 'ALL', '50'],
  ]);

const practice = (code: string, name: string, postcode: string, status: string, setting: string) =>
  sparseRow(27, { 1: code, 2: name, 10: postcode, 13: status, 15: '00A', 26: setting });

const practiceDirectoryCsv = (): string =>
  toCsv([
    practice('P1', 'Alpha Surgery', 'AA1 1AA', 'A', '4'),
    practice('P2', 'Beta Practice', 'BB2 2BB', 'A', '4'),
    practice('P3', 'Closed Practice', 'CC3 3CC', 'C', '4'),
    practice('P4', 'Walk-in Centre', 'DD4 4DD', 'A', '1'),
  ]);

const writePcnWorkbook = async (filePath: string): Promise<void> => {
  const workbook = new ExcelJS.Workbook();

  const details = workbook.addWorksheet(PCN_DETAILS_SHEET);
  details.addRow(
    sparseRow(12, { 1: 'PCN Code', 2: 'PCN Name', 3: 'Sub ICB Code', 6: 'Close Date', 12: 'Postcode' })
  );
  details.addRow(sparseRow(12, { 1: 'G1', 2: 'North Network', 3: '00A', 12: 'NN1 1NN' }));
  details.addRow(
    sparseRow(12, { 1: 'G2', 2: 'Old Network', 3: '00A', 6: '2022-03-31', 12: 'OO1 1OO' })
  );

  const members = workbook.addWorksheet(PCN_MEMBERS_SHEET);
  members.addRow(sparseRow(10, { 1: 'Partner Code', 5: 'PCN Code', 10: 'Departure Date' }));
  members.addRow(sparseRow(10, { 1: 'P1', 5: 'G1' }));
  members.addRow(sparseRow(10, { 1: 'P2', 5: 'G1' }));
  members.addRow(sparseRow(10, { 1: 'P3', 5: 'G2', 10: '2023-01-01' }));

  await workbook.xlsx.writeFile(filePath);
};

const writeSourceFiles = async (): Promise<string> => {
  const dataDir = await mkdtemp(path.join(tmpdir(), 'imd-sources-'));
  await writeFile(path.join(dataDir, FILES.imdScoresFile), imdCsv(), 'utf8');
  await writeFile(path.join(dataDir, FILES.practicePopulationFile), practicePopulationCsv(), 'utf8');
  await writeFile(path.join(dataDir, FILES.practiceDirectoryFile), practiceDirectoryCsv(), 'utf8');
  await writePcnWorkbook(path.join(dataDir, FILES.pcnWorkbookFile));
  return dataDir;
};

const makeRepo = (
  dataDir: string,
  overrides: Partial<Record<keyof typeof FILES, string>> = {}
) =>
  makeSourceFilesRepo({ dataDir, ...FILES, ...overrides, logger: silentLogger() });

describe('source files repository', () => {
  it('loads area scores by column position', async () => {
    const repo = makeRepo(await writeSourceFiles());

    const result = await repo.loadAreaScores();

    expect(result._unsafeUnwrap()).toEqual([
      { areaCode: 'E01000001', score: '10.000', population: 1500 },
      { areaCode: 'E01000002', score: '40.000', population: 1600 },
    ]);
  });

  it('keeps only active GP practices', async () => {
    const repo = makeRepo(await writeSourceFiles());

    const result = await repo.loadRegistrantDirectory();

    expect(result._unsafeUnwrap()).toEqual([
      { code: 'P1', name: 'Alpha Surgery', locationCode: 'AA1 1AA', parentCode: '00A' },
      { code: 'P2', name: 'Beta Practice', locationCode: 'BB2 2BB', parentCode: '00A' },
    ]);
  });

  it('keeps only open networks and current memberships', async () => {
    const repo = makeRepo(await writeSourceFiles());

    const networks = await repo.loadGroupDirectory();
    const memberships = await repo.loadMemberships();

    expect(networks._unsafeUnwrap()).toEqual([
      { code: 'G1', name: 'North Network', locationCode: 'NN1 1NN', parentCode: '00A' },
    ]);
    expect(memberships._unsafeUnwrap()).toEqual([
      { registrantCode: 'P1', groupCode: 'G1' },
      { registrantCode: 'P2', groupCode: 'G1' },
    ]);
  });

  it('reports a missing file with its table name', async () => {
    const repo = makeRepo(await writeSourceFiles(), { imdScoresFile: 'missing.csv' });

    const result = await repo.loadAreaScores();

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'SOURCE_TABLE_ERROR',
      table: 'area_scores',
      reason: 'NotFound',
    });
  });

  it('reports a missing worksheet', async () => {
    const dataDir = await writeSourceFiles();
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet('Something Else').addRow(['x']);
    await workbook.xlsx.writeFile(path.join(dataDir, 'other.xlsx'));

    const repo = makeRepo(dataDir, { pcnWorkbookFile: 'other.xlsx' });
    const result = await repo.loadMemberships();

    expect(result._unsafeUnwrapErr()).toMatchObject({
      table: 'memberships',
      reason: 'SheetNotFound',
    });
  });

  it('reports a file with too few columns', async () => {
    const dataDir = await writeSourceFiles();
    await writeFile(path.join(dataDir, 'short.csv'), 'a,b,c\nE01,1,2\n', 'utf8');

    const repo = makeRepo(dataDir, { imdScoresFile: 'short.csv' });
    const result = await repo.loadAreaScores();

    expect(result._unsafeUnwrapErr()).toMatchObject({
      table: 'area_scores',
      reason: 'MissingColumn',
    });
  });

  it('reports rows that fail validation with their row number', async () => {
    const dataDir = await writeSourceFiles();
    await writeFile(
      path.join(dataDir, 'bad-population.csv'),
      toCsv([
        ['H1', 'H2', 'PRACTICE_CODE', 'H4', 'LSOA_CODE', 'H6', 'NUMBER_OF_PATIENTS'],
        ['x', 'x', 'P1', 'x', 'E01000001', 'x', 'many'],
      ]),
      'utf8'
    );

    const repo = makeRepo(dataDir, { practicePopulationFile: 'bad-population.csv' });
    const result = await repo.loadRegistrantPopulations();

    const error = result._unsafeUnwrapErr();
    expect(error).toMatchObject({
      table: 'registrant_populations',
      reason: 'SchemaValidationError',
      message: '1 invalid row(s)',
    });
    expect(error.details?.[0]?.startsWith('row 2: /population')).toBe(true);
  });
});

describe('deprivation roll-up from files', () => {
  const runOnce = async (dataDir: string, outputDir: string) => {
    const logger = silentLogger();
    const rollup = await runDeprivationRollup({ repo: makeRepo(dataDir), logger });
    const writer = makeCsvResultWriter({ outputDir });
    return publishRollupResult({ writer, logger }, rollup._unsafeUnwrap());
  };

  it('writes practice and network tables', async () => {
    const dataDir = await writeSourceFiles();
    const outputDir = path.join(dataDir, 'outputs');

    const published = (await runOnce(dataDir, outputDir))._unsafeUnwrap();

    const practiceCsv = await readFile(published.practicePath, 'utf8');
    const networkCsv = await readFile(published.networkPath, 'utf8');

    expect(practiceCsv.trimEnd().split('\n')).toEqual([
      'practice_code,practice_name,postcode,subicb_code,imd_score,imd_decile',
      'P1,Alpha Surgery,AA1 1AA,00A,25,2',
      'P2,Beta Practice,BB2 2BB,00A,10,3',
      'P3,Unknown,Unknown,UNK,40,1',
    ]);
    expect(networkCsv.trimEnd().split('\n')).toEqual([
      'pcn_code,pcn_name,postcode,subicb_code,imd_score,imd_decile',
      'G1,North Network,NN1 1NN,00A,16,2',
      'U,Unknown,Unknown,UNK,40,1',
    ]);
  });

  it('writes byte-identical files on a second run', async () => {
    const dataDir = await writeSourceFiles();

    const first = (await runOnce(dataDir, path.join(dataDir, 'run-1')))._unsafeUnwrap();
    const second = (await runOnce(dataDir, path.join(dataDir, 'run-2')))._unsafeUnwrap();

    expect(await readFile(second.practicePath)).toEqual(await readFile(first.practicePath));
    expect(await readFile(second.networkPath)).toEqual(await readFile(first.networkPath));
  });
});
