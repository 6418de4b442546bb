/**
 * Source tables read from the files published by the data providers.
 *
 * Columns are picked by 1-based position, the way the files are documented
 * upstream. Practices, networks and memberships are filtered to active rows
 * here so the core only ever sees current data.
 */

import path from 'node:path';

import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { readCsvTable, readWorksheetTable, type TableRow } from './tabular-files.js';
import { createSourceTableError, type SourceTableError } from '../../core/errors.js';
import {
  AreaScoreRowSchema,
  DirectoryEntrySchema,
  MembershipRowSchema,
  RegistrantPopulationRowSchema,
  type SourceTableName,
} from '../../core/types.js';

import type { SourceTablesRepository } from '../../core/ports.js';
import type { Static, TSchema } from '@sinclair/typebox';
import type { ValueError } from '@sinclair/typebox/errors';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Source layouts
// ─────────────────────────────────────────────────────────────────────────────

const AREA_SCORE_COLUMNS = { areaCode: 1, score: 5, population: 53 } as const;

const PRACTICE_POPULATION_COLUMNS = { practiceCode: 3, areaCode: 5, population: 7 } as const;

const PRACTICE_DIRECTORY_COLUMNS = {
  code: 1,
  name: 2,
  postcode: 10,
  status: 13,
  subIcbCode: 15,
  prescribingSetting: 26,
} as const;

const PCN_DETAILS_COLUMNS = { code: 1, name: 2, subIcbCode: 3, closeDate: 6, postcode: 12 } as const;

const PCN_MEMBER_COLUMNS = { practiceCode: 1, pcnCode: 5, departDate: 10 } as const;

export const PCN_DETAILS_SHEET = 'PCNDetails';
export const PCN_MEMBERS_SHEET = 'PCN Core Partner Details';

/** Practice status code for an active practice. */
const ACTIVE_STATUS = 'A';
/** Prescribing setting code for a GP practice. */
const GP_PRACTICE_SETTING = '4';

const MAX_REPORTED_ROW_ERRORS = 10;

const maxColumn = (columns: Record<string, number>): number =>
  Math.max(...Object.values(columns));

// ─────────────────────────────────────────────────────────────────────────────
// Row conversion
// ─────────────────────────────────────────────────────────────────────────────

type CellReader = (position: number) => string;

interface TableSpec<T extends TSchema> {
  table: SourceTableName;
  validator: TypeCheck<T>;
  /** Rows for which this returns false are skipped before validation. */
  keep?: (cell: CellReader) => boolean;
  toRecord: (cell: CellReader) => unknown;
}

const toNumber = (text: string): number => (text === '' ? Number.NaN : Number(text));

const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

const convertRows = <T extends TSchema>(
  spec: TableSpec<T>,
  rows: readonly TableRow[]
): Result<Static<T>[], SourceTableError> => {
  const records: Static<T>[] = [];
  const details: string[] = [];
  let invalidRows = 0;

  for (const row of rows) {
    const cell: CellReader = (position) => row.cells[position - 1] ?? '';

    if (spec.keep !== undefined && !spec.keep(cell)) {
      continue;
    }

    const candidate = spec.toRecord(cell);
    if (spec.validator.Check(candidate)) {
      records.push(candidate);
      continue;
    }

    invalidRows++;
    if (details.length < MAX_REPORTED_ROW_ERRORS) {
      const rowErrors = formatSchemaErrors(spec.validator.Errors(candidate));
      details.push(`row ${String(row.rowNumber)}: ${rowErrors.join('; ')}`);
    }
  }

  if (invalidRows > 0) {
    return err(
      createSourceTableError(
        spec.table,
        'SchemaValidationError',
        `${String(invalidRows)} invalid row(s)`,
        details
      )
    );
  }

  return ok(records);
};

const areaScoreSpec: TableSpec<typeof AreaScoreRowSchema> = {
  table: 'area_scores',
  validator: TypeCompiler.Compile(AreaScoreRowSchema),
  toRecord: (cell) => {
    const population = cell(AREA_SCORE_COLUMNS.population);
    return {
      areaCode: cell(AREA_SCORE_COLUMNS.areaCode),
      score: cell(AREA_SCORE_COLUMNS.score),
      population: population === '' ? null : toNumber(population),
    };
  },
};

const practicePopulationSpec: TableSpec<typeof RegistrantPopulationRowSchema> = {
  table: 'registrant_populations',
  validator: TypeCompiler.Compile(RegistrantPopulationRowSchema),
  toRecord: (cell) => ({
    registrantCode: cell(PRACTICE_POPULATION_COLUMNS.practiceCode),
    areaCode: cell(PRACTICE_POPULATION_COLUMNS.areaCode),
    population: toNumber(cell(PRACTICE_POPULATION_COLUMNS.population)),
  }),
};

const directoryValidator = TypeCompiler.Compile(DirectoryEntrySchema);

const practiceDirectorySpec: TableSpec<typeof DirectoryEntrySchema> = {
  table: 'registrant_directory',
  validator: directoryValidator,
  keep: (cell) =>
    cell(PRACTICE_DIRECTORY_COLUMNS.status) === ACTIVE_STATUS &&
    cell(PRACTICE_DIRECTORY_COLUMNS.prescribingSetting) === GP_PRACTICE_SETTING,
  toRecord: (cell) => ({
    code: cell(PRACTICE_DIRECTORY_COLUMNS.code),
    name: cell(PRACTICE_DIRECTORY_COLUMNS.name),
    locationCode: cell(PRACTICE_DIRECTORY_COLUMNS.postcode),
    parentCode: cell(PRACTICE_DIRECTORY_COLUMNS.subIcbCode),
  }),
};

const networkDirectorySpec: TableSpec<typeof DirectoryEntrySchema> = {
  table: 'group_directory',
  validator: directoryValidator,
  keep: (cell) => cell(PCN_DETAILS_COLUMNS.closeDate) === '',
  toRecord: (cell) => ({
    code: cell(PCN_DETAILS_COLUMNS.code),
    name: cell(PCN_DETAILS_COLUMNS.name),
    locationCode: cell(PCN_DETAILS_COLUMNS.postcode),
    parentCode: cell(PCN_DETAILS_COLUMNS.subIcbCode),
  }),
};

const membershipSpec: TableSpec<typeof MembershipRowSchema> = {
  table: 'memberships',
  validator: TypeCompiler.Compile(MembershipRowSchema),
  keep: (cell) => cell(PCN_MEMBER_COLUMNS.departDate) === '',
  toRecord: (cell) => ({
    registrantCode: cell(PCN_MEMBER_COLUMNS.practiceCode),
    groupCode: cell(PCN_MEMBER_COLUMNS.pcnCode),
  }),
};

// ─────────────────────────────────────────────────────────────────────────────
// Repository
// ─────────────────────────────────────────────────────────────────────────────

export interface SourceFilesRepoOptions {
  dataDir: string;
  imdScoresFile: string;
  practicePopulationFile: string;
  practiceDirectoryFile: string;
  pcnWorkbookFile: string;
  logger: Logger;
}

export const makeSourceFilesRepo = (options: SourceFilesRepoOptions): SourceTablesRepository => {
  const log = options.logger.child({ repo: 'sourceFiles' });
  const resolve = (file: string): string => path.resolve(options.dataDir, file);

  const loadCsv = async <T extends TSchema>(
    spec: TableSpec<T>,
    file: string,
    csvOptions: { hasHeader: boolean; requiredColumns: number }
  ): Promise<Result<Static<T>[], SourceTableError>> => {
    const filePath = resolve(file);
    log.debug({ table: spec.table, filePath }, 'Reading CSV source table');

    const rows = await readCsvTable(spec.table, filePath, csvOptions);
    if (rows.isErr()) {
      return err(rows.error);
    }
    return convertRows(spec, rows.value);
  };

  const loadSheet = async <T extends TSchema>(
    spec: TableSpec<T>,
    sheetName: string
  ): Promise<Result<Static<T>[], SourceTableError>> => {
    const filePath = resolve(options.pcnWorkbookFile);
    log.debug({ table: spec.table, filePath, sheetName }, 'Reading worksheet source table');

    const rows = await readWorksheetTable(spec.table, filePath, { sheetName, hasHeader: true });
    if (rows.isErr()) {
      return err(rows.error);
    }
    return convertRows(spec, rows.value);
  };

  return {
    loadAreaScores: () =>
      loadCsv(areaScoreSpec, options.imdScoresFile, {
        hasHeader: true,
        requiredColumns: maxColumn(AREA_SCORE_COLUMNS),
      }),

    loadRegistrantPopulations: () =>
      loadCsv(practicePopulationSpec, options.practicePopulationFile, {
        hasHeader: true,
        requiredColumns: maxColumn(PRACTICE_POPULATION_COLUMNS),
      }),

    loadRegistrantDirectory: () =>
      loadCsv(practiceDirectorySpec, options.practiceDirectoryFile, {
        hasHeader: false,
        requiredColumns: maxColumn(PRACTICE_DIRECTORY_COLUMNS),
      }),

    loadGroupDirectory: () => loadSheet(networkDirectorySpec, PCN_DETAILS_SHEET),

    loadMemberships: () => loadSheet(membershipSpec, PCN_MEMBERS_SHEET),
  };
};
