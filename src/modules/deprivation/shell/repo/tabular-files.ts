import fs from 'node:fs/promises';

import { parse as parseCsv } from 'csv-parse/sync';
import ExcelJS from 'exceljs';
import { err, ok, type Result } from 'neverthrow';

import { createSourceTableError, type SourceTableError } from '../../core/errors.js';

import type { SourceTableName } from '../../core/types.js';

/**
 * A source row with its 1-based position in the file. `cells[0]` is column 1.
 */
export interface TableRow {
  rowNumber: number;
  cells: string[];
}

export interface CsvTableOptions {
  hasHeader: boolean;
  /** Highest 1-based column position the caller reads. */
  requiredColumns: number;
}

export interface WorksheetTableOptions {
  sheetName: string;
  hasHeader: boolean;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const ensureReadable = async (
  table: SourceTableName,
  filePath: string
): Promise<Result<void, SourceTableError>> => {
  try {
    await fs.access(filePath);
    return ok(undefined);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err(createSourceTableError(table, 'NotFound', `File not found at ${filePath}`));
    }
    return err(
      createSourceTableError(
        table,
        'ReadError',
        `Failed to access ${filePath}: ${errorMessage(error)}`
      )
    );
  }
};

/**
 * Reads a delimited file into rows of trimmed cells.
 * Every data row must reach `requiredColumns`.
 */
export const readCsvTable = async (
  table: SourceTableName,
  filePath: string,
  options: CsvTableOptions
): Promise<Result<TableRow[], SourceTableError>> => {
  const readable = await ensureReadable(table, filePath);
  if (readable.isErr()) {
    return err(readable.error);
  }

  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return err(
      createSourceTableError(
        table,
        'ReadError',
        `Failed to read ${filePath}: ${errorMessage(error)}`
      )
    );
  }

  let records: string[][];
  try {
    records = parseCsv(contents, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (error) {
    return err(
      createSourceTableError(
        table,
        'ParseError',
        `Failed to parse CSV at ${filePath}: ${errorMessage(error)}`
      )
    );
  }

  const rows = records.map((cells, index) => ({ rowNumber: index + 1, cells }));
  const header = options.hasHeader ? rows.shift() : undefined;

  if (header !== undefined && header.cells.length < options.requiredColumns) {
    return err(
      createSourceTableError(
        table,
        'MissingColumn',
        `Header of ${filePath} has ${String(header.cells.length)} columns, expected at least ${String(options.requiredColumns)}`
      )
    );
  }

  const short = rows.find((row) => row.cells.length < options.requiredColumns);
  if (short !== undefined) {
    return err(
      createSourceTableError(
        table,
        'MissingColumn',
        `Row ${String(short.rowNumber)} of ${filePath} has ${String(short.cells.length)} columns, expected at least ${String(options.requiredColumns)}`
      )
    );
  }

  return ok(rows);
};

/**
 * Reads one worksheet of an XLSX workbook into rows of trimmed cell text.
 * Empty rows are skipped. Trailing empty cells are not reported, so readers
 * should treat a missing cell as empty.
 */
export const readWorksheetTable = async (
  table: SourceTableName,
  filePath: string,
  options: WorksheetTableOptions
): Promise<Result<TableRow[], SourceTableError>> => {
  const readable = await ensureReadable(table, filePath);
  if (readable.isErr()) {
    return err(readable.error);
  }

  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    return err(
      createSourceTableError(
        table,
        'ParseError',
        `Failed to parse workbook at ${filePath}: ${errorMessage(error)}`
      )
    );
  }

  const worksheet = workbook.getWorksheet(options.sheetName);
  if (worksheet === undefined) {
    return err(
      createSourceTableError(
        table,
        'SheetNotFound',
        `Sheet '${options.sheetName}' not found in ${filePath}`
      )
    );
  }

  const rows: TableRow[] = [];
  worksheet.eachRow((row, rowNumber) => {
    const cells: string[] = [];
    for (let column = 1; column <= row.cellCount; column++) {
      cells.push(row.getCell(column).text.trim());
    }
    rows.push({ rowNumber, cells });
  });

  if (options.hasHeader) {
    rows.shift();
  }

  return ok(rows);
};
