/**
 * Deprivation Module - Domain Errors
 */

import type { SourceTableName } from './types.js';

/**
 * Error when a source table cannot be read, parsed or validated.
 */
export interface SourceTableError {
  readonly type: 'SOURCE_TABLE_ERROR';
  readonly table: SourceTableName;
  readonly reason:
    | 'NotFound'
    | 'ReadError'
    | 'ParseError'
    | 'SchemaValidationError'
    | 'MissingColumn'
    | 'SheetNotFound';
  readonly message: string;
  readonly details?: string[];
}

/**
 * Error when a table the roll-up cannot do without has no rows.
 */
export interface EmptySourceTableError {
  readonly type: 'EMPTY_SOURCE_TABLE';
  readonly table: SourceTableName;
  readonly message: string;
}

/**
 * Error when an area code is scored more than once.
 */
export interface DuplicateAreaScoreError {
  readonly type: 'DUPLICATE_AREA_SCORE';
  readonly areaCode: string;
  readonly message: string;
}

/**
 * Error when a score value is not a finite decimal.
 */
export interface InvalidScoreError {
  readonly type: 'INVALID_SCORE';
  readonly areaCode: string;
  readonly value: string;
  readonly message: string;
}

/**
 * Error when the result tables cannot be written.
 */
export interface WriteError {
  readonly type: 'WRITE_ERROR';
  readonly path: string;
  readonly message: string;
}

export type DeprivationError =
  | SourceTableError
  | EmptySourceTableError
  | DuplicateAreaScoreError
  | InvalidScoreError
  | WriteError;

export const createSourceTableError = (
  table: SourceTableName,
  reason: SourceTableError['reason'],
  message: string,
  details?: string[]
): SourceTableError => ({
  type: 'SOURCE_TABLE_ERROR',
  table,
  reason,
  message,
  ...(details !== undefined && { details }),
});

export const createEmptySourceTableError = (table: SourceTableName): EmptySourceTableError => ({
  type: 'EMPTY_SOURCE_TABLE',
  table,
  message: `Source table '${table}' has no rows`,
});

export const createDuplicateAreaScoreError = (areaCode: string): DuplicateAreaScoreError => ({
  type: 'DUPLICATE_AREA_SCORE',
  areaCode,
  message: `Area '${areaCode}' has more than one score`,
});

export const createInvalidScoreError = (areaCode: string, value: string): InvalidScoreError => ({
  type: 'INVALID_SCORE',
  areaCode,
  value,
  message: `Score '${value}' for area '${areaCode}' is not a valid number`,
});

export const createWriteError = (path: string, message: string): WriteError => ({
  type: 'WRITE_ERROR',
  path,
  message,
});

/**
 * Renders an error as a single log line.
 */
export const describeDeprivationError = (error: DeprivationError): string => {
  switch (error.type) {
    case 'SOURCE_TABLE_ERROR': {
      const head = `[${error.table}] ${error.reason}: ${error.message}`;
      return error.details !== undefined && error.details.length > 0
        ? `${head}\n  - ${error.details.join('\n  - ')}`
        : head;
    }
    case 'EMPTY_SOURCE_TABLE':
    case 'DUPLICATE_AREA_SCORE':
    case 'INVALID_SCORE':
      return error.message;
    case 'WRITE_ERROR':
      return `${error.path}: ${error.message}`;
  }
};
