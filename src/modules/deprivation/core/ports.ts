/**
 * Deprivation Module - Ports (Interfaces)
 *
 * Shell layer provides implementations.
 */

import type { SourceTableError, WriteError } from './errors.js';
import type {
  AreaScoreRowDTO,
  DirectoryEntry,
  MembershipRow,
  OutputRow,
  RegistrantPopulationRow,
} from './types.js';
import type { Result } from 'neverthrow';

/**
 * Supplies the normalized source tables.
 *
 * Implementations return only active rows: practices that are open and of a
 * defined prescribing setting, networks without a close date, and memberships
 * without a departure date.
 */
export interface SourceTablesRepository {
  loadAreaScores(): Promise<Result<AreaScoreRowDTO[], SourceTableError>>;
  loadRegistrantPopulations(): Promise<Result<RegistrantPopulationRow[], SourceTableError>>;
  loadRegistrantDirectory(): Promise<Result<DirectoryEntry[], SourceTableError>>;
  loadGroupDirectory(): Promise<Result<DirectoryEntry[], SourceTableError>>;
  loadMemberships(): Promise<Result<MembershipRow[], SourceTableError>>;
}

/**
 * Consumes the two result tables.
 */
export interface RollupResultWriter {
  writePracticeScores(rows: OutputRow[]): Promise<Result<string, WriteError>>;
  writeNetworkScores(rows: OutputRow[]): Promise<Result<string, WriteError>>;
}
