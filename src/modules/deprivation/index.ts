/**
 * Deprivation Module Public API
 *
 * Rolls area-level deprivation scores up to GP practices and primary care
 * networks, weighting each area by registered population.
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  AreaScore,
  AreaScoreRowDTO,
  AreaPopulationRow,
  RegistrantPopulationRow,
  DirectoryEntry,
  MembershipRow,
  ScoreRecord,
  OutputRow,
  SourceTableName,
  SourceTables,
  MembershipDiagnostics,
  AggregationDiagnostics,
  EnrichmentDiagnostics,
  LevelDiagnostics,
  RollupDiagnostics,
  RollupResult,
} from './core/types.js';

export { ROLLUP_SETTINGS, type RollupSettings } from './core/settings.js';
export { compareCodes, quantileBuckets } from './core/ranking.js';

// ============================================================================
// Errors
// ============================================================================

export type {
  DeprivationError,
  SourceTableError,
  EmptySourceTableError,
  DuplicateAreaScoreError,
  InvalidScoreError,
  WriteError,
} from './core/errors.js';

export {
  createSourceTableError,
  createEmptySourceTableError,
  createDuplicateAreaScoreError,
  createInvalidScoreError,
  createWriteError,
  describeDeprivationError,
} from './core/errors.js';

// ============================================================================
// Ports
// ============================================================================

export type { SourceTablesRepository, RollupResultWriter } from './core/ports.js';

// ============================================================================
// Use Cases
// ============================================================================

export { parseAreaScores } from './core/usecases/parse-area-scores.js';
export {
  resolveGroupPopulations,
  type ResolveGroupPopulationsOutput,
} from './core/usecases/resolve-group-populations.js';
export {
  aggregateWeightedScores,
  type AggregateWeightedScoresOutput,
} from './core/usecases/aggregate-weighted-scores.js';
export {
  enrichScoreRecords,
  type EnrichScoreRecordsOutput,
} from './core/usecases/enrich-score-records.js';
export {
  runDeprivationRollup,
  type RunDeprivationRollupDeps,
  type RunDeprivationRollupInput,
} from './core/usecases/run-deprivation-rollup.js';
export {
  publishRollupResult,
  type PublishRollupResultDeps,
  type PublishedRollup,
} from './core/usecases/publish-rollup-result.js';

// ============================================================================
// Shell
// ============================================================================

export {
  makeSourceFilesRepo,
  PCN_DETAILS_SHEET,
  PCN_MEMBERS_SHEET,
  type SourceFilesRepoOptions,
} from './shell/repo/source-files-repo.js';
export {
  makeCsvResultWriter,
  formatOutputCsv,
  PRACTICE_OUTPUT_FILE,
  NETWORK_OUTPUT_FILE,
  PRACTICE_COLUMNS,
  NETWORK_COLUMNS,
  type CsvResultWriterOptions,
} from './shell/writer/csv-result-writer.js';
