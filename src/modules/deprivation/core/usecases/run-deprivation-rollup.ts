/**
 * Run Deprivation Roll-up Use Case
 *
 * Loads the source tables and produces the practice-level and network-level
 * weighted deprivation tables:
 * 1. Load all source tables, failing on the first one that cannot be loaded
 * 2. Build the area score lookup
 * 3. Fold practice populations up to networks
 * 4. Aggregate and rank each level
 * 5. Attach directory metadata
 */

import { err, ok, type Result } from 'neverthrow';

import { aggregateWeightedScores } from './aggregate-weighted-scores.js';
import { enrichScoreRecords } from './enrich-score-records.js';
import { parseAreaScores } from './parse-area-scores.js';
import { resolveGroupPopulations } from './resolve-group-populations.js';
import { createEmptySourceTableError, type DeprivationError } from '../errors.js';
import { ROLLUP_SETTINGS, type RollupSettings } from '../settings.js';

import type { SourceTablesRepository } from '../ports.js';
import type {
  AreaPopulationRow,
  AreaScore,
  DirectoryEntry,
  LevelDiagnostics,
  OutputRow,
  RollupResult,
  SourceTables,
} from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunDeprivationRollupDeps {
  repo: SourceTablesRepository;
  logger: Logger;
}

export interface RunDeprivationRollupInput {
  /** Defaults to ROLLUP_SETTINGS. */
  settings?: RollupSettings;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

const loadSourceTables = async (
  repo: SourceTablesRepository
): Promise<Result<SourceTables, DeprivationError>> => {
  const areaScores = await repo.loadAreaScores();
  if (areaScores.isErr()) {
    return err(areaScores.error);
  }
  if (areaScores.value.length === 0) {
    return err(createEmptySourceTableError('area_scores'));
  }

  const registrantPopulations = await repo.loadRegistrantPopulations();
  if (registrantPopulations.isErr()) {
    return err(registrantPopulations.error);
  }
  if (registrantPopulations.value.length === 0) {
    return err(createEmptySourceTableError('registrant_populations'));
  }

  const registrantDirectory = await repo.loadRegistrantDirectory();
  if (registrantDirectory.isErr()) {
    return err(registrantDirectory.error);
  }

  const groupDirectory = await repo.loadGroupDirectory();
  if (groupDirectory.isErr()) {
    return err(groupDirectory.error);
  }

  const memberships = await repo.loadMemberships();
  if (memberships.isErr()) {
    return err(memberships.error);
  }

  return ok({
    areaScores: areaScores.value,
    registrantPopulations: registrantPopulations.value,
    registrantDirectory: registrantDirectory.value,
    groupDirectory: groupDirectory.value,
    memberships: memberships.value,
  });
};

const scoreLevel = (
  rows: readonly AreaPopulationRow[],
  areaScores: ReadonlyMap<string, AreaScore>,
  directory: readonly DirectoryEntry[],
  settings: RollupSettings
): { rows: OutputRow[]; diagnostics: LevelDiagnostics } => {
  const aggregated = aggregateWeightedScores(rows, areaScores, settings);
  const enriched = enrichScoreRecords(aggregated.records, directory, settings);

  return {
    rows: enriched.rows,
    diagnostics: {
      aggregation: aggregated.diagnostics,
      enrichment: enriched.diagnostics,
    },
  };
};

export const runDeprivationRollup = async (
  deps: RunDeprivationRollupDeps,
  input: RunDeprivationRollupInput = {}
): Promise<Result<RollupResult, DeprivationError>> => {
  const { repo, logger } = deps;
  const settings = input.settings ?? ROLLUP_SETTINGS;

  const log = logger.child({ usecase: 'runDeprivationRollup' });

  const tablesResult = await loadSourceTables(repo);
  if (tablesResult.isErr()) {
    log.error({ error: tablesResult.error }, 'Failed to load source tables');
    return err(tablesResult.error);
  }

  const tables = tablesResult.value;

  log.info(
    {
      areaScores: tables.areaScores.length,
      registrantPopulations: tables.registrantPopulations.length,
      registrantDirectory: tables.registrantDirectory.length,
      groupDirectory: tables.groupDirectory.length,
      memberships: tables.memberships.length,
    },
    'Loaded source tables'
  );

  if (tables.registrantDirectory.length === 0) {
    log.warn('Practice directory is empty');
  }
  if (tables.groupDirectory.length === 0) {
    log.warn('Network directory is empty');
  }
  if (tables.memberships.length === 0) {
    log.warn('Network membership table is empty');
  }

  const scoresResult = parseAreaScores(tables.areaScores);
  if (scoresResult.isErr()) {
    log.error({ error: scoresResult.error }, 'Invalid area score table');
    return err(scoresResult.error);
  }

  const areaScores = scoresResult.value;

  const practiceRows: AreaPopulationRow[] = tables.registrantPopulations.map((row) => ({
    entityCode: row.registrantCode,
    areaCode: row.areaCode,
    population: row.population,
  }));

  const membership = resolveGroupPopulations(
    tables.registrantPopulations,
    tables.memberships,
    settings
  );

  if (membership.diagnostics.unallocatedRegistrants.length > 0) {
    log.info(
      {
        count: membership.diagnostics.unallocatedRegistrants.length,
        groupCode: settings.unallocatedGroupCode,
      },
      'Practices without an active network assigned to the unallocated group'
    );
  }

  if (membership.diagnostics.duplicateMemberships.length > 0) {
    log.warn(
      { registrants: membership.diagnostics.duplicateMemberships },
      'Practices with more than one active network membership; first membership kept'
    );
  }

  const practices = scoreLevel(practiceRows, areaScores, tables.registrantDirectory, settings);
  const networks = scoreLevel(membership.rows, areaScores, tables.groupDirectory, settings);

  for (const [level, result] of [
    ['practice', practices],
    ['network', networks],
  ] as const) {
    const { aggregation, enrichment } = result.diagnostics;

    if (aggregation.excludedRows > 0) {
      log.warn(
        {
          level,
          excludedRows: aggregation.excludedRows,
          excludedPopulation: aggregation.excludedPopulation,
          unmatchedAreaCodes: aggregation.unmatchedAreaCodes.length,
        },
        'Population in unscored areas excluded from weighting'
      );
    }

    if (aggregation.droppedEntities.length > 0) {
      log.warn(
        { level, entities: aggregation.droppedEntities },
        'Entities without population in scored areas omitted'
      );
    }

    if (enrichment.missingMetadata.length > 0) {
      log.info(
        { level, count: enrichment.missingMetadata.length },
        'Entities missing from the directory given sentinel metadata'
      );
    }
  }

  log.info(
    { practices: practices.rows.length, networks: networks.rows.length },
    'Deprivation roll-up completed'
  );

  return ok({
    practices: practices.rows,
    networks: networks.rows,
    diagnostics: {
      membership: membership.diagnostics,
      practices: practices.diagnostics,
      networks: networks.diagnostics,
    },
  });
};
