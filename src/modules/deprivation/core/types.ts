import { type Static, Type } from '@sinclair/typebox';

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Source row schemas (validated by the loader before reaching the core)
// ─────────────────────────────────────────────────────────────────────────────

const Code = Type.String({ minLength: 1 });

export const AreaScoreRowSchema = Type.Object({
  areaCode: Code,
  score: Type.String({ minLength: 1, description: 'Decimal value as string' }),
  population: Type.Union([Type.Number({ minimum: 0 }), Type.Null()]),
});

export const RegistrantPopulationRowSchema = Type.Object({
  registrantCode: Code,
  areaCode: Code,
  population: Type.Number({ minimum: 0 }),
});

export const DirectoryEntrySchema = Type.Object({
  code: Code,
  name: Type.String(),
  locationCode: Type.String(),
  parentCode: Type.String(),
});

export const MembershipRowSchema = Type.Object({
  registrantCode: Code,
  groupCode: Code,
});

export type AreaScoreRowDTO = Static<typeof AreaScoreRowSchema>;
export type RegistrantPopulationRow = Static<typeof RegistrantPopulationRowSchema>;
export type DirectoryEntry = Static<typeof DirectoryEntrySchema>;
export type MembershipRow = Static<typeof MembershipRowSchema>;

/**
 * Names of the source tables, used to report which one failed to load.
 */
export type SourceTableName =
  | 'area_scores'
  | 'registrant_populations'
  | 'registrant_directory'
  | 'group_directory'
  | 'memberships';

// ─────────────────────────────────────────────────────────────────────────────
// Domain types
// ─────────────────────────────────────────────────────────────────────────────

export interface AreaScore {
  areaCode: string;
  score: Decimal;
  /** Population denominator published with the scores. Not used for weighting. */
  population: number | null;
}

/**
 * Population living in one area and registered to one entity.
 * The entity is a registrant (practice) or a group (network) depending on the level.
 */
export interface AreaPopulationRow {
  entityCode: string;
  areaCode: string;
  population: number;
}

export interface ScoreRecord {
  entityCode: string;
  score: Decimal;
  /** Population that survived the area join. */
  population: number;
  decile: number;
}

export interface OutputRow {
  code: string;
  name: string;
  locationCode: string;
  parentCode: string;
  score: number;
  decile: number;
}

export interface SourceTables {
  areaScores: AreaScoreRowDTO[];
  registrantPopulations: RegistrantPopulationRow[];
  registrantDirectory: DirectoryEntry[];
  groupDirectory: DirectoryEntry[];
  memberships: MembershipRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Diagnostics
// ─────────────────────────────────────────────────────────────────────────────

export interface MembershipDiagnostics {
  /** Registrants folded into the unallocated group, sorted. */
  unallocatedRegistrants: string[];
  /** Registrants with more than one active membership, sorted. First row wins. */
  duplicateMemberships: string[];
  totalPopulation: number;
}

export interface AggregationDiagnostics {
  excludedRows: number;
  excludedPopulation: number;
  /** Distinct area codes with no score, sorted. */
  unmatchedAreaCodes: string[];
  /** Entities with no population left after the area join, sorted. */
  droppedEntities: string[];
}

export interface EnrichmentDiagnostics {
  /** Entities that fell back to sentinel metadata, sorted. */
  missingMetadata: string[];
}

export interface LevelDiagnostics {
  aggregation: AggregationDiagnostics;
  enrichment: EnrichmentDiagnostics;
}

export interface RollupDiagnostics {
  membership: MembershipDiagnostics;
  practices: LevelDiagnostics;
  networks: LevelDiagnostics;
}

export interface RollupResult {
  practices: OutputRow[];
  networks: OutputRow[];
  diagnostics: RollupDiagnostics;
}
