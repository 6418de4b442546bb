/**
 * Aggregate Weighted Scores Use Case
 *
 * Computes a population-weighted mean area score per entity and ranks the
 * entities into deciles. Used unchanged for practices and for networks.
 *
 * Steps:
 * 1. Inner join each population row to its area score
 * 2. Weight the score by the row population
 * 3. Fold population and weighted score per entity
 * 4. Divide to get the weighted mean
 * 5. Rank by score, highest first, and split into deciles
 */

import { compareCodes, quantileBuckets } from '../ranking.js';
import { ROLLUP_SETTINGS, type RollupSettings } from '../settings.js';

import type {
  AggregationDiagnostics,
  AreaPopulationRow,
  AreaScore,
  ScoreRecord,
} from '../types.js';
import type { Decimal } from 'decimal.js';

export interface AggregateWeightedScoresOutput {
  /** One record per scored entity, in entity-code order. */
  records: ScoreRecord[];
  diagnostics: AggregationDiagnostics;
}

interface EntityTotals {
  population: number;
  contribution: Decimal;
}

type WeightedEntity = Omit<ScoreRecord, 'decile'>;

/**
 * Ties on score keep entity-code order, so equal scores rank deterministically.
 */
const compareRanked = (a: WeightedEntity, b: WeightedEntity): number =>
  b.score.comparedTo(a.score) || compareCodes(a.entityCode, b.entityCode);

export function aggregateWeightedScores(
  rows: readonly AreaPopulationRow[],
  areaScores: ReadonlyMap<string, AreaScore>,
  settings: RollupSettings = ROLLUP_SETTINGS
): AggregateWeightedScoresOutput {
  const totals = new Map<string, EntityTotals>();
  const seenEntities = new Set<string>();
  const unmatchedAreas = new Set<string>();
  let excludedRows = 0;
  let excludedPopulation = 0;

  for (const row of rows) {
    seenEntities.add(row.entityCode);

    const area = areaScores.get(row.areaCode);
    if (area === undefined) {
      excludedRows++;
      excludedPopulation += row.population;
      unmatchedAreas.add(row.areaCode);
      continue;
    }

    const contribution = area.score.mul(row.population);
    const existing = totals.get(row.entityCode);
    totals.set(
      row.entityCode,
      existing === undefined
        ? { population: row.population, contribution }
        : {
            population: existing.population + row.population,
            contribution: existing.contribution.plus(contribution),
          }
    );
  }

  const scored: WeightedEntity[] = [];
  const droppedEntities: string[] = [];

  for (const entityCode of Array.from(seenEntities).sort(compareCodes)) {
    const entity = totals.get(entityCode);
    if (entity === undefined || entity.population === 0) {
      droppedEntities.push(entityCode);
      continue;
    }

    scored.push({
      entityCode,
      score: entity.contribution.div(entity.population),
      population: entity.population,
    });
  }

  const ranked = [...scored].sort(compareRanked);
  const buckets = quantileBuckets(ranked.length, settings.decileCount);
  const decileByEntity = new Map<string, number>();
  ranked.forEach((record, position) => {
    decileByEntity.set(record.entityCode, buckets[position] ?? settings.decileCount);
  });

  return {
    records: scored.map((record) => ({
      ...record,
      decile: decileByEntity.get(record.entityCode) ?? settings.decileCount,
    })),
    diagnostics: {
      excludedRows,
      excludedPopulation,
      unmatchedAreaCodes: Array.from(unmatchedAreas).sort(compareCodes),
      droppedEntities,
    },
  };
}
