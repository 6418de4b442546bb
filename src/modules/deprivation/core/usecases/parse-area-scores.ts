import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  createDuplicateAreaScoreError,
  createInvalidScoreError,
  type DuplicateAreaScoreError,
  type InvalidScoreError,
} from '../errors.js';

import type { AreaScore, AreaScoreRowDTO } from '../types.js';

const parseScore = (row: AreaScoreRowDTO): Result<Decimal, InvalidScoreError> => {
  try {
    const score = new Decimal(row.score.trim());
    if (!score.isFinite()) {
      return err(createInvalidScoreError(row.areaCode, row.score));
    }
    return ok(score);
  } catch {
    return err(createInvalidScoreError(row.areaCode, row.score));
  }
};

/**
 * Builds the area score lookup used by the weighted aggregation.
 *
 * Each area must be scored exactly once: a repeated code would make the
 * inner join count its population twice.
 */
export const parseAreaScores = (
  rows: readonly AreaScoreRowDTO[]
): Result<ReadonlyMap<string, AreaScore>, DuplicateAreaScoreError | InvalidScoreError> => {
  const scores = new Map<string, AreaScore>();

  for (const row of rows) {
    if (scores.has(row.areaCode)) {
      return err(createDuplicateAreaScoreError(row.areaCode));
    }

    const score = parseScore(row);
    if (score.isErr()) {
      return err(score.error);
    }

    scores.set(row.areaCode, {
      areaCode: row.areaCode,
      score: score.value,
      population: row.population,
    });
  }

  return ok(scores);
};
