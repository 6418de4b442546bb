import { compareCodes } from '../ranking.js';
import { ROLLUP_SETTINGS, type RollupSettings } from '../settings.js';

import type { DirectoryEntry, EnrichmentDiagnostics, OutputRow, ScoreRecord } from '../types.js';

export interface EnrichScoreRecordsOutput {
  rows: OutputRow[];
  diagnostics: EnrichmentDiagnostics;
}

const orSentinel = (value: string | undefined, sentinel: string): string =>
  value !== undefined && value.trim() !== '' ? value : sentinel;

/**
 * Attaches directory metadata to each scored entity.
 *
 * Entities missing from the directory keep their score and decile; blank or
 * missing names and location codes become `unknownLabel`, blank or missing
 * parent codes become `unknownParentCode`. No record is dropped.
 */
export function enrichScoreRecords(
  records: readonly ScoreRecord[],
  directory: readonly DirectoryEntry[],
  settings: RollupSettings = ROLLUP_SETTINGS
): EnrichScoreRecordsOutput {
  const entries = new Map<string, DirectoryEntry>();
  for (const entry of directory) {
    if (!entries.has(entry.code)) {
      entries.set(entry.code, entry);
    }
  }

  const missingMetadata: string[] = [];

  const rows = records.map((record): OutputRow => {
    const entry = entries.get(record.entityCode);
    if (entry === undefined) {
      missingMetadata.push(record.entityCode);
    }

    return {
      code: record.entityCode,
      name: orSentinel(entry?.name, settings.unknownLabel),
      locationCode: orSentinel(entry?.locationCode, settings.unknownLabel),
      parentCode: orSentinel(entry?.parentCode, settings.unknownParentCode),
      score: record.score.toNumber(),
      decile: record.decile,
    };
  });

  return {
    rows,
    diagnostics: { missingMetadata: missingMetadata.sort(compareCodes) },
  };
}
