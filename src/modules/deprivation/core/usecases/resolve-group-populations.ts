/**
 * Resolve Group Populations Use Case
 *
 * Re-keys practice populations by network. Every practice lands in exactly one
 * group: its active network, or the unallocated group when it has none.
 */

import { compareCodes } from '../ranking.js';
import { ROLLUP_SETTINGS, type RollupSettings } from '../settings.js';

import type {
  AreaPopulationRow,
  MembershipDiagnostics,
  MembershipRow,
  RegistrantPopulationRow,
} from '../types.js';

export interface ResolveGroupPopulationsOutput {
  rows: AreaPopulationRow[];
  diagnostics: MembershipDiagnostics;
}

/**
 * Indexes memberships by practice. The first active row for a practice wins.
 */
const indexMemberships = (
  memberships: readonly MembershipRow[]
): { groupByRegistrant: Map<string, string>; duplicates: Set<string> } => {
  const groupByRegistrant = new Map<string, string>();
  const duplicates = new Set<string>();

  for (const membership of memberships) {
    if (groupByRegistrant.has(membership.registrantCode)) {
      duplicates.add(membership.registrantCode);
      continue;
    }
    groupByRegistrant.set(membership.registrantCode, membership.groupCode);
  }

  return { groupByRegistrant, duplicates };
};

/**
 * Folds (practice, area) populations into one row per (group, area) pair.
 *
 * Rows come out in the order their (group, area) pair is first seen. No
 * population is dropped here: area codes are matched later, by the aggregator.
 */
export function resolveGroupPopulations(
  rows: readonly RegistrantPopulationRow[],
  memberships: readonly MembershipRow[],
  settings: RollupSettings = ROLLUP_SETTINGS
): ResolveGroupPopulationsOutput {
  const { groupByRegistrant, duplicates } = indexMemberships(memberships);

  const folded = new Map<string, AreaPopulationRow>();
  const unallocated = new Set<string>();
  let totalPopulation = 0;

  for (const row of rows) {
    let groupCode = groupByRegistrant.get(row.registrantCode);
    if (groupCode === undefined) {
      groupCode = settings.unallocatedGroupCode;
      unallocated.add(row.registrantCode);
    }

    totalPopulation += row.population;

    // Codes never contain a newline, so it is a safe key separator
    const key = `${groupCode}\n${row.areaCode}`;
    const existing = folded.get(key);
    if (existing === undefined) {
      folded.set(key, { entityCode: groupCode, areaCode: row.areaCode, population: row.population });
    } else {
      folded.set(key, { ...existing, population: existing.population + row.population });
    }
  }

  return {
    rows: Array.from(folded.values()),
    diagnostics: {
      unallocatedRegistrants: Array.from(unallocated).sort(compareCodes),
      duplicateMemberships: Array.from(duplicates).sort(compareCodes),
      totalPopulation,
    },
  };
}
