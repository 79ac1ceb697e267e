/**
 * src/functions/resolveRepresentative.ts
 *
 * Finds the representative record for a constituency name. Source datasets
 * disagree on casing and on reservation qualifiers, so the lookup runs through
 * progressively looser tiers and falls back to a placeholder record that has
 * exactly the same fields as a real one.
 */

import type { RepresentativeMatch, RepresentativeRecord } from '../types';
import { canonicalName, normalizeName } from '../utils/names';

export const NOT_AVAILABLE = 'Data not available';
export const NOT_APPLICABLE = 'N/A';

export type RepresentativeRecords = ReadonlyMap<string, RepresentativeRecord>;

export function placeholderRecord(
  constituency: string,
  constituencyNumber: string | null = null
): RepresentativeRecord {
  return {
    name: NOT_AVAILABLE,
    party: NOT_APPLICABLE,
    constituency,
    constituencyNumber,
    contact: null,
    email: null,
    officeAddress: null,
  };
}

function withFallbackNumber(
  record: RepresentativeRecord,
  constituencyNumber: string | null
): RepresentativeRecord {
  if (record.constituencyNumber !== null || constituencyNumber === null) return record;
  return { ...record, constituencyNumber };
}

/**
 * Tiered lookup: exact key, then the normalized name, then a case-insensitive
 * scan over every key. The first hit wins.
 *
 * @param constituencyNumber - Used when the matched record has none, and on the placeholder
 */
export function matchRepresentative(
  name: string,
  records: RepresentativeRecords,
  constituencyNumber: string | null = null
): RepresentativeMatch {
  const exact = records.get(name);
  if (exact) {
    return { record: withFallbackNumber(exact, constituencyNumber), tier: 'exact' };
  }

  const normalized = normalizeName(name);
  const byNormalized = records.get(normalized);
  if (byNormalized) {
    return { record: withFallbackNumber(byNormalized, constituencyNumber), tier: 'normalized' };
  }

  const target = normalized.toLowerCase();
  for (const [key, record] of records) {
    if (key.toLowerCase() === target || canonicalName(key) === target) {
      return { record: withFallbackNumber(record, constituencyNumber), tier: 'case-insensitive' };
    }
  }

  return {
    record: placeholderRecord(normalized || name, constituencyNumber),
    tier: 'placeholder',
  };
}

/** Never fails: a miss yields the placeholder record. */
export function resolveRepresentative(
  name: string,
  records: RepresentativeRecords,
  constituencyNumber: string | null = null
): RepresentativeRecord {
  return matchRepresentative(name, records, constituencyNumber).record;
}
