/**
 * Name normalization shared by the representative resolver and the region table.
 *
 * Constituency names reserved for scheduled castes or tribes carry a trailing
 * qualifier, written inconsistently across sources: "Anekal (SC)",
 * "Pulakeshinagar(SC)", "Anekal(sc)".
 */

const RESERVATION_SUFFIX = /\s*\((?:SC|ST)\)\s*$/i;

/** Strips the reservation qualifier and collapses whitespace. */
export function normalizeName(name: string): string {
  return name.replace(RESERVATION_SUFFIX, '').replace(/\s+/g, ' ').trim();
}

/** Key for comparisons that ignore case and naming variants. */
export function canonicalName(name: string): string {
  return normalizeName(name).toLowerCase();
}
