/**
 * Sorting and deduplication by identity tuple
 *
 * @module features/identity
 */

import type { FeatureRecord } from "../types";

/**
 * String form of a record's identity tuple, suitable as a Map or Set key
 *
 * @example
 * ```typescript
 * identityKey(Exon.load(tx, 1, 120, "protein_coding", "ENSE001", 1)); // "ENSE001:1-120"
 * ```
 */
export function identityKey(record: FeatureRecord): string {
  const [id, start, end] = record.toIdentityTuple();
  return `${id}:${start}-${end}`;
}

/**
 * Order records by identifier, then start, then end
 */
export function compareFeatures(a: FeatureRecord, b: FeatureRecord): number {
  const [idA, startA, endA] = a.toIdentityTuple();
  const [idB, startB, endB] = b.toIdentityTuple();

  if (idA !== idB) {
    return idA < idB ? -1 : 1;
  }
  if (startA !== startB) {
    return startA - startB;
  }
  return endA - endB;
}

/**
 * Keep the first record seen for each identity tuple, preserving input order
 */
export function uniqueFeatures<T extends FeatureRecord>(records: Iterable<T>): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const record of records) {
    const key = identityKey(record);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }

  return unique;
}
