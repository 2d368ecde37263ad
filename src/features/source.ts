/**
 * Reading from source transcripts
 *
 * Loaders trust their upstream provider. The helpers here neither validate
 * coordinates nor catch anything: a missing attribute throws the runtime's
 * TypeError and an out-of-range end truncates the slice.
 *
 * @module features/source
 */

/**
 * Extract `[start, end]` from a sequence using 1-based inclusive coordinates
 *
 * Equivalent to `sequence[start - 1 : end]`. An `end` past the sequence
 * length yields the available suffix; a range entirely outside it yields "".
 *
 * @example
 * ```typescript
 * sliceOneBased("ATGCCCTAA", 1, 3);  // "ATG"
 * sliceOneBased("ATGCCCTAA", 4, 9);  // "CCCTAA"
 * sliceOneBased("ATGCC", 3, 10);     // "GCC"
 * ```
 */
export function sliceOneBased(sequence: string, start: number, end: number): string {
  return sequence.slice(start - 1, end);
}

/**
 * Read a required attribute, throwing a TypeError when the provider left it out
 */
export function readAttribute<S extends object, K extends keyof S & string>(
  source: S,
  key: K
): S[K] {
  const value = source[key];
  if (value === undefined) {
    throw new TypeError(`Source transcript has no attribute '${key}'`);
  }
  return value;
}
