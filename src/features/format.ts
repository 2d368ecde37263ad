/**
 * Debug rendering shared by all feature records
 *
 * @module features/format
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { type FormatOptions, FormatOptionsSchema } from "../types";

/**
 * Only the first N characters of a long `seq` are printed
 */
export const DEFAULT_SEQ_LIMIT = 3;

const ELLIPSIS = "...";

/**
 * Render a record as `TypeName(field1=value1, field2=value2, ...)`
 *
 * Fields appear in the order they were assigned. A `seq` field longer than
 * `seqLimit` prints as its first `seqLimit` characters followed by "...";
 * the record itself is left untouched.
 *
 * @example
 * ```typescript
 * formatFeature("CDS", { start: 1, end: 9, seq: "ATGCCCTAA" });
 * // "CDS(start=1, end=9, seq=ATG...)"
 * ```
 */
export function formatFeature(
  typeName: string,
  fields: object,
  options: FormatOptions = {}
): string {
  const validated = FormatOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid format options: ${validated.summary}`);
  }
  const seqLimit = validated.seqLimit ?? DEFAULT_SEQ_LIMIT;

  const rendered = Object.entries(fields).map(([key, value]) => {
    if (key === "seq" && typeof value === "string" && value.length > seqLimit) {
      return `${key}=${value.slice(0, seqLimit)}${ELLIPSIS}`;
    }
    return `${key}=${String(value)}`;
  });

  return `${typeName}(${rendered.join(", ")})`;
}
