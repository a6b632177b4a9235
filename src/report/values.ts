/**
 * Cell values of the two report tables.
 */

export type ReportScalar = string | number | boolean | Date | null;

/** Column name → value. Columns outside the report schema are ignored on write. */
export type ReportRow = Record<string, ReportScalar>;

/**
 * Coerce an arbitrary JSON value into a cell value.
 * Objects and arrays are stored as their JSON text.
 */
export function toScalar(value: unknown): ReportScalar {
  if (value === null || value === undefined) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }
  if (typeof value === "bigint") return Number(value);
  return JSON.stringify(value);
}

/** Null, undefined and the empty string are blank; anything else is a value. */
export function isFilled(value: ReportScalar | undefined): boolean {
  return value !== null && value !== undefined && value !== "";
}

/** Remove code points below 32 (control characters) from a string. */
export function stripControlCharacters(value: string): string {
  let out = "";
  for (const ch of value) {
    if (ch.charCodeAt(0) >= 32) out += ch;
  }
  return out;
}

export function sanitizeScalar(value: ReportScalar): ReportScalar {
  return typeof value === "string" ? stripControlCharacters(value) : value;
}

/** A row's own value for a column; absent columns read as null. */
export function cellValue(row: ReportRow, header: string): ReportScalar {
  return Object.hasOwn(row, header) ? (row[header] ?? null) : null;
}

/** Project a row onto an ordered header list. */
export function rowValues(
  row: ReportRow,
  headers: readonly string[],
): ReportScalar[] {
  return headers.map((header) => cellValue(row, header));
}

/** What processing one session yields: its row and its stat exception rows. */
export interface SessionResult {
  sessionRow: ReportRow;
  statRows: ReportRow[];
}
