/**
 * Per-session cache decision.
 *
 * A cached row is reused while the session cannot have changed: it was
 * already completed or abandoned when cached, or its item count still
 * matches. A session that finalized after it was cached is recomputed once.
 */

import type { SubstitutionsDocument } from "../config/documents.js";
import type { SessionRecord } from "../records/index.js";
import type { CacheEntry } from "./cache.js";
import type { ReportSchema } from "./headers.js";
import {
  cellValue,
  type ReportRow,
  type ReportScalar,
  type SessionResult,
} from "./values.js";

export type MissReason =
  | "not_cached"
  | "item_count_changed"
  | "finalized_since_cache";

export type ReconcileDecision =
  | { kind: "hit"; entry: CacheEntry }
  | { kind: "miss"; reason: MissReason };

/** Completed/Abandoned as read back from a report cell. */
export function cachedFlag(value: ReportScalar): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const text = value.trim().toLowerCase();
    if (text === "true") return true;
    const n = Number(text);
    return text !== "" && Number.isFinite(n) && n !== 0;
  }
  return false;
}

/**
 * The key a substitution replaced to produce `value`, or `value` itself.
 * Cached rows are written after substitution, so "Yes" may stand for true.
 */
export function unsubstitute(
  value: ReportScalar,
  table: Readonly<Record<string, ReportScalar>> | undefined,
): ReportScalar {
  if (table === undefined || typeof value === "boolean") return value;
  for (const [key, replacement] of Object.entries(table)) {
    if (replacement === value) return key;
  }
  return value;
}

function cachedCount(value: ReportScalar): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

/**
 * Decide HIT or MISS. `countItems` is only called when an entry exists.
 * `substitutions` is the table the cached row was written with.
 */
export function reconcileSession(
  session: SessionRecord,
  entry: CacheEntry | undefined,
  countItems: () => number,
  substitutions: SubstitutionsDocument = {},
): ReconcileDecision {
  if (!entry) return { kind: "miss", reason: "not_cached" };

  const flag = (column: string): boolean =>
    cachedFlag(unsubstitute(cellValue(entry.session, column), substitutions[column]));
  const wasFinal = flag("Completed") || flag("Abandoned");

  if (!wasFinal) {
    if (cachedCount(cellValue(entry.session, "Total items")) !== countItems()) {
      return { kind: "miss", reason: "item_count_changed" };
    }
    if (session.completed || session.abandoned) {
      return { kind: "miss", reason: "finalized_since_cache" };
    }
  }
  return { kind: "hit", entry };
}

function remapRow(row: ReportRow, headers: readonly string[]): ReportRow {
  const out: ReportRow = {};
  for (const header of headers) out[header] = cellValue(row, header);
  return out;
}

/** Cached rows projected onto the current headers; new columns are null. */
export function remapCachedRows(
  entry: CacheEntry,
  schema: ReportSchema,
): SessionResult {
  return {
    sessionRow: remapRow(entry.session, schema.sessionHeaders),
    statRows: entry.stats.map((row) => remapRow(row, schema.statHeaders)),
  };
}
