/**
 * Prior-report cache.
 *
 * The report written by the previous run is the only cache. It is read once,
 * before any session work, into a map keyed by directory name and is never
 * written back during the run.
 */

import { copyFileSync, existsSync } from "node:fs";
import type { Diagnostics } from "../diagnostics.js";
import type { ReportSchema } from "./headers.js";
import { isFilled, type ReportRow, type ReportScalar } from "./values.js";
import { readReportWorkbook, type SheetData } from "./workbook.js";

export interface CacheEntry {
  session: ReportRow;
  stats: ReportRow[];
}

export type ReportCache = ReadonlyMap<string, CacheEntry>;

const SESSION_KEY = "Directory Name";
const STAT_SESSION_KEY = "Session";

function headerNames(headers: readonly ReportScalar[]): Set<string> {
  const names = new Set<string>();
  for (const header of headers) {
    if (isFilled(header)) names.add(String(header));
  }
  return names;
}

function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const value of a) {
    if (!b.has(value)) return false;
  }
  return true;
}

/** Data rows keyed through the sheet's own header row; blank rows skipped. */
function sheetRows(sheet: SheetData): ReportRow[] {
  const rows: ReportRow[] = [];
  for (const values of sheet.rows) {
    if (!values.some(isFilled)) continue;
    const row: ReportRow = {};
    sheet.headers.forEach((header, i) => {
      if (isFilled(header)) row[String(header)] = values[i] ?? null;
    });
    rows.push(row);
  }
  return rows;
}

function keyOf(value: ReportScalar | undefined): string | undefined {
  if (value === undefined || !isFilled(value)) return undefined;
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Load the cache from a prior report.
 *
 * A missing file is a cold start. A file whose Sessions header set differs
 * from the current schema is copied to `<path>.bak` and ignored entirely.
 */
export async function loadReportCache(
  path: string,
  schema: ReportSchema,
  diagnostics: Diagnostics,
): Promise<Map<string, CacheEntry>> {
  const cache = new Map<string, CacheEntry>();
  if (!existsSync(path)) return cache;

  const workbook = await readReportWorkbook(path);
  const sheetHeaders = headerNames(workbook?.sessions.headers ?? []);
  if (!workbook || !sameSet(sheetHeaders, new Set(schema.sessionHeaders))) {
    const bakPath = `${path}.bak`;
    diagnostics.warn("Current sheet headers do not match the report headers");
    diagnostics.warn(`Backing up old report to ${bakPath}`);
    copyFileSync(path, bakPath);
    return cache;
  }

  for (const row of sheetRows(workbook.sessions)) {
    const key = keyOf(row[SESSION_KEY]);
    if (key === undefined) continue;
    cache.set(key, { session: row, stats: [] });
  }
  if (cache.size === 0 || !workbook.stats) return cache;

  for (const row of sheetRows(workbook.stats)) {
    const key = keyOf(row[STAT_SESSION_KEY]);
    if (key === undefined) continue;
    cache.get(key)?.stats.push(row);
  }
  return cache;
}
