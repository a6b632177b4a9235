/**
 * Report workbook I/O.
 *
 * Layout: sheet 1 "Sessions", sheet 2 "Stats"; row 1 of each is its header
 * row. Reading flattens rich text, hyperlinks and formulas to the value a
 * reader sees in the cell.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import ExcelJS from "exceljs";
import type { CellValue, Worksheet } from "exceljs";
import type { ReportScalar } from "./values.js";

export const SESSIONS_SHEET = "Sessions";
export const STATS_SHEET = "Stats";

export interface SheetData {
  headers: ReportScalar[];
  rows: ReportScalar[][];
}

export interface ReportWorkbookData {
  sessions: SheetData;
  /** Absent when the workbook has no Stats sheet. */
  stats: SheetData | undefined;
}

export interface ReportTables {
  sessionHeaders: readonly string[];
  statHeaders: readonly string[];
  sessionRows: ReportScalar[][];
  statRows: ReportScalar[][];
}

// ---------------------------------------------------------------------------
// Cell values
// ---------------------------------------------------------------------------

export function cellToScalar(value: CellValue): ReportScalar {
  if (value === null || value === undefined) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }
  if ("richText" in value) {
    return value.richText.map((run) => run.text).join("");
  }
  if ("hyperlink" in value) {
    const text: unknown = value.text;
    return typeof text === "string" ? text : value.hyperlink;
  }
  if ("formula" in value || "sharedFormula" in value) {
    const result: unknown = value.result;
    if (
      typeof result === "string" ||
      typeof result === "number" ||
      typeof result === "boolean" ||
      result instanceof Date
    ) {
      return result;
    }
    return null;
  }
  return null;
}

function readSheet(sheet: Worksheet): SheetData {
  const headerRow = sheet.getRow(1);
  const width = headerRow.cellCount;
  const headers: ReportScalar[] = [];
  for (let col = 1; col <= width; col++) {
    headers.push(cellToScalar(headerRow.getCell(col).value));
  }

  const rows: ReportScalar[][] = [];
  for (let r = 2; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const values: ReportScalar[] = [];
    for (let col = 1; col <= width; col++) {
      values.push(cellToScalar(row.getCell(col).value));
    }
    rows.push(values);
  }
  return { headers, rows };
}

// ---------------------------------------------------------------------------
// Read / write
// ---------------------------------------------------------------------------

/** Returns undefined when the workbook has no worksheets. */
export async function readReportWorkbook(
  path: string,
): Promise<ReportWorkbookData | undefined> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);
  const first = workbook.worksheets[0];
  if (!first) return undefined;
  const stats = workbook.getWorksheet(STATS_SHEET);
  return {
    sessions: readSheet(first),
    stats: stats && stats !== first ? readSheet(stats) : undefined,
  };
}

export async function writeReportWorkbook(
  path: string,
  tables: ReportTables,
): Promise<void> {
  mkdirSync(dirname(path), { recursive: true });
  const workbook = new ExcelJS.Workbook();

  const sessions = workbook.addWorksheet(SESSIONS_SHEET);
  sessions.addRow([...tables.sessionHeaders]);
  for (const row of tables.sessionRows) sessions.addRow(row);

  const stats = workbook.addWorksheet(STATS_SHEET);
  stats.addRow([...tables.statHeaders]);
  for (const row of tables.statRows) stats.addRow(row);

  await workbook.xlsx.writeFile(path);
}
