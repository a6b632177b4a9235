/**
 * Free-text input columns, read from the JSON evidence files the app writes
 * for input prompts: `[{ "name": ..., "user_input": ... }, ...]`.
 */

import { readFile } from "node:fs/promises";
import type { Diagnostics } from "../diagnostics.js";
import { errorMessage } from "../errors.js";
import { languageName } from "../evidence/codes.js";
import { isRecord } from "../json.js";
import type { ItemRecord } from "../records/index.js";
import { cellValue, toScalar, type ReportRow } from "./values.js";

async function readInputEntries(
  path: string,
  diagnostics: Diagnostics,
): Promise<unknown[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (e: unknown) {
    diagnostics.warn(`Skipping input file ${path}: ${errorMessage(e)}`);
    return [];
  }
  if (!Array.isArray(parsed)) {
    diagnostics.warn(`Skipping input file ${path}: not a JSON array`);
    return [];
  }
  return parsed;
}

/** Copy every answered input of the session's input items into the row. */
export async function applyInputs(
  row: ReportRow,
  items: readonly ItemRecord[],
  inputCorpusCodes: ReadonlySet<string>,
  diagnostics: Diagnostics,
): Promise<void> {
  for (const item of items) {
    if (!inputCorpusCodes.has(item.corpusCode)) continue;
    for (const entry of await readInputEntries(item.path, diagnostics)) {
      if (!isRecord(entry)) continue;
      const name = entry["name"];
      const answer = entry["user_input"];
      if (typeof name === "string" && answer) row[name] = toScalar(answer);
    }
  }
}

/** Rewrite ISO 639-3 codes in the given columns to language names. */
export function applyLanguageNames(
  row: ReportRow,
  columns: readonly string[],
): void {
  for (const column of columns) {
    const value = cellValue(row, column);
    if (typeof value !== "string" || value === "") continue;
    const name = languageName(value);
    if (name) row[column] = name;
  }
}
