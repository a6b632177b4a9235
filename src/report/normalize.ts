/**
 * Column rewrites applied after the row is assembled: script categories,
 * substitutions and country formatting.
 */

import {
  matchScriptRule,
  type CountryFormat,
  type ScriptCategory,
} from "../config/run-config.js";
import type { SubstitutionsDocument } from "../config/documents.js";
import { formatCountry } from "../evidence/codes.js";
import { cellValue, type ReportRow, type ReportScalar } from "./values.js";

/** Script number as stored on the pin's script; null when not an integer. */
export function parseScriptNum(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
}

export function applyScriptCategories(
  row: ReportRow,
  categories: readonly ScriptCategory[],
  scriptNum: number | null,
): void {
  if (scriptNum === null) return;
  for (const category of categories) {
    const rule = matchScriptRule(category.rules, scriptNum);
    if (rule) row[category.title] = rule.value;
  }
}

/** Lookup key of a cell value in a substitution table. */
export function substitutionKey(value: ReportScalar): string {
  if (value === null) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

/**
 * Every key a value may be listed under, preferred first: booleans also as
 * "True"/"False", whole numbers also as "5.0".
 */
export function substitutionKeys(value: ReportScalar): string[] {
  const key = substitutionKey(value);
  if (typeof value === "boolean") return [key, value ? "True" : "False"];
  if (typeof value === "number" && Number.isInteger(value)) return [key, `${key}.0`];
  return [key];
}

/** Replace mapped values; unmapped values and absent columns are left alone. */
export function applySubstitutions(
  row: ReportRow,
  substitutions: SubstitutionsDocument,
): void {
  for (const [column, table] of Object.entries(substitutions)) {
    if (!Object.hasOwn(row, column)) continue;
    const key = substitutionKeys(cellValue(row, column)).find((candidate) =>
      Object.hasOwn(table, candidate),
    );
    if (key !== undefined) row[column] = table[key] ?? null;
  }
}

export function applyCountryFormat(row: ReportRow, format: CountryFormat): void {
  const country = cellValue(row, "Country");
  if (typeof country !== "string" || country === "") return;
  const formatted = formatCountry(country, format);
  if (formatted !== null) row["Country"] = formatted;
}
