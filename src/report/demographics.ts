/**
 * Demographic columns and age parsing.
 */

import { differenceInYears, isValid, parse, parseISO } from "date-fns";
import type { DemographicsRules } from "../config/run-config.js";
import type { RecordStoreGateway } from "../records/index.js";
import { cellValue, isFilled, type ReportRow } from "./values.js";

/** Day-first formats come after month-first ones, so "03/04/1990" is 4 March. */
const DATE_FORMATS: readonly string[] = [
  "yyyy/MM/dd",
  "MM/dd/yyyy",
  "dd/MM/yyyy",
  "dd-MM-yyyy",
  "dd.MM.yyyy",
  "d MMMM yyyy",
  "MMMM d, yyyy",
  "d MMM yyyy",
  "MMM d, yyyy",
];

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}/;

function parseBirthDate(text: string, reference: Date): Date | null {
  const trimmed = text.trim();
  if (ISO_DATE_RE.test(trimmed)) {
    const iso = parseISO(trimmed);
    return isValid(iso) ? iso : null;
  }
  for (const format of DATE_FORMATS) {
    const parsed = parse(trimmed, format, reference);
    if (isValid(parsed)) return parsed;
  }
  return null;
}

/**
 * Whole years between a birth date and `today`. Accepts a Date or a
 * date-like string; anything else becomes "Unknown data format: <value>".
 */
export function parseAge(value: unknown, today: Date): number | string {
  let born: Date | null = null;
  if (value instanceof Date) born = isValid(value) ? value : null;
  else if (typeof value === "string") born = parseBirthDate(value, today);
  if (!born) return `Unknown data format: ${String(value)}`;
  return differenceInYears(today, born);
}

/**
 * Overwrite identity and location columns from the demographic user whose
 * id the pin carries, then pull the configured attributes.
 */
export function applyDemographics(
  row: ReportRow,
  rules: DemographicsRules,
  store: RecordStoreGateway,
  today: Date,
): void {
  const pin = cellValue(row, "Pin");
  if (typeof pin !== "string") return;
  const match = rules.pattern.exec(pin);
  if (!match) return;
  const userId = Number(match[0]);
  if (!Number.isInteger(userId)) return;

  const user = store.getDemographicUser(userId);
  if (!user) return;

  row["Connect User ID"] = user.id;
  row["Country"] = user.country;
  row["State"] = user.state;
  row["City"] = user.city;
  row["Email"] = user.email;

  for (const [header, attributeId] of rules.attributes) {
    row[header] = store.getUserAttribute(user.id, attributeId) ?? null;
  }

  // "Age (ia)" takes precedence when configured
  const hasIaAge = rules.attributes.some(([header]) => header === "Age (ia)");
  if (isFilled(cellValue(row, "Age (ia)"))) {
    row["Age (ia)"] = parseAge(cellValue(row, "Age (ia)"), today);
  } else if (isFilled(cellValue(row, "Age")) && !hasIaAge) {
    row["Age"] = parseAge(cellValue(row, "Age"), today);
  }

  if (isFilled(cellValue(row, "age_bracket"))) {
    row["age_bracket"] = String(parseAge(cellValue(row, "age_bracket"), today));
  }
}
