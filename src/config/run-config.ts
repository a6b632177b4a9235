/**
 * Immutable run configuration.
 *
 * Documents loaded by `documents.ts` are compiled here exactly once, before
 * any session work starts: the demographics pattern becomes a RegExp, the
 * stat schema an ajv validator, script-category rule keys typed rules.
 */

import AjvModule from "ajv";
import type { ErrorObject } from "ajv";
import type { Diagnostics } from "../diagnostics.js";
import type { ReportScalar } from "../report/values.js";
import type {
  DemographicsDocument,
  PhotoPromptsDocument,
  ScriptCategoriesDocument,
  StatSchemaDocument,
  SubstitutionsDocument,
} from "./documents.js";

const Ajv = AjvModule.default;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CountryFormat = "alpha_2" | "alpha_3" | "full_name";

export const COUNTRY_FORMATS: readonly CountryFormat[] = [
  "alpha_2",
  "alpha_3",
  "full_name",
];

export interface DemographicsRules {
  pattern: RegExp;
  /** [report header, attribute id], in document order. */
  attributes: ReadonlyArray<readonly [string, number]>;
}

export type ScriptRule =
  | { kind: "exact"; scriptNum: number; value: ReportScalar }
  /** Half-open: `min <= n < maxExclusive`. "a-b" compiles to [a, b + 1). */
  | { kind: "range"; min: number; maxExclusive: number; value: ReportScalar };

export interface ScriptCategory {
  title: string;
  rules: readonly ScriptRule[];
}

export interface StatValidator {
  /** Violation reasons; empty when the document is valid. */
  validate(document: Record<string, unknown>): string[];
}

export interface StatSchema {
  document: StatSchemaDocument;
  validator: StatValidator;
}

export interface RunConfig {
  statSchema: StatSchema | null;
  excludeCorpusCodes: ReadonlySet<string>;
  demographics: DemographicsRules | null;
  scriptCategories: readonly ScriptCategory[];
  substitutions: SubstitutionsDocument;
  countryFormat: CountryFormat | null;
  medianStats: boolean;
  promptAttributes: readonly string[];
  bluetooth: boolean;
  inputs: boolean;
  /** Columns holding ISO 639-3 codes, rewritten to language names. */
  languageColumns: readonly string[];
  photoPrompts: Readonly<PhotoPromptsDocument>;
  fromScratch: boolean;
  workers: number;
}

/** What the caller supplies; omitted fields take the defaults below. */
export interface RunConfigInput {
  statSchema?: StatSchemaDocument;
  excludeCorpusCodes?: readonly string[];
  demographics?: DemographicsDocument;
  scriptCategories?: ScriptCategoriesDocument;
  substitutions?: SubstitutionsDocument;
  countryFormat?: CountryFormat;
  medianStats?: boolean;
  promptAttributes?: readonly string[];
  bluetooth?: boolean;
  inputs?: boolean;
  languageColumns?: readonly string[];
  photoPrompts?: PhotoPromptsDocument;
  fromScratch?: boolean;
  workers?: number;
}

export const DEFAULT_WORKERS = 6;

export const DEFAULT_LANGUAGE_COLUMNS: readonly string[] = [
  "First_Language",
  "Primary_home_language",
];

export const DEFAULT_PHOTO_PROMPTS: Readonly<PhotoPromptsDocument> = {
  "1image1": "ev_station",
  "1image2": "user_interface",
  "1image3": "plug",
};

// ---------------------------------------------------------------------------
// Stat schema
// ---------------------------------------------------------------------------

function describeError(error: ErrorObject): string {
  const path = error.instancePath.replace(/^\//, "");
  const message = error.message ?? error.keyword;
  return path ? `${path} ${message}` : message;
}

export function compileStatSchema(document: StatSchemaDocument): StatSchema {
  const ajv = new Ajv({ allErrors: true, strict: false });
  const validate = ajv.compile(document);
  return {
    document,
    validator: {
      validate(stat: Record<string, unknown>): string[] {
        if (validate(stat)) return [];
        const reasons = (validate.errors ?? []).map(describeError);
        return [...new Set(reasons)];
      },
    },
  };
}

// ---------------------------------------------------------------------------
// Demographics
// ---------------------------------------------------------------------------

export function compileDemographics(
  document: DemographicsDocument,
): DemographicsRules {
  return {
    pattern: new RegExp(document.pattern),
    attributes: Object.entries(document.attributes).map(
      ([header, id]) => [header, id] as const,
    ),
  };
}

// ---------------------------------------------------------------------------
// Script categories
// ---------------------------------------------------------------------------

const EXACT_RULE_RE = /^\d+$/;
const RANGE_RULE_RE = /^(\d+)-(\d+)$/;

/**
 * Compile rule keys. `"3"` matches script 3 only; `"1-5"` matches 1..5
 * inclusive. Any other key is reported and dropped. Rules keep document
 * order, so the first one written that matches wins.
 */
export function compileScriptCategories(
  document: ScriptCategoriesDocument,
  diagnostics: Diagnostics,
): ScriptCategory[] {
  return document.map((category) => {
    const rules: ScriptRule[] = [];
    for (const [key, value] of category.rules) {
      const trimmed = key.trim();
      const range = RANGE_RULE_RE.exec(trimmed);
      if (EXACT_RULE_RE.test(trimmed)) {
        rules.push({ kind: "exact", scriptNum: Number(trimmed), value });
      } else if (range) {
        rules.push({
          kind: "range",
          min: Number(range[1]),
          maxExclusive: Number(range[2]) + 1,
          value,
        });
      } else {
        diagnostics.warn(
          `Unrecognised script category rule: ${key}: ${String(value)}`,
        );
      }
    }
    return { title: category.title, rules };
  });
}

/** First rule matching the script number, if any. */
export function matchScriptRule(
  rules: readonly ScriptRule[],
  scriptNum: number,
): ScriptRule | undefined {
  return rules.find((rule) =>
    rule.kind === "exact"
      ? rule.scriptNum === scriptNum
      : scriptNum >= rule.min && scriptNum < rule.maxExclusive,
  );
}

// ---------------------------------------------------------------------------
// Assembly
// ---------------------------------------------------------------------------

export function createRunConfig(
  input: RunConfigInput,
  diagnostics: Diagnostics,
): RunConfig {
  const workers = input.workers ?? DEFAULT_WORKERS;
  return Object.freeze({
    statSchema: input.statSchema ? compileStatSchema(input.statSchema) : null,
    excludeCorpusCodes: new Set(input.excludeCorpusCodes ?? []),
    demographics: input.demographics
      ? compileDemographics(input.demographics)
      : null,
    scriptCategories: input.scriptCategories
      ? compileScriptCategories(input.scriptCategories, diagnostics)
      : [],
    substitutions: input.substitutions ?? {},
    countryFormat: input.countryFormat ?? null,
    medianStats: input.medianStats ?? false,
    promptAttributes: [...(input.promptAttributes ?? [])],
    bluetooth: input.bluetooth ?? false,
    inputs: input.inputs ?? false,
    languageColumns: [...(input.languageColumns ?? DEFAULT_LANGUAGE_COLUMNS)],
    photoPrompts: { ...(input.photoPrompts ?? DEFAULT_PHOTO_PROMPTS) },
    fromScratch: input.fromScratch ?? false,
    workers: Number.isInteger(workers) && workers > 0 ? workers : DEFAULT_WORKERS,
  });
}
