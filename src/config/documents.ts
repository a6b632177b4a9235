/**
 * Configuration documents accepted by the report command.
 *
 * Files are parsed with `yaml`, which also reads plain JSON, then checked
 * against the zod schemas below. Objects use .passthrough() where extra keys
 * are harmless (stat schemas carry arbitrary JSON Schema keywords).
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "yaml";
import { z } from "zod";
import { ReportError, errorMessage } from "../errors.js";

// ---------------------------------------------------------------------------
// Field-level schemas
// ---------------------------------------------------------------------------

const scalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const attributeId = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .regex(/^\d+$/, "Attribute id must be an integer")
    .transform((s) => Number(s)),
]);

const regexSource = z.string().min(1).refine((source) => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}, "Must be a valid regular expression");

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

/** JSON Schema used to validate stat documents. */
export const StatSchemaDocumentSchema = z
  .object({
    properties: z.record(z.string(), z.unknown()),
  })
  .passthrough();

export const DemographicsDocumentSchema = z.object({
  /** Pattern whose first match in the pin is the demographic user id. */
  pattern: regexSource,
  /** Report header → demographic attribute id. */
  attributes: z.record(z.string(), attributeId),
});

/** YAML reads an unquoted `3:` key as a number. */
const ruleKey = z.union([z.string(), z.number()]).transform((key) => String(key));

/**
 * `"n"` or `"a-b"` → value written to the title column, as pairs in document
 * order. Parsed from a Map: a plain object would list integer keys first.
 */
const orderedRules = z
  .map(ruleKey, scalar)
  .transform((rules) => [...rules.entries()]);

const ScriptCategorySchema = z.object({
  title: z.string().min(1),
  rules: orderedRules,
});

/** Load with `{ mapAsMap: true }` so rule order survives parsing. */
export const ScriptCategoriesDocumentSchema = z.array(
  z
    .map(z.string(), z.unknown())
    .transform((fields) => Object.fromEntries(fields))
    .pipe(ScriptCategorySchema),
);

/**
 * Column → (string form of current value → replacement). Keys are matched
 * against `substitutionKey` of the cell: booleans as "true"/"false" (or
 * "True"/"False"), whole numbers as "5" (or "5.0"), dates as ISO strings.
 */
export const SubstitutionsDocumentSchema = z.record(
  z.string(),
  z.record(z.string(), scalar),
);

export const CorpusCodeListSchema = z.array(z.string());

/** Image corpus code → prompt name used in photo column headers. */
export const PhotoPromptsDocumentSchema = z.record(
  z.string(),
  z.string().regex(/^\w+$/, "Prompt names must be word characters only"),
);

export type StatSchemaDocument = z.infer<typeof StatSchemaDocumentSchema>;
export type DemographicsDocument = z.infer<typeof DemographicsDocumentSchema>;
export type ScriptCategoriesDocument = z.infer<
  typeof ScriptCategoriesDocumentSchema
>;
export type SubstitutionsDocument = z.infer<typeof SubstitutionsDocumentSchema>;
export type PhotoPromptsDocument = z.infer<typeof PhotoPromptsDocumentSchema>;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadDocumentOptions {
  /** Parse mappings into Maps, keeping key order and key types. */
  mapAsMap?: boolean;
}

/**
 * Read a JSON or YAML document and validate it.
 * Any read, parse or shape failure is a CONFIG_INVALID error naming the file.
 */
export function loadDocument<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
  options: LoadDocumentOptions = {},
): z.output<T> {
  const abs = resolve(filePath);
  let raw: unknown;
  try {
    raw = yaml.parse(readFileSync(abs, "utf8"), {
      mapAsMap: options.mapAsMap ?? false,
    });
  } catch (e: unknown) {
    throw new ReportError(
      `Cannot read configuration document ${abs}: ${errorMessage(e)}`,
      "CONFIG_INVALID",
      { path: abs },
      { cause: e },
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ReportError(
      `Invalid configuration document ${abs}: ${result.error.message}`,
      "CONFIG_INVALID",
      { path: abs, issues: result.error.issues },
    );
  }
  return result.data;
}
