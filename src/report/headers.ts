/**
 * Report column schema.
 *
 * Built once per run, before any session is processed, and frozen. Every
 * component receives the same `ReportSchema`; nothing appends to it later.
 * The session header set is also the cache compatibility contract: a prior
 * report whose header set differs is not reused.
 */

import { isRecord } from "../json.js";
import type { RunConfig } from "../config/run-config.js";

export interface ReportSchema {
  sessionHeaders: readonly string[];
  statHeaders: readonly string[];
  /** Stat headers after Session/File/Reason: values read from stat documents. */
  statValueHeaders: readonly string[];
}

export const BASE_SESSION_HEADERS: readonly string[] = [
  "Directory Name",
  "Pin",
  "Total items",
  "Recorded items",
  "Skipped items",
  "Rejected items",
  "Duration",
  "Date",
  "Completed",
  "Abandoned",
  "Email",
  "Device IP",
  "Device ID",
  "Device Model",
  "Device OS",
  "Country",
  "Country Code",
  "Region",
  "Region Name",
];

export const BASE_STAT_HEADERS: readonly string[] = ["Session", "File", "Reason"];

export const DEMOGRAPHIC_HEADERS: readonly string[] = [
  "Connect User ID",
  "Country",
  "State",
  "City",
];

export const BLUETOOTH_HEADERS: readonly string[] = [
  "Bluetooth Name",
  "Bluetooth Type",
];

export const MISSING_STATS_HEADER = "missing_stats";

/** Prompt name used for image corpus codes the photo prompt table lacks. */
export const UNMAPPED_PHOTO_PROMPT = "missing_prompt";

/** Stat schema properties whose own properties become `<type>/<sub>` headers. */
const NESTED_STAT_TYPES: ReadonlySet<string> = new Set(["video", "audio", "image"]);

export function photoHeaders(
  promptName: string,
): [exif: string, url: string, lat: string, lng: string] {
  return [
    `${promptName}_photo_exif`,
    `${promptName}_photo_url`,
    `${promptName}_photo_lat`,
    `${promptName}_photo_lng`,
  ];
}

/** Headers derived from a stat JSON Schema's `properties`, keys sorted. */
export function statValueHeadersFor(
  properties: Record<string, unknown>,
): string[] {
  const headers: string[] = [];
  for (const property of Object.keys(properties).sort()) {
    if (NESTED_STAT_TYPES.has(property)) {
      const nested = properties[property];
      const inner = isRecord(nested) ? nested["properties"] : undefined;
      if (isRecord(inner)) {
        for (const sub of Object.keys(inner)) headers.push(`${property}/${sub}`);
      }
    } else {
      headers.push(property);
    }
  }
  return headers;
}

export interface SchemaInputs {
  /** Names of the project's input prompt fields. */
  inputNames: readonly string[];
  /** True when some image item's corpus code is not in the photo prompt table. */
  hasUnmappedPhotoCodes: boolean;
}

export function buildReportSchema(
  config: RunConfig,
  inputs: SchemaInputs,
): ReportSchema {
  const session: string[] = [];
  const seen = new Set<string>();
  const add = (headers: Iterable<string>): void => {
    for (const header of headers) {
      if (seen.has(header)) continue;
      seen.add(header);
      session.push(header);
    }
  };

  add(BASE_SESSION_HEADERS);

  const statValueHeaders = config.statSchema
    ? statValueHeadersFor(config.statSchema.document.properties)
    : [];
  if (config.statSchema && config.medianStats) {
    add(statValueHeaders);
    add([MISSING_STATS_HEADER]);
  }

  if (config.demographics) {
    add(DEMOGRAPHIC_HEADERS);
    add(config.demographics.attributes.map(([header]) => header).sort());
  }

  add(config.scriptCategories.map((category) => category.title));

  if (config.bluetooth) add(BLUETOOTH_HEADERS);

  if (config.inputs) add([...new Set(inputs.inputNames)].sort());

  for (const name of new Set(Object.values(config.photoPrompts))) {
    add(photoHeaders(name));
  }
  if (inputs.hasUnmappedPhotoCodes) add(photoHeaders(UNMAPPED_PHOTO_PROMPT));

  add(config.promptAttributes);

  return Object.freeze({
    sessionHeaders: Object.freeze(session),
    statHeaders: Object.freeze([...BASE_STAT_HEADERS, ...statValueHeaders]),
    statValueHeaders: Object.freeze(statValueHeaders),
  });
}
