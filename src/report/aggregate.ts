/**
 * Session aggregation: builds one session's row and stat exception rows from
 * the record store and the evidence collaborators.
 *
 * Steps run in a fixed order because later ones overwrite columns written
 * earlier (demographics replace the geolocated Country, substitutions see
 * the final values). Any failure propagates; a partial row never escapes.
 */

import { isValid, parseISO } from "date-fns";
import type { Diagnostics } from "../diagnostics.js";
import type { RunConfig } from "../config/run-config.js";
import type { ExifTagMap } from "../evidence/exif.js";
import type { GeoMeta, GeolocationClient } from "../evidence/geolocation.js";
import type { PhotoDecoder } from "../evidence/photo-decoder.js";
import type {
  DeviceInfo,
  PinIdentity,
  PromptRecord,
  RecordStoreGateway,
  SessionRecord,
} from "../records/index.js";
import { applyDemographics } from "./demographics.js";
import { MISSING_STATS_HEADER, type ReportSchema } from "./headers.js";
import { applyInputs, applyLanguageNames } from "./inputs.js";
import {
  collectItemStatistics,
  medianOfSamples,
  sessionDuration,
} from "./item-stats.js";
import {
  applyCountryFormat,
  applyScriptCategories,
  applySubstitutions,
  parseScriptNum,
} from "./normalize.js";
import { applyPhotoEvidence } from "./photos.js";
import {
  cellValue,
  isFilled,
  toScalar,
  type ReportRow,
  type SessionResult,
} from "./values.js";

/** Collaborators shared by every session of a run. */
export interface AggregatorDeps {
  store: RecordStoreGateway;
  geolocation: GeolocationClient;
  photos: PhotoDecoder;
  checksum: (path: string) => Promise<string>;
  diagnostics: Diagnostics;
  now: () => Date;
  exifTags: ExifTagMap;
}

export interface AggregateContext extends AggregatorDeps {
  config: RunConfig;
  schema: ReportSchema;
  /** Corpus codes of the project's input prompts; empty disables inputs. */
  inputCorpusCodes: ReadonlySet<string>;
}

const GEO_COLUMNS: ReadonlyArray<readonly [string, keyof GeoMeta]> = [
  ["Country", "country"],
  ["Country Code", "countryCode"],
  ["Region", "region"],
  ["Region Name", "regionName"],
];

function sessionDate(created: string): Date | string {
  const parsed = parseISO(created);
  return isValid(parsed) ? parsed : created;
}

function identityColumns(
  session: SessionRecord,
  identity: PinIdentity | undefined,
): ReportRow {
  return {
    "Directory Name": session.name,
    Pin: identity?.pin ?? null,
    Email: identity?.email ?? null,
  };
}

/** First non-empty value of each key across the prompts, in order. */
export function applyPromptAttributes(
  row: ReportRow,
  prompts: readonly PromptRecord[],
  keys: readonly string[],
): void {
  if (keys.length === 0) return;
  for (const prompt of prompts) {
    if (!prompt.attributes) continue;
    for (const key of keys) {
      if (isFilled(cellValue(row, key))) continue;
      row[key] = toScalar(prompt.attributes[key]);
    }
    if (keys.every((key) => isFilled(cellValue(row, key)))) break;
  }
}

function deviceIps(deviceInfo: DeviceInfo): string[] | null {
  const ips = deviceInfo["ips"];
  if (!Array.isArray(ips)) return null;
  return ips.map((ip) => String(ip));
}

/**
 * Flatten device attributes into the row and geolocate each distinct IP
 * once. Geo columns list one value per IP, "N/A" where a lookup failed.
 */
export async function applyDeviceInfo(
  row: ReportRow,
  deviceInfo: DeviceInfo,
  geolocation: GeolocationClient,
): Promise<void> {
  for (const [key, value] of Object.entries(deviceInfo)) {
    row[key] = Array.isArray(value)
      ? value.map((v) => String(v)).join(",")
      : toScalar(value);
  }

  const ips = deviceIps(deviceInfo);
  if (!ips) return;

  const meta = new Map<string, GeoMeta | null>();
  for (const ip of ips) {
    if (!meta.has(ip)) meta.set(ip, await geolocation.lookup(ip));
  }

  row["Device IP"] = ips.join(",");
  for (const [column, field] of GEO_COLUMNS) {
    row[column] = ips.map((ip) => meta.get(ip)?.[field] ?? "N/A").join(",");
  }
}

/** Recompute one session from the record store. */
export async function aggregateSession(
  session: SessionRecord,
  ctx: AggregateContext,
): Promise<SessionResult> {
  const { config, schema, store } = ctx;
  const items = store.listItems(session.id);

  const stats = collectItemStatistics(session, items, store, config, schema);
  const identity = store.getPinIdentity(session.pinId);

  const row: ReportRow = {
    ...identityColumns(session, identity),
    "Total items": stats.counts.total,
    "Recorded items": stats.counts.recorded,
    "Skipped items": stats.counts.skipped,
    "Rejected items": stats.rejected,
    Duration: sessionDuration(session, items, store),
    Date: sessionDate(session.created),
    Completed: session.completed,
    Abandoned: session.abandoned,
  };

  applyPromptAttributes(row, store.listPrompts(session.id), config.promptAttributes);

  if (config.medianStats && config.statSchema) {
    row[MISSING_STATS_HEADER] = stats.missingStats;
    for (const header of schema.statValueHeaders) {
      row[header] = medianOfSamples(
        header,
        stats.samples.get(header) ?? [],
        ctx.diagnostics,
      );
    }
  }

  if (session.deviceInfo) {
    await applyDeviceInfo(row, session.deviceInfo, ctx.geolocation);
  }

  if (config.demographics) {
    applyDemographics(row, config.demographics, store, ctx.now());
  }

  if (config.inputs && ctx.inputCorpusCodes.size > 0) {
    await applyInputs(row, items, ctx.inputCorpusCodes, ctx.diagnostics);
    applyLanguageNames(row, config.languageColumns);
  }

  if (config.scriptCategories.length > 0) {
    applyScriptCategories(
      row,
      config.scriptCategories,
      parseScriptNum(identity?.scriptNum),
    );
  }

  applySubstitutions(row, config.substitutions);

  if (config.countryFormat) applyCountryFormat(row, config.countryFormat);

  await applyPhotoEvidence(row, items, {
    photos: ctx.photos,
    checksum: ctx.checksum,
    exifTags: ctx.exifTags,
    photoPrompts: config.photoPrompts,
  });

  return { sessionRow: row, statRows: stats.statRows };
}
