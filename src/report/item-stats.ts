/**
 * Item statistics for one session: counts, stat-document validation and
 * the samples behind the median columns.
 */

import { basename } from "node:path";
import type { Diagnostics } from "../diagnostics.js";
import type { RunConfig } from "../config/run-config.js";
import { isRecord, nestedValue } from "../json.js";
import {
  RECORDED_PROMPT_TYPES,
  type ItemCounts,
  type ItemRecord,
  type RecordStoreGateway,
  type SessionRecord,
} from "../records/index.js";
import type { ReportSchema } from "./headers.js";
import { toScalar, type ReportRow } from "./values.js";

export interface ItemStatistics {
  counts: ItemCounts;
  rejected: number;
  /** In-scope items with no stat document. */
  missingStats: number;
  /** Stat value header → values sampled across items (median mode only). */
  samples: Map<string, unknown[]>;
  statRows: ReportRow[];
}

/** Prompt types whose stat documents carry a nested duration. */
const TIMED_PROMPT_TYPES: readonly string[] = ["video", "image"];

/**
 * Read one stat value header from a stat document.
 *
 * Recordings keep their values at the top level. Other prompt types nest
 * them under their own type (`video/width`); video items also answer
 * `audio/<field>` from their nested audio block.
 */
export function statValue(
  document: Record<string, unknown>,
  promptType: string,
  header: string,
): unknown {
  if (promptType === "recording") return document[header];
  const slash = header.indexOf("/");
  if (slash < 0) return undefined;
  const outer = header.slice(0, slash);
  const inner = header.slice(slash + 1);
  if (outer === promptType || (outer === "audio" && promptType === "video")) {
    return nestedValue(document, outer, inner);
  }
  return undefined;
}

function inStatScope(item: ItemRecord): boolean {
  return RECORDED_PROMPT_TYPES.includes(item.promptType) && !item.skipped;
}

export function collectItemStatistics(
  session: SessionRecord,
  items: readonly ItemRecord[],
  store: RecordStoreGateway,
  config: RunConfig,
  schema: ReportSchema,
): ItemStatistics {
  const stats: ItemStatistics = {
    counts: store.itemCounts(session.id),
    rejected: 0,
    missingStats: 0,
    samples: new Map(),
    statRows: [],
  };
  const statSchema = config.statSchema;
  if (!statSchema) return stats;

  for (const item of items) {
    if (!inStatScope(item)) continue;
    if (config.excludeCorpusCodes.has(item.corpusCode)) continue;

    const stat = store.latestStat(item.path);
    if (!stat) {
      stats.missingStats += 1;
      continue;
    }

    const reasons = statSchema.validator.validate(stat.document);
    if (reasons.length === 0 && !config.medianStats) continue;

    const statRow: ReportRow = {
      Session: session.name,
      File: basename(item.path),
      Reason: reasons.join(","),
    };
    for (const header of schema.statValueHeaders) {
      const value = statValue(stat.document, item.promptType, header);
      if (value === null || value === undefined) continue;
      statRow[header] = toScalar(value);
      if (config.medianStats) {
        const sampled = stats.samples.get(header);
        if (sampled) sampled.push(value);
        else stats.samples.set(header, [value]);
      }
    }

    if (reasons.length > 0) {
      stats.rejected += 1;
      stats.statRows.push(statRow);
    }
  }
  return stats;
}

/**
 * Recorded duration, else the sum of the nested stat durations of the
 * session's video and image items, converted from milliseconds.
 */
export function sessionDuration(
  session: SessionRecord,
  items: readonly ItemRecord[],
  store: RecordStoreGateway,
): number {
  if (session.duration !== null) return session.duration;
  let total = 0;
  for (const item of items) {
    if (!TIMED_PROMPT_TYPES.includes(item.promptType)) continue;
    const stat = store.latestStat(item.path);
    if (!stat) continue;
    const block = stat.document[item.promptType];
    const duration = isRecord(block) ? block["duration"] : undefined;
    if (typeof duration === "number" && Number.isFinite(duration)) {
      total += duration / 1000;
    }
  }
  return total;
}

// ---------------------------------------------------------------------------
// Median columns
// ---------------------------------------------------------------------------

const NON_NUMERIC_SENTINELS: ReadonlySet<string> = new Set(["NaN", "Infinity"]);

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? 0) + upper) / 2;
}

/**
 * Median of the numeric samples of one header. "NaN" and "Infinity" strings
 * are skipped; anything else non-numeric is reported and skipped.
 */
export function medianOfSamples(
  header: string,
  samples: readonly unknown[],
  diagnostics: Diagnostics,
): number {
  const numbers: number[] = [];
  for (const sample of samples) {
    if (typeof sample === "number") {
      numbers.push(sample);
    } else if (typeof sample === "string" && NON_NUMERIC_SENTINELS.has(sample)) {
      continue;
    } else {
      diagnostics.warn(`${String(sample)} unrecognised output of stats for ${header}`);
    }
  }
  return median(numbers);
}
