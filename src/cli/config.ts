/**
 * CLI configuration: record store location, upload target and collaborator
 * endpoints.
 *
 * Defaults:
 *   DB:      ~/.collection-report/records.sqlite
 *   Upload:  report:/Data Collection/<project name>
 *
 * Environment overrides:
 *   COLLECTION_REPORT_DB_PATH            path to the SQLite record store
 *   COLLECTION_REPORT_UPLOAD_REMOTE      rclone remote, e.g. "report:"
 *   COLLECTION_REPORT_UPLOAD_DIR         directory under the remote
 *   COLLECTION_REPORT_GEO_ENDPOINT       ip-api compatible lookup endpoint
 *   COLLECTION_REPORT_STAT_PATH_REWRITE  "from=to" applied to stat lookups
 *   COLLECTION_REPORT_WORKERS            worker pool size
 */

import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_WORKERS } from "../config/run-config.js";
import { DEFAULT_GEO_ENDPOINT } from "../evidence/geolocation.js";
import { ReportError } from "../errors.js";

export interface CliConfig {
  dbPath: string;
  uploadRemote: string;
  uploadDir: string;
  geoEndpoint: string;
  statPathRewrite: { from: string; to: string } | undefined;
  workers: number;
}

const DEFAULT_BASE = join(homedir(), ".collection-report");

export function parseStatPathRewrite(
  value: string | undefined,
): { from: string; to: string } | undefined {
  if (value === undefined || value === "") return undefined;
  const eq = value.indexOf("=");
  if (eq <= 0) {
    throw new ReportError(
      `COLLECTION_REPORT_STAT_PATH_REWRITE must look like "from=to", got "${value}"`,
      "CONFIG_INVALID",
      { value },
    );
  }
  return { from: value.slice(0, eq), to: value.slice(eq + 1) };
}

export function parseWorkers(value: string | undefined, source: string): number {
  if (value === undefined || value === "") return DEFAULT_WORKERS;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ReportError(
      `${source} must be a positive integer, got "${value}"`,
      "CONFIG_INVALID",
      { value },
    );
  }
  return n;
}

export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  return {
    dbPath: resolve(
      env["COLLECTION_REPORT_DB_PATH"] ?? join(DEFAULT_BASE, "records.sqlite"),
    ),
    uploadRemote: env["COLLECTION_REPORT_UPLOAD_REMOTE"] ?? "report:",
    uploadDir: env["COLLECTION_REPORT_UPLOAD_DIR"] ?? "/Data Collection",
    geoEndpoint: env["COLLECTION_REPORT_GEO_ENDPOINT"] ?? DEFAULT_GEO_ENDPOINT,
    statPathRewrite: parseStatPathRewrite(
      env["COLLECTION_REPORT_STAT_PATH_REWRITE"],
    ),
    workers: parseWorkers(
      env["COLLECTION_REPORT_WORKERS"],
      "COLLECTION_REPORT_WORKERS",
    ),
  };
}
