export {
  aggregateSession,
  applyDeviceInfo,
  applyPromptAttributes,
  type AggregateContext,
  type AggregatorDeps,
} from "./aggregate.js";

export {
  loadReportCache,
  type CacheEntry,
  type ReportCache,
} from "./cache.js";

export {
  processSession,
  runReport,
  type ReportRun,
  type ReportRunContext,
  type RunSummary,
  type SessionOutcome,
} from "./coordinator.js";

export {
  BASE_SESSION_HEADERS,
  BASE_STAT_HEADERS,
  buildReportSchema,
  photoHeaders,
  UNMAPPED_PHOTO_PROMPT,
  type ReportSchema,
  type SchemaInputs,
} from "./headers.js";

export {
  reconcileSession,
  remapCachedRows,
  type MissReason,
  type ReconcileDecision,
} from "./reconcile.js";

export {
  readReportWorkbook,
  writeReportWorkbook,
  type ReportTables,
} from "./workbook.js";

export type { ReportRow, ReportScalar, SessionResult } from "./values.js";
