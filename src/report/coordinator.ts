/**
 * Report run coordinator.
 *
 * Every session of the project is reconciled against the cache and, on a
 * miss, recomputed, on a fixed pool of workers. Workers only return results;
 * the output tables are appended to here, in completion order.
 */

import { ReportError, errorMessage } from "../errors.js";
import type { ProjectRecord, SessionRecord } from "../records/index.js";
import { aggregateSession, type AggregateContext } from "./aggregate.js";
import type { ReportCache } from "./cache.js";
import { applySubstitutions } from "./normalize.js";
import { runPool } from "./pool.js";
import {
  reconcileSession,
  remapCachedRows,
  type ReconcileDecision,
} from "./reconcile.js";
import {
  rowValues,
  sanitizeScalar,
  type ReportScalar,
  type SessionResult,
} from "./values.js";
import type { ReportTables } from "./workbook.js";

export interface ReportRunContext extends AggregateContext {
  cache: ReportCache;
}

export interface RunSummary {
  sessions: number;
  cacheHits: number;
  recomputed: number;
  statRows: number;
}

export interface ReportRun {
  tables: ReportTables;
  summary: RunSummary;
}

export interface SessionOutcome {
  decision: ReconcileDecision;
  result: SessionResult;
}

/** Reconcile one session and produce its rows. */
export async function processSession(
  session: SessionRecord,
  ctx: ReportRunContext,
): Promise<SessionOutcome> {
  const decision = reconcileSession(
    session,
    ctx.cache.get(session.name),
    () => ctx.store.countItems(session.id),
    ctx.config.substitutions,
  );
  if (decision.kind === "hit") {
    const result = remapCachedRows(decision.entry, ctx.schema);
    applySubstitutions(result.sessionRow, ctx.config.substitutions);
    return { decision, result };
  }
  return { decision, result: await aggregateSession(session, ctx) };
}

function sanitizedValues(
  row: SessionResult["sessionRow"],
  headers: readonly string[],
): ReportScalar[] {
  return rowValues(row, headers).map(sanitizeScalar);
}

export async function runReport(
  project: ProjectRecord,
  ctx: ReportRunContext,
): Promise<ReportRun> {
  const sessions = ctx.store.listSessions(project.id);
  const tables: ReportTables = {
    sessionHeaders: ctx.schema.sessionHeaders,
    statHeaders: ctx.schema.statHeaders,
    sessionRows: [],
    statRows: [],
  };
  const summary: RunSummary = {
    sessions: 0,
    cacheHits: 0,
    recomputed: 0,
    statRows: 0,
  };

  const run = async (session: SessionRecord): Promise<SessionOutcome> => {
    try {
      return await processSession(session, ctx);
    } catch (e: unknown) {
      throw new ReportError(
        `Session ${session.name} failed: ${errorMessage(e)}`,
        "SESSION_FAILED",
        { session: session.name },
        { cause: e },
      );
    }
  };

  await runPool(sessions, ctx.config.workers, run, ({ decision, result }) => {
    tables.sessionRows.push(
      sanitizedValues(result.sessionRow, tables.sessionHeaders),
    );
    for (const statRow of result.statRows) {
      tables.statRows.push(sanitizedValues(statRow, tables.statHeaders));
    }
    summary.sessions += 1;
    summary.statRows += result.statRows.length;
    if (decision.kind === "hit") summary.cacheHits += 1;
    else summary.recomputed += 1;
  });

  return { tables, summary };
}
