/**
 * SQLite-backed, read-only gateway over the collection records.
 *
 * Reads projects, sessions, items (`files`), prompts, stats, pins and
 * demographic users. Queries return typed records or `undefined` / empty
 * lists; a half-populated record is never returned.
 *
 * Stat documents are keyed by the storage path the stat pipeline saw. When
 * that differs from the path the app recorded (a different mount point), the
 * `statPathRewrite` option maps one to the other before the lookup.
 */

import Database from "better-sqlite3";
import { isRecord, parseJsonObject } from "../json.js";
import {
  RECORD_STORE_SCHEMA,
  RECORDED_PROMPT_TYPES,
  type DemographicUser,
  type InputPromptDefinition,
  type ItemCounts,
  type ItemRecord,
  type PinIdentity,
  type ProjectRecord,
  type PromptRecord,
  type SessionRecord,
  type StatRecord,
} from "./schema.js";

// ---------------------------------------------------------------------------
// Minimal statement interface (same reasoning as the conditional generics in
// @types/better-sqlite3: keep call-sites type-safe without fighting them).
// ---------------------------------------------------------------------------

interface Stmt {
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

// ---------------------------------------------------------------------------
// Gateway contract
// ---------------------------------------------------------------------------

export interface RecordStoreGateway {
  getProject(projectId: number): ProjectRecord | undefined;
  listSessions(projectId: number): SessionRecord[];
  countItems(sessionId: number): number;
  itemCounts(sessionId: number): ItemCounts;
  /** Items of a session, oldest first. */
  listItems(sessionId: number): ItemRecord[];
  /** Prompts of a session in presentation order. */
  listPrompts(sessionId: number): PromptRecord[];
  latestStat(itemPath: string): StatRecord | undefined;
  getPinIdentity(pinId: number): PinIdentity | undefined;
  getDemographicUser(userId: number): DemographicUser | undefined;
  /** `undefined` when the user has no value for the attribute. */
  getUserAttribute(userId: number, attributeId: number): string | null | undefined;
  /** Input prompt definitions: static prompts, else dynamic ones. */
  listInputPrompts(projectId: number): InputPromptDefinition[];
  /** Distinct corpus codes of the project's image items. */
  listImageCorpusCodes(projectId: number): string[];
}

export interface RecordStoreOptions {
  /** Open without write access; the file must exist. */
  readonly?: boolean;
  statPathRewrite?: { from: string; to: string };
}

// ---------------------------------------------------------------------------
// Internal row shapes (match SQLite column names)
// ---------------------------------------------------------------------------

interface ProjectRow {
  id: number;
  number: string;
  name: string;
  description: string;
  lang_code: string;
  docs_path: string;
}

interface SessionRow {
  id: number;
  project_id: number;
  name: string;
  pin_id: number;
  created: string;
  completed: number;
  abandoned: number;
  duration: number | null;
  device_info: string | null;
}

interface FileRow {
  id: number;
  session_id: number;
  path: string;
  attributes: string;
  created: string;
}

interface PromptRow {
  id: number;
  session_id: number;
  position: number;
  corpus_code: string;
  prompt_type: string;
  attributes: string | null;
}

interface StatRow {
  id: number;
  path: string;
  created: string;
  json: string;
}

interface PinRow {
  pin: string;
  email: string | null;
  script_num: string | null;
}

interface CountRow {
  total: number;
  skipped: number | null;
  recorded: number | null;
}

interface InputPromptRow {
  corpus_code: string;
  inputs: string;
}

// ---------------------------------------------------------------------------
// Row ↔ domain conversion
// ---------------------------------------------------------------------------

function attributeString(
  attributes: Record<string, unknown>,
  key: string,
): string {
  const value = attributes[key];
  return typeof value === "string" ? value : "";
}

function rowToSession(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    projectId: row.project_id,
    name: row.name,
    pinId: row.pin_id,
    created: row.created,
    completed: row.completed !== 0,
    abandoned: row.abandoned !== 0,
    duration: row.duration,
    deviceInfo: parseJsonObject(row.device_info),
  };
}

function rowToItem(row: FileRow): ItemRecord {
  const attributes = parseJsonObject(row.attributes) ?? {};
  return {
    id: row.id,
    sessionId: row.session_id,
    path: row.path,
    promptType: attributeString(attributes, "prompttype"),
    corpusCode: attributeString(attributes, "corpuscode"),
    skipped: attributeString(attributes, "skipped") === "true",
    attributes,
    created: row.created,
  };
}

function rowToPrompt(row: PromptRow): PromptRecord {
  return {
    id: row.id,
    sessionId: row.session_id,
    position: row.position,
    corpusCode: row.corpus_code,
    promptType: row.prompt_type,
    attributes: parseJsonObject(row.attributes),
  };
}

function parseInputs(text: string): Array<{ name: string }> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  const inputs: Array<{ name: string }> = [];
  for (const entry of parsed) {
    if (isRecord(entry) && typeof entry["name"] === "string") {
      inputs.push({ name: entry["name"] });
    }
  }
  return inputs;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

const PROMPT_TYPE_PLACEHOLDERS = RECORDED_PROMPT_TYPES.map(() => "?").join(", ");

export class RecordStore implements RecordStoreGateway {
  private readonly db: InstanceType<typeof Database>;
  private readonly statPathRewrite: { from: string; to: string } | undefined;

  private readonly stmtProject: Stmt;
  private readonly stmtSessions: Stmt;
  private readonly stmtCountItems: Stmt;
  private readonly stmtItemCounts: Stmt;
  private readonly stmtItems: Stmt;
  private readonly stmtPrompts: Stmt;
  private readonly stmtLatestStat: Stmt;
  private readonly stmtPin: Stmt;
  private readonly stmtDemographicUser: Stmt;
  private readonly stmtUserAttribute: Stmt;
  private readonly stmtStaticInputs: Stmt;
  private readonly stmtDynamicInputs: Stmt;
  private readonly stmtImageCodes: Stmt;

  constructor(dbPath: string, options: RecordStoreOptions = {}) {
    this.db = new Database(dbPath, {
      readonly: options.readonly ?? false,
      fileMustExist: options.readonly ?? false,
    });
    if (!options.readonly) {
      this.db.exec(RECORD_STORE_SCHEMA);
    }
    this.statPathRewrite = options.statPathRewrite;

    this.stmtProject = this.db.prepare(
      "SELECT * FROM projects WHERE id = ?",
    ) as Stmt;

    this.stmtSessions = this.db.prepare(
      "SELECT * FROM sessions WHERE project_id = ? ORDER BY id ASC",
    ) as Stmt;

    this.stmtCountItems = this.db.prepare(
      "SELECT COUNT(1) AS total FROM files WHERE session_id = ?",
    ) as Stmt;

    this.stmtItemCounts = this.db.prepare(
      `SELECT
         COUNT(1) AS total,
         SUM(CASE WHEN json_extract(attributes, '$.skipped') = 'true'
             THEN 1 ELSE 0 END) AS skipped,
         SUM(CASE WHEN json_extract(attributes, '$.prompttype') IN (${PROMPT_TYPE_PLACEHOLDERS})
                   AND json_extract(attributes, '$.skipped') = 'false'
             THEN 1 ELSE 0 END) AS recorded
       FROM files WHERE session_id = ?`,
    ) as Stmt;

    this.stmtItems = this.db.prepare(
      "SELECT * FROM files WHERE session_id = ? ORDER BY created ASC, id ASC",
    ) as Stmt;

    this.stmtPrompts = this.db.prepare(
      "SELECT * FROM prompts WHERE session_id = ? ORDER BY position ASC, id ASC",
    ) as Stmt;

    this.stmtLatestStat = this.db.prepare(
      `SELECT stats.id AS id, stat_files.path AS path, stats.created AS created, stats.json AS json
       FROM stats JOIN stat_files ON stat_files.id = stats.file_id
       WHERE stat_files.path = ?
       ORDER BY stats.created DESC, stats.id DESC
       LIMIT 1`,
    ) as Stmt;

    this.stmtPin = this.db.prepare(
      `SELECT pins.pin AS pin, users.email AS email, scripts.script_num AS script_num
       FROM pins
       JOIN users ON users.id = pins.user_id
       LEFT JOIN scripts ON scripts.id = pins.script_id
       WHERE pins.id = ?`,
    ) as Stmt;

    this.stmtDemographicUser = this.db.prepare(
      "SELECT id, email, country, state, city FROM demographic_users WHERE id = ?",
    ) as Stmt;

    this.stmtUserAttribute = this.db.prepare(
      "SELECT value FROM user_attributes WHERE user_id = ? AND attribute_id = ?",
    ) as Stmt;

    this.stmtStaticInputs = this.db.prepare(
      `SELECT corpus_code, inputs FROM static_prompts
       WHERE project_id = ? AND prompt_type = 'input' ORDER BY id ASC`,
    ) as Stmt;

    this.stmtDynamicInputs = this.db.prepare(
      `SELECT corpus_code, inputs FROM dynamic_prompts
       WHERE project_id = ? AND prompt_type = 'input' ORDER BY id ASC`,
    ) as Stmt;

    this.stmtImageCodes = this.db.prepare(
      `SELECT DISTINCT json_extract(files.attributes, '$.corpuscode') AS corpus_code
       FROM files JOIN sessions ON sessions.id = files.session_id
       WHERE sessions.project_id = ?
         AND json_extract(files.attributes, '$.prompttype') = 'image'
       ORDER BY corpus_code ASC`,
    ) as Stmt;
  }

  // -----------------------------------------------------------------------
  // Projects and sessions
  // -----------------------------------------------------------------------

  getProject(projectId: number): ProjectRecord | undefined {
    const row = this.stmtProject.get(projectId) as ProjectRow | undefined;
    if (!row) return undefined;
    return {
      id: row.id,
      number: row.number,
      name: row.name,
      description: row.description,
      langCode: row.lang_code,
      docsPath: row.docs_path,
    };
  }

  listSessions(projectId: number): SessionRecord[] {
    const rows = this.stmtSessions.all(projectId) as SessionRow[];
    return rows.map(rowToSession);
  }

  // -----------------------------------------------------------------------
  // Items and prompts
  // -----------------------------------------------------------------------

  countItems(sessionId: number): number {
    const row = this.stmtCountItems.get(sessionId) as { total: number };
    return row.total;
  }

  itemCounts(sessionId: number): ItemCounts {
    const row = this.stmtItemCounts.get(
      ...RECORDED_PROMPT_TYPES,
      sessionId,
    ) as CountRow;
    return {
      total: row.total,
      skipped: row.skipped ?? 0,
      recorded: row.recorded ?? 0,
    };
  }

  listItems(sessionId: number): ItemRecord[] {
    const rows = this.stmtItems.all(sessionId) as FileRow[];
    return rows.map(rowToItem);
  }

  listPrompts(sessionId: number): PromptRecord[] {
    const rows = this.stmtPrompts.all(sessionId) as PromptRow[];
    return rows.map(rowToPrompt);
  }

  // -----------------------------------------------------------------------
  // Stats
  // -----------------------------------------------------------------------

  /** The stat path an item path is stored under. */
  statPathFor(itemPath: string): string {
    if (!this.statPathRewrite) return itemPath;
    const { from, to } = this.statPathRewrite;
    return itemPath.split(from).join(to);
  }

  latestStat(itemPath: string): StatRecord | undefined {
    const row = this.stmtLatestStat.get(this.statPathFor(itemPath)) as
      | StatRow
      | undefined;
    if (!row) return undefined;
    const document = parseJsonObject(row.json);
    if (!document) return undefined;
    return { id: row.id, path: row.path, created: row.created, document };
  }

  // -----------------------------------------------------------------------
  // People
  // -----------------------------------------------------------------------

  getPinIdentity(pinId: number): PinIdentity | undefined {
    const row = this.stmtPin.get(pinId) as PinRow | undefined;
    if (!row) return undefined;
    return { pin: row.pin, email: row.email, scriptNum: row.script_num };
  }

  getDemographicUser(userId: number): DemographicUser | undefined {
    const row = this.stmtDemographicUser.get(userId) as
      | DemographicUser
      | undefined;
    return row ? { ...row } : undefined;
  }

  getUserAttribute(
    userId: number,
    attributeId: number,
  ): string | null | undefined {
    const row = this.stmtUserAttribute.get(userId, attributeId) as
      | { value: string | null }
      | undefined;
    return row?.value;
  }

  // -----------------------------------------------------------------------
  // Project-wide lookups used while building the report schema
  // -----------------------------------------------------------------------

  listInputPrompts(projectId: number): InputPromptDefinition[] {
    let rows = this.stmtStaticInputs.all(projectId) as InputPromptRow[];
    if (rows.length === 0) {
      rows = this.stmtDynamicInputs.all(projectId) as InputPromptRow[];
    }
    return rows.map((row) => ({
      corpusCode: row.corpus_code,
      inputs: parseInputs(row.inputs),
    }));
  }

  listImageCorpusCodes(projectId: number): string[] {
    const rows = this.stmtImageCodes.all(projectId) as Array<{
      corpus_code: string | null;
    }>;
    return rows.map((row) => row.corpus_code ?? "");
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  close(): void {
    this.db.close();
  }
}
