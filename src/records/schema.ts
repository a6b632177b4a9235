/**
 * Record store tables and the typed records read from them.
 *
 * The collection app and the stat pipeline own these tables; the report
 * only reads them. JSON-valued columns (`attributes`, `device_info`,
 * `inputs`, `json`) hold serialized objects.
 */

// ---------------------------------------------------------------------------
// Domain records
// ---------------------------------------------------------------------------

export interface ProjectRecord {
  id: number;
  number: string;
  name: string;
  description: string;
  langCode: string;
  docsPath: string;
}

/** Device attributes reported by the app. List values hold one entry per upload. */
export type DeviceInfo = Record<string, unknown>;

export interface SessionRecord {
  id: number;
  projectId: number;
  /** Directory name; the session's identity across runs. */
  name: string;
  pinId: number;
  /** ISO 8601 creation timestamp. */
  created: string;
  completed: boolean;
  abandoned: boolean;
  duration: number | null;
  deviceInfo: DeviceInfo | null;
}

export interface ItemRecord {
  id: number;
  sessionId: number;
  path: string;
  promptType: string;
  corpusCode: string;
  skipped: boolean;
  attributes: Record<string, unknown>;
  created: string;
}

export interface PromptRecord {
  id: number;
  sessionId: number;
  position: number;
  corpusCode: string;
  promptType: string;
  attributes: Record<string, unknown> | null;
}

export interface StatRecord {
  id: number;
  path: string;
  created: string;
  document: Record<string, unknown>;
}

export interface PinIdentity {
  pin: string;
  email: string | null;
  scriptNum: string | null;
}

export interface DemographicUser {
  id: number;
  email: string | null;
  country: string | null;
  state: string | null;
  city: string | null;
}

export interface InputPromptDefinition {
  corpusCode: string;
  inputs: Array<{ name: string }>;
}

export interface ItemCounts {
  total: number;
  skipped: number;
  recorded: number;
}

/** Prompt types whose items count as recorded evidence. */
export const RECORDED_PROMPT_TYPES: readonly string[] = [
  "recording",
  "video",
  "image",
];

// ---------------------------------------------------------------------------
// DDL
// ---------------------------------------------------------------------------

export const RECORD_STORE_SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
  id     INTEGER PRIMARY KEY,
  email  TEXT
);

CREATE TABLE IF NOT EXISTS scripts (
  id          INTEGER PRIMARY KEY,
  script_num  TEXT
);

CREATE TABLE IF NOT EXISTS pins (
  id         INTEGER PRIMARY KEY,
  pin        TEXT NOT NULL,
  user_id    INTEGER NOT NULL REFERENCES users(id),
  script_id  INTEGER REFERENCES scripts(id)
);

CREATE TABLE IF NOT EXISTS projects (
  id           INTEGER PRIMARY KEY,
  number       TEXT NOT NULL,
  name         TEXT NOT NULL,
  description  TEXT NOT NULL DEFAULT '',
  lang_code    TEXT NOT NULL DEFAULT '',
  docs_path    TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sessions (
  id           INTEGER PRIMARY KEY,
  project_id   INTEGER NOT NULL REFERENCES projects(id),
  name         TEXT    NOT NULL UNIQUE,
  pin_id       INTEGER NOT NULL REFERENCES pins(id),
  created      TEXT    NOT NULL,
  completed    INTEGER NOT NULL DEFAULT 0,
  abandoned    INTEGER NOT NULL DEFAULT 0,
  duration     REAL,
  device_info  TEXT
);

CREATE TABLE IF NOT EXISTS prompts (
  id           INTEGER PRIMARY KEY,
  session_id   INTEGER NOT NULL REFERENCES sessions(id),
  position     INTEGER NOT NULL,
  corpus_code  TEXT    NOT NULL,
  prompt_type  TEXT    NOT NULL,
  attributes   TEXT
);

CREATE TABLE IF NOT EXISTS files (
  id          INTEGER PRIMARY KEY,
  session_id  INTEGER NOT NULL REFERENCES sessions(id),
  path        TEXT    NOT NULL,
  attributes  TEXT    NOT NULL DEFAULT '{}',
  created     TEXT    NOT NULL
);

CREATE TABLE IF NOT EXISTS static_prompts (
  id           INTEGER PRIMARY KEY,
  project_id   INTEGER NOT NULL REFERENCES projects(id),
  corpus_code  TEXT    NOT NULL,
  prompt_type  TEXT    NOT NULL,
  inputs       TEXT    NOT NULL DEFAULT '[]'
);

CREATE TABLE IF NOT EXISTS dynamic_prompts (
  id           INTEGER PRIMARY KEY,
  project_id   INTEGER NOT NULL REFERENCES projects(id),
  corpus_code  TEXT    NOT NULL,
  prompt_type  TEXT    NOT NULL,
  inputs       TEXT    NOT NULL DEFAULT '[]'
);

CREATE TABLE IF NOT EXISTS stat_files (
  id    INTEGER PRIMARY KEY,
  path  TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS stats (
  id       INTEGER PRIMARY KEY,
  file_id  INTEGER NOT NULL REFERENCES stat_files(id),
  created  TEXT    NOT NULL,
  json     TEXT    NOT NULL
);

CREATE TABLE IF NOT EXISTS demographic_users (
  id       INTEGER PRIMARY KEY,
  email    TEXT,
  country  TEXT,
  state    TEXT,
  city     TEXT
);

CREATE TABLE IF NOT EXISTS user_attributes (
  user_id       INTEGER NOT NULL REFERENCES demographic_users(id),
  attribute_id  INTEGER NOT NULL,
  value         TEXT,
  PRIMARY KEY (user_id, attribute_id)
);

CREATE INDEX IF NOT EXISTS idx_sessions_project ON sessions(project_id);
CREATE INDEX IF NOT EXISTS idx_files_session ON files(session_id);
CREATE INDEX IF NOT EXISTS idx_prompts_session ON prompts(session_id);
CREATE INDEX IF NOT EXISTS idx_stats_file ON stats(file_id);
`;
