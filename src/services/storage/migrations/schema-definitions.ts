/**
 * SQL Schema Definitions for the protocol job store
 *
 * One SQLite file holds every job. Artifacts are stored as JSON documents
 * that carry their own schema_version.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA busy_timeout = 30000',
] as const;

export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

export const CREATE_JOBS_TABLE = `
CREATE TABLE IF NOT EXISTS jobs (
  id TEXT PRIMARY KEY NOT NULL,
  title TEXT NOT NULL DEFAULT '',
  domain TEXT NOT NULL CHECK (domain IN ('ct', 'mri', 'auto')),
  page_count INTEGER NOT NULL,
  created_at TEXT NOT NULL
)
`;

export const CREATE_PAGES_TABLE = `
CREATE TABLE IF NOT EXISTS pages (
  job_id TEXT NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
  page_index INTEGER NOT NULL CHECK (page_index >= 0),
  text TEXT NOT NULL,
  PRIMARY KEY (job_id, page_index)
)
`;

export const CREATE_SEED_PAGES_TABLE = `
CREATE TABLE IF NOT EXISTS seed_pages (
  job_id TEXT NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
  page_index INTEGER NOT NULL,
  score REAL NOT NULL DEFAULT 0,
  labels_json TEXT NOT NULL DEFAULT '[]',
  modalities_json TEXT NOT NULL DEFAULT '[]',
  snippets_json TEXT NOT NULL DEFAULT '[]',
  PRIMARY KEY (job_id, page_index)
)
`;

/** seq preserves append order within a pass */
export const CREATE_CANDIDATES_TABLE = `
CREATE TABLE IF NOT EXISTS candidates (
  job_id TEXT NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
  seq INTEGER NOT NULL,
  field TEXT NOT NULL,
  page INTEGER NOT NULL,
  raw_span TEXT NOT NULL,
  value_json TEXT NOT NULL,
  units TEXT NOT NULL DEFAULT '',
  evidence TEXT NOT NULL,
  confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
  notes TEXT NOT NULL DEFAULT '',
  PRIMARY KEY (job_id, seq)
)
`;

export const CREATE_ARTIFACTS_TABLE = `
CREATE TABLE IF NOT EXISTS artifacts (
  job_id TEXT NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
  kind TEXT NOT NULL CHECK (kind IN ('winners', 'gap_report', 'doc_flags')),
  body_json TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  PRIMARY KEY (job_id, kind)
)
`;

export const CREATE_JOB_STATUS_TABLE = `
CREATE TABLE IF NOT EXISTS job_status (
  job_id TEXT PRIMARY KEY NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
  state TEXT NOT NULL,
  step TEXT NOT NULL,
  body_json TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

export const CREATE_STATUS_TRANSITIONS_TABLE = `
CREATE TABLE IF NOT EXISTS status_transitions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  job_id TEXT NOT NULL REFERENCES jobs(id) ON DELETE CASCADE,
  state TEXT NOT NULL,
  step TEXT NOT NULL,
  update_json TEXT NOT NULL,
  created_at TEXT NOT NULL
)
`;

/** Tables in dependency order */
export const TABLE_DEFINITIONS: ReadonlyArray<{ name: string; sql: string }> = [
  { name: 'jobs', sql: CREATE_JOBS_TABLE },
  { name: 'pages', sql: CREATE_PAGES_TABLE },
  { name: 'seed_pages', sql: CREATE_SEED_PAGES_TABLE },
  { name: 'candidates', sql: CREATE_CANDIDATES_TABLE },
  { name: 'artifacts', sql: CREATE_ARTIFACTS_TABLE },
  { name: 'job_status', sql: CREATE_JOB_STATUS_TABLE },
  { name: 'status_transitions', sql: CREATE_STATUS_TRANSITIONS_TABLE },
];

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_candidates_job_field ON candidates(job_id, field)',
  'CREATE INDEX IF NOT EXISTS idx_status_transitions_job ON status_transitions(job_id, id)',
  'CREATE INDEX IF NOT EXISTS idx_jobs_created_at ON jobs(created_at)',
] as const;

export const REQUIRED_TABLES = ['schema_version', ...TABLE_DEFINITIONS.map((t) => t.name)];
