/**
 * Schema initialization and version checks
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  CREATE_INDEXES,
  CREATE_SCHEMA_VERSION_TABLE,
  DATABASE_PRAGMAS,
  REQUIRED_TABLES,
  SCHEMA_VERSION,
  TABLE_DEFINITIONS,
} from './schema-definitions.js';

/**
 * Pragmas must run outside any transaction.
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new MigrationError(`Failed to set pragma: ${pragma}`, 'pragma', undefined, error);
    }
  }
}

/**
 * @returns 0 when the schema_version table does not exist yet
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const table = db
      .prepare<[], { name: string }>(
        `SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`
      )
      .get();
    if (!table) return 0;

    const row = db
      .prepare<[number], { version: number }>('SELECT version FROM schema_version WHERE id = ?')
      .get(1);
    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Create every table and index, then stamp the version. Idempotent.
 * The version is written last inside the transaction, so a crash midway
 * leaves version 0 and the next open re-initializes.
 */
export function initializeDatabase(db: Database.Database): void {
  configurePragmas(db);

  const init = db.transaction(() => {
    for (const table of TABLE_DEFINITIONS) {
      try {
        db.exec(table.sql);
      } catch (error) {
        throw new MigrationError(`Failed to create table: ${table.name}`, 'create_table', table.name, error);
      }
    }

    for (const indexSql of CREATE_INDEXES) {
      try {
        db.exec(indexSql);
      } catch (error) {
        const match = /CREATE INDEX IF NOT EXISTS (\w+)/.exec(indexSql);
        throw new MigrationError(
          `Failed to create index: ${match ? match[1] : 'unknown'}`,
          'create_index',
          match?.[1],
          error
        );
      }
    }

    try {
      db.exec(CREATE_SCHEMA_VERSION_TABLE);
      const now = new Date().toISOString();
      db.prepare(
        `INSERT INTO schema_version (id, version, created_at, updated_at)
         VALUES (1, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
      ).run(SCHEMA_VERSION, now, now);
    } catch (error) {
      throw new MigrationError('Failed to stamp schema version', 'create_table', 'schema_version', error);
    }
  });

  init();
}

/**
 * Bring a database to SCHEMA_VERSION. Version 1 is the first schema, so the
 * only upgrade path today is a fresh initialization.
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${currentVersion}) is newer than supported version (${SCHEMA_VERSION}). ` +
        'Please update the application.',
      'version_check'
    );
  }

  configurePragmas(db);
}

/**
 * Names of required tables that are absent.
 */
export function verifySchema(db: Database.Database): { valid: boolean; missingTables: string[] } {
  const rows = db
    .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table'`)
    .all();
  const present = new Set(rows.map((r) => r.name));
  const missingTables = REQUIRED_TABLES.filter((t) => !present.has(t));
  return { valid: missingTables.length === 0, missingTables };
}
