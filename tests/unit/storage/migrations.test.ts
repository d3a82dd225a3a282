/**
 * Unit tests for schema initialization
 */

import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  MigrationError,
  SCHEMA_VERSION,
  checkSchemaVersion,
  migrateToLatest,
  verifySchema,
} from '../../../src/services/storage/migrations/index.js';

describe('migrations', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('reports version 0 for an empty database', () => {
    expect(checkSchemaVersion(db)).toBe(0);
    expect(verifySchema(db).valid).toBe(false);
  });

  it('creates every table and stamps the version', () => {
    migrateToLatest(db);
    expect(checkSchemaVersion(db)).toBe(SCHEMA_VERSION);
    expect(verifySchema(db)).toEqual({ valid: true, missingTables: [] });
  });

  it('is idempotent', () => {
    migrateToLatest(db);
    migrateToLatest(db);
    expect(checkSchemaVersion(db)).toBe(SCHEMA_VERSION);
  });

  it('refuses a database from a newer release', () => {
    migrateToLatest(db);
    db.prepare('UPDATE schema_version SET version = ? WHERE id = 1').run(SCHEMA_VERSION + 1);

    expect(() => migrateToLatest(db)).toThrow(MigrationError);
  });

  it('enforces the domain check constraint', () => {
    migrateToLatest(db);
    expect(() =>
      db
        .prepare("INSERT INTO jobs (id, title, domain, page_count, created_at) VALUES ('j', '', 'pet', 1, 'now')")
        .run()
    ).toThrow(/CHECK constraint failed/);
  });
});
