/**
 * Schema initialization for the job store (better-sqlite3, WAL mode).
 *
 * @module migrations
 */

export { MigrationError } from './types.js';

export {
  configurePragmas,
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
  verifySchema,
} from './operations.js';

export { SCHEMA_VERSION } from './schema-definitions.js';
