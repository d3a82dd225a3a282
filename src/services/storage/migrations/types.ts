/**
 * Error class for schema initialization and migration failures
 *
 * @module migrations/types
 */

export type MigrationOperation = 'pragma' | 'create_table' | 'create_index' | 'query' | 'version_check';

export class MigrationError extends Error {
  readonly operation: MigrationOperation;
  readonly tableName?: string;

  constructor(message: string, operation: MigrationOperation, tableName?: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'MigrationError';
    this.operation = operation;
    this.tableName = tableName;
  }
}
