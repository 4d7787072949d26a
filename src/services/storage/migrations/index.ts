/**
 * SQLite schema initialization and migrations for the document metadata store
 *
 * @module migrations
 */

export { MigrationError } from './types.js';

export {
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
} from './migrate.js';

export { configurePragmas } from './schema-helpers.js';

export { verifySchema, type SchemaVerification } from './verification.js';
