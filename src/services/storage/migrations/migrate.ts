/**
 * Database migration operations
 *
 * initializeDatabase, migrateToLatest, checkSchemaVersion and
 * getCurrentSchemaVersion.
 *
 * @module migrations/migrate
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  configurePragmas,
  createIndexes,
  createTables,
  initializeSchemaVersion,
} from './schema-helpers.js';

/**
 * Current schema version of the database, or 0 if not initialized
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`)
      .get();
    if (!tableExists) {
      return 0;
    }

    const row = db.prepare('SELECT version FROM schema_version WHERE id = ?').get(1) as
      | { version: number }
      | undefined;
    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize the database with all tables and indexes. Idempotent.
 *
 * @throws MigrationError if any operation fails
 */
export function initializeDatabase(db: Database.Database): void {
  // Pragmas cannot run inside a transaction
  configurePragmas(db);

  // Version is stamped last so a crash mid-init leaves version 0
  db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeSchemaVersion(db);
  })();
}

/**
 * Bring an existing database to SCHEMA_VERSION
 *
 * @throws MigrationError when the file was written by a newer release
 */
export function migrateToLatest(db: Database.Database): void {
  const current = checkSchemaVersion(db);

  if (current === SCHEMA_VERSION) {
    return;
  }
  if (current > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version ${current} is newer than supported version ${SCHEMA_VERSION}`,
      'version_check',
      'schema_version'
    );
  }

  console.error(`[Migrations] Initializing schema (version ${current} -> ${SCHEMA_VERSION})`);
  initializeDatabase(db);
}
