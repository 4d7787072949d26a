/**
 * Schema initialization, versioning and verification
 *
 * @see src/services/storage/migrations
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { join } from 'path';
import {
  checkSchemaVersion,
  getCurrentSchemaVersion,
  initializeDatabase,
  migrateToLatest,
  verifySchema,
  MigrationError,
} from '../../../src/services/storage/migrations/index.js';
import { SCHEMA_VERSION } from '../../../src/services/storage/migrations/schema-definitions.js';
import { cleanupTestDir, createTestDir } from './helpers.js';

describe('migrations', () => {
  let testDir: string;
  let db: Database.Database;

  beforeEach(() => {
    testDir = createTestDir('docextract-migrations-');
    db = new Database(join(testDir, 'schema.db'));
  });

  afterEach(() => {
    db.close();
    cleanupTestDir(testDir);
  });

  it('reports version 0 for an empty database', () => {
    expect(checkSchemaVersion(db)).toBe(0);
    expect(getCurrentSchemaVersion()).toBe(SCHEMA_VERSION);
  });

  it('creates every table and index and stamps the version', () => {
    initializeDatabase(db);

    expect(checkSchemaVersion(db)).toBe(SCHEMA_VERSION);
    expect(verifySchema(db)).toEqual({
      valid: true,
      missingTables: [],
      missingIndexes: [],
      missingColumns: [],
    });
  });

  it('is idempotent', () => {
    initializeDatabase(db);
    initializeDatabase(db);

    const rows = db.prepare('SELECT COUNT(*) AS n FROM schema_version').get() as { n: number };
    expect(rows.n).toBe(1);
  });

  it('enables foreign keys and WAL', () => {
    initializeDatabase(db);

    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
  });

  it('initializes an unversioned database through migrateToLatest', () => {
    migrateToLatest(db);
    expect(checkSchemaVersion(db)).toBe(SCHEMA_VERSION);
  });

  it('refuses a database written by a newer release', () => {
    initializeDatabase(db);
    db.prepare('UPDATE schema_version SET version = ? WHERE id = 1').run(SCHEMA_VERSION + 1);

    expect(() => migrateToLatest(db)).toThrow(MigrationError);
    expect(() => migrateToLatest(db)).toThrow(
      `Database schema version ${SCHEMA_VERSION + 1} is newer than supported version ${SCHEMA_VERSION}`
    );
  });

  it('lists what is missing', () => {
    initializeDatabase(db);
    db.exec('DROP INDEX idx_extraction_jobs_active');

    const result = verifySchema(db);
    expect(result.valid).toBe(false);
    expect(result.missingIndexes).toEqual(['idx_extraction_jobs_active']);
    expect(result.missingTables).toEqual([]);
  });

  it('skips column checks for a missing table', () => {
    initializeDatabase(db);
    db.exec('DROP TABLE extraction_jobs');

    const result = verifySchema(db);
    expect(result.missingTables).toEqual(['extraction_jobs']);
    expect(result.missingColumns).toEqual([]);
  });
});
