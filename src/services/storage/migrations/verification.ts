/**
 * Schema verification
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_COLUMNS, REQUIRED_INDEXES, REQUIRED_TABLES } from './schema-definitions.js';

export interface SchemaVerification {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingColumns: string[];
}

function objectExists(db: Database.Database, type: 'table' | 'index', name: string): boolean {
  return db.prepare('SELECT name FROM sqlite_master WHERE type = ? AND name = ?').get(type, name) !== undefined;
}

/**
 * Verify all required tables, indexes and critical columns exist
 */
export function verifySchema(db: Database.Database): SchemaVerification {
  const missingTables: string[] = REQUIRED_TABLES.filter((name) => !objectExists(db, 'table', name));
  const missingIndexes: string[] = REQUIRED_INDEXES.filter((name) => !objectExists(db, 'index', name));
  const missingColumns: string[] = [];

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (missingTables.includes(table)) continue;
    const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    const present = new Set(columns.map((c) => c.name));
    for (const col of requiredCols) {
      if (!present.has(col)) missingColumns.push(`${table}.${col}`);
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0 && missingColumns.length === 0,
    missingTables,
    missingIndexes,
    missingColumns,
  };
}
