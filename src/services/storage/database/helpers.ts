/**
 * Helper functions for DatabaseService
 *
 * Name validation, path resolution, and conversion of SQLite constraint
 * failures into DatabaseError codes.
 */

import Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Root for databases and blobs
 */
export const DEFAULT_STORAGE_PATH = process.env.DOCEXTRACT_DATA_PATH ?? join(homedir(), '.docextract');

const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Validate database name format
 */
export function validateName(name: string): void {
  if (!name) {
    throw new DatabaseError('Database name is required', DatabaseErrorCode.INVALID_NAME);
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

export function getDatabasePath(name: string, storagePath?: string): string {
  return join(storagePath ?? DEFAULT_STORAGE_PATH, `${name}.db`);
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Run a statement, converting SQLite constraint failures to DatabaseError.
 *
 * @param context - Error context, e.g. "inserting job for document abc"
 */
export function runWithConstraintCheck(
  stmt: Database.Statement,
  params: unknown[],
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    const code = sqliteCode(error);
    if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
      throw new DatabaseError(
        `Foreign key violation ${context}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    if (code !== undefined && code.startsWith('SQLITE_CONSTRAINT')) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new DatabaseError(
        `Constraint violation ${context}: ${detail}`,
        DatabaseErrorCode.CONSTRAINT_VIOLATION,
        error
      );
    }
    throw error;
  }
}
