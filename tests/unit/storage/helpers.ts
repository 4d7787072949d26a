/**
 * Shared helpers for storage, status and pipeline tests
 */

import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService } from '../../../src/services/storage/database/index.js';
import type { RegisterDocumentInput } from '../../../src/models/document.js';

export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTestDir(dir: string): void {
  if (dir && existsSync(dir)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function createFreshDatabase(dir: string, prefix = 'test'): DatabaseService {
  return DatabaseService.create(`${prefix}-${uuidv4().slice(0, 8)}`, dir);
}

export function safeCloseDatabase(db: DatabaseService | undefined): void {
  if (!db) return;
  try {
    db.close();
  } catch (error) {
    console.error('[test] close failed:', error instanceof Error ? error.message : String(error));
  }
}

/**
 * Registration input for a PDF invoice; id defaults to a fresh UUID
 */
export function createTestDocumentInput(
  overrides: Partial<RegisterDocumentInput> = {}
): RegisterDocumentInput & { id: string } {
  const id = overrides.id ?? uuidv4();
  return {
    filename: 'invoice-0001.pdf',
    storage_locator: `${id}/raw`,
    mime_type: 'application/pdf',
    file_size: 2048,
    file_hash: `sha256:${'a'.repeat(64)}`,
    document_type: 'invoice',
    ...overrides,
    id,
  };
}

/**
 * Deterministic clock that advances only when told to
 */
export class TestClock {
  private current: number;

  constructor(start = '2026-01-15T09:00:00.000Z') {
    this.current = Date.parse(start);
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  iso(): string {
    return new Date(this.current).toISOString();
  }
}

export { DatabaseService };
