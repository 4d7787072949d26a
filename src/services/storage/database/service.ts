/**
 * DatabaseService class for all metadata operations
 *
 * Wraps the documents and extraction_jobs operations around one
 * better-sqlite3 connection. Uses prepared statements throughout.
 */

import Database from 'better-sqlite3';
import type { Document, ExtractionJob, RegisterDocumentInput } from '../../../models/document.js';
import type {
  DatabaseCounts,
  ListDocumentsOptions,
  OpenJobRecord,
  StatusExpectation,
  StatusUpdate,
} from './types.js';
import { createDatabase, openDatabase, databaseExists } from './static-operations.js';
import { getCounts } from './stats-operations.js';
import * as docOps from './document-operations.js';
import * as jobOps from './job-operations.js';

export class DatabaseService {
  private db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(db: Database.Database, name: string, path: string) {
    this.db = db;
    this.name = name;
    this.path = path;
  }

  static create(name: string, storagePath?: string): DatabaseService {
    const result = createDatabase(name, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static open(name: string, storagePath?: string): DatabaseService {
    const result = openDatabase(name, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  /**
   * Open the named database, creating it on first use
   */
  static openOrCreate(name: string, storagePath?: string): DatabaseService {
    return databaseExists(name, storagePath)
      ? DatabaseService.open(name, storagePath)
      : DatabaseService.create(name, storagePath);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  /**
   * Run fn in a write transaction. IMMEDIATE takes the write lock up front,
   * so a read-check-write sequence cannot interleave with another connection.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  getCounts(): DatabaseCounts {
    return getCounts(this.db);
  }

  // ==================== DOCUMENT OPERATIONS ====================

  insertDocument(input: RegisterDocumentInput & { id: string }, now: string): Document {
    return docOps.insertDocument(this.db, input, now);
  }

  getDocument(id: string): Document | null {
    return docOps.getDocument(this.db, id);
  }

  getDocumentByHash(fileHash: string): Document | null {
    return docOps.getDocumentByHash(this.db, fileHash);
  }

  listDocuments(options?: ListDocumentsOptions): Document[] {
    return docOps.listDocuments(this.db, options);
  }

  compareAndSetStatus(id: string, expected: StatusExpectation, next: StatusUpdate, now: string): boolean {
    return docOps.compareAndSetStatus(this.db, id, expected, next, now);
  }

  // ==================== JOB OPERATIONS ====================

  insertJob(id: string, documentId: string, now: string): ExtractionJob {
    return jobOps.insertJob(this.db, id, documentId, now);
  }

  getJob(id: string): ExtractionJob | null {
    return jobOps.getJob(this.db, id);
  }

  getActiveJob(documentId: string): ExtractionJob | null {
    return jobOps.getActiveJob(this.db, documentId);
  }

  listJobs(documentId: string): ExtractionJob[] {
    return jobOps.listJobs(this.db, documentId);
  }

  getLatestJob(documentId: string): ExtractionJob | null {
    return jobOps.getLatestJob(this.db, documentId);
  }

  completeJob(id: string, now: string): boolean {
    return jobOps.completeJob(this.db, id, now);
  }

  failJob(id: string, message: string, now: string): boolean {
    return jobOps.failJob(this.db, id, message, now);
  }

  recordAttempt(id: string, message: string, now: string): boolean {
    return jobOps.recordAttempt(this.db, id, message, now);
  }

  touchJob(id: string, now: string): boolean {
    return jobOps.touchJob(this.db, id, now);
  }

  findOpenJobsBefore(cutoff: string): OpenJobRecord[] {
    return jobOps.findOpenJobsBefore(this.db, cutoff);
  }
}
