/**
 * DatabaseService: lifecycle, documents and the job ledger
 *
 * @see src/services/storage/database
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/database/index.js';
import {
  cleanupTestDir,
  createFreshDatabase,
  createTestDir,
  createTestDocumentInput,
  DatabaseService,
  safeCloseDatabase,
} from './helpers.js';

const T0 = '2026-01-15T09:00:00.000Z';
const T1 = '2026-01-15T09:05:00.000Z';
const T2 = '2026-01-15T09:10:00.000Z';

describe('DatabaseService', () => {
  let testDir: string;

  beforeAll(() => {
    testDir = createTestDir('docextract-db-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  describe('lifecycle', () => {
    it('creates, reopens and reports existence', () => {
      const created = DatabaseService.create('lifecycle', testDir);
      expect(created.getName()).toBe('lifecycle');
      expect(created.getPath()).toBe(join(testDir, 'lifecycle.db'));
      created.insertDocument(createTestDocumentInput({ id: 'doc-keep' }), T0);
      created.close();

      expect(DatabaseService.exists('lifecycle', testDir)).toBe(true);
      const reopened = DatabaseService.open('lifecycle', testDir);
      expect(reopened.getDocument('doc-keep')?.filename).toBe('invoice-0001.pdf');
      reopened.close();
    });

    it('rejects creating a database twice', () => {
      DatabaseService.create('twice', testDir).close();
      try {
        DatabaseService.create('twice', testDir);
        expect.unreachable('second create should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(DatabaseError);
        expect(error instanceof DatabaseError && error.code).toBe(DatabaseErrorCode.DATABASE_ALREADY_EXISTS);
      }
    });

    it('rejects opening a missing database', () => {
      expect(() => DatabaseService.open('absent', testDir)).toThrow('Database "absent" not found');
    });

    it('rejects names with path characters', () => {
      expect(() => DatabaseService.create('../escape', testDir)).toThrow('Invalid database name');
      expect(DatabaseService.exists('../escape', testDir)).toBe(false);
    });

    it('openOrCreate creates on first use and opens afterwards', () => {
      const first = DatabaseService.openOrCreate('lazy', testDir);
      first.close();
      expect(existsSync(join(testDir, 'lazy.db'))).toBe(true);
      const second = DatabaseService.openOrCreate('lazy', testDir);
      expect(second.getName()).toBe('lazy');
      second.close();
    });
  });

  describe('documents', () => {
    let db: DatabaseService | undefined;

    beforeEach(() => {
      db = createFreshDatabase(testDir, 'docs');
    });

    afterEach(() => {
      safeCloseDatabase(db);
    });

    function service(): DatabaseService {
      if (!db) throw new Error('database not initialised');
      return db;
    }

    it('inserts at not_ready / pending_extraction', () => {
      const doc = service().insertDocument(createTestDocumentInput({ id: 'doc-1' }), T0);

      expect(doc.text_extraction_status).toBe('not_ready');
      expect(doc.processing_status).toBe('pending_extraction');
      expect(doc.status_reason).toBeNull();
      expect(service().getDocument('doc-1')).toEqual(doc);
    });

    it('returns null for an unknown id', () => {
      expect(service().getDocument('nope')).toBeNull();
    });

    it('rejects a duplicate id and a negative size', () => {
      service().insertDocument(createTestDocumentInput({ id: 'dup' }), T0);
      expect(() => service().insertDocument(createTestDocumentInput({ id: 'dup' }), T0)).toThrow(
        'Constraint violation inserting document dup'
      );
      expect(() => service().insertDocument(createTestDocumentInput({ file_size: -1 }), T0)).toThrow(
        DatabaseError
      );
    });

    it('finds the most recent document by hash', () => {
      const hash = `sha256:${'b'.repeat(64)}`;
      service().insertDocument(createTestDocumentInput({ id: 'old', file_hash: hash }), T0);
      service().insertDocument(createTestDocumentInput({ id: 'new', file_hash: hash }), T1);

      expect(service().getDocumentByHash(hash)?.id).toBe('new');
      expect(service().getDocumentByHash(`sha256:${'c'.repeat(64)}`)).toBeNull();
    });

    it('lists oldest first with filters and paging', () => {
      service().insertDocument(createTestDocumentInput({ id: 'a', document_type: 'invoice' }), T0);
      service().insertDocument(createTestDocumentInput({ id: 'b', document_type: 'bank_statement' }), T1);
      service().insertDocument(createTestDocumentInput({ id: 'c', document_type: 'invoice' }), T2);
      service().compareAndSetStatus('b', { text: 'not_ready' }, { text: 'ready' }, T2);

      expect(service().listDocuments().map((d) => d.id)).toEqual(['a', 'b', 'c']);
      expect(service().listDocuments({ documentType: 'invoice' }).map((d) => d.id)).toEqual(['a', 'c']);
      expect(service().listDocuments({ textExtractionStatus: 'ready' }).map((d) => d.id)).toEqual(['b']);
      expect(service().listDocuments({ limit: 1, offset: 1 }).map((d) => d.id)).toEqual(['b']);
    });

    it('compare-and-set applies only when the expectation holds', () => {
      service().insertDocument(createTestDocumentInput({ id: 'cas' }), T0);

      expect(
        service().compareAndSetStatus('cas', { text: 'ready' }, { text: 'in_progress' }, T1)
      ).toBe(false);
      expect(
        service().compareAndSetStatus(
          'cas',
          { text: 'not_ready', processing: 'pending_extraction' },
          { text: 'ready', reason: 'checked' },
          T1
        )
      ).toBe(true);

      const doc = service().getDocument('cas');
      expect(doc?.text_extraction_status).toBe('ready');
      expect(doc?.processing_status).toBe('pending_extraction');
      expect(doc?.status_reason).toBe('checked');
      expect(doc?.updated_at).toBe(T1);
    });

    it('rejects an unknown status value at the storage level', () => {
      service().insertDocument(createTestDocumentInput({ id: 'bad' }), T0);
      expect(() =>
        service()
          .getConnection()
          .prepare(`UPDATE documents SET processing_status = 'archived' WHERE id = ?`)
          .run('bad')
      ).toThrow();
    });
  });

  describe('extraction jobs', () => {
    let db: DatabaseService | undefined;

    beforeEach(() => {
      db = createFreshDatabase(testDir, 'jobs');
      db.insertDocument(createTestDocumentInput({ id: 'doc' }), T0);
    });

    afterEach(() => {
      safeCloseDatabase(db);
    });

    function service(): DatabaseService {
      if (!db) throw new Error('database not initialised');
      return db;
    }

    it('inserts a pending job with no completed_at', () => {
      const job = service().insertJob('job-1', 'doc', T0);

      expect(job).toEqual({
        id: 'job-1',
        document_id: 'doc',
        status: 'pending_extraction',
        error_message: null,
        attempt_count: 0,
        created_at: T0,
        updated_at: T0,
        completed_at: null,
      });
      expect(service().getActiveJob('doc')?.id).toBe('job-1');
    });

    it('allows at most one active job per document', () => {
      service().insertJob('job-1', 'doc', T0);
      try {
        service().insertJob('job-2', 'doc', T1);
        expect.unreachable('second active job should be rejected');
      } catch (error) {
        expect(error instanceof DatabaseError && error.code).toBe(DatabaseErrorCode.CONSTRAINT_VIOLATION);
      }

      service().completeJob('job-1', T1);
      expect(service().insertJob('job-2', 'doc', T2).status).toBe('pending_extraction');
    });

    it('rejects a job for a missing document', () => {
      try {
        service().insertJob('orphan', 'missing-doc', T0);
        expect.unreachable('foreign key should be enforced');
      } catch (error) {
        expect(error instanceof DatabaseError && error.code).toBe(DatabaseErrorCode.FOREIGN_KEY_VIOLATION);
      }
    });

    it('sets completed_at exactly when the job becomes terminal', () => {
      service().insertJob('job-1', 'doc', T0);
      expect(service().recordAttempt('job-1', 'OCR service unavailable', T1)).toBe(true);

      const retried = service().getJob('job-1');
      expect(retried?.attempt_count).toBe(1);
      expect(retried?.error_message).toBe('OCR service unavailable');
      expect(retried?.completed_at).toBeNull();

      expect(service().failJob('job-1', 'LLM returned malformed JSON', T2)).toBe(true);
      const failed = service().getJob('job-1');
      expect(failed?.status).toBe('failed');
      expect(failed?.completed_at).toBe(T2);
      expect(service().getActiveJob('doc')).toBeNull();
    });

    it('never updates a terminal job', () => {
      service().insertJob('job-1', 'doc', T0);
      service().completeJob('job-1', T1);

      expect(service().failJob('job-1', 'late failure', T2)).toBe(false);
      expect(service().recordAttempt('job-1', 'late retry', T2)).toBe(false);
      expect(service().touchJob('job-1', T2)).toBe(false);
      expect(service().getJob('job-1')?.status).toBe('done');
    });

    it('rejects a failed job without a message at the storage level', () => {
      service().insertJob('job-1', 'doc', T0);
      expect(() => service().failJob('job-1', '   ', T1)).toThrow(DatabaseError);
      expect(service().getJob('job-1')?.status).toBe('pending_extraction');
    });

    it('rejects a terminal status without completed_at at the storage level', () => {
      service().insertJob('job-1', 'doc', T0);
      expect(() =>
        service()
          .getConnection()
          .prepare(`UPDATE extraction_jobs SET status = 'done' WHERE id = ?`)
          .run('job-1')
      ).toThrow();
    });

    it('lists jobs oldest first and reports the latest', () => {
      service().insertJob('job-1', 'doc', T0);
      service().failJob('job-1', 'first run failed', T1);
      service().insertJob('job-2', 'doc', T1);

      expect(service().listJobs('doc').map((j) => j.id)).toEqual(['job-1', 'job-2']);
      expect(service().getLatestJob('doc')?.id).toBe('job-2');
      expect(service().getLatestJob('other')).toBeNull();
    });

    it('finds open jobs last touched before a cutoff', () => {
      service().insertDocument(createTestDocumentInput({ id: 'doc-2' }), T0);
      service().insertJob('stale', 'doc', T0);
      service().insertJob('fresh', 'doc-2', T0);
      service().touchJob('fresh', T2);

      const open = service().findOpenJobsBefore(T1);
      expect(open.map((r) => r.job.id)).toEqual(['stale']);
      expect(open[0].textExtractionStatus).toBe('not_ready');
    });

    it('counts documents and jobs', () => {
      service().insertJob('job-1', 'doc', T0);
      service().insertDocument(createTestDocumentInput({ id: 'doc-2' }), T0);
      service().insertJob('job-2', 'doc-2', T0);
      service().completeJob('job-2', T1);

      const counts = service().getCounts();
      expect(counts.documents).toBe(2);
      expect(counts.documentsByText.not_ready).toBe(2);
      expect(counts.documentsByProcessing.pending_extraction).toBe(2);
      expect(counts.jobs).toBe(2);
      expect(counts.openJobs).toBe(1);
    });

    it('rolls back a transaction that throws', () => {
      expect(() =>
        service().transaction(() => {
          service().insertJob('job-1', 'doc', T0);
          throw new Error('abort');
        })
      ).toThrow('abort');
      expect(service().getJob('job-1')).toBeNull();
    });
  });
});
