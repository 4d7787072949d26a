/**
 * PipelineDispatcher and stale-job sweeper tests
 *
 * @see src/services/pipeline/dispatcher.ts
 * @see src/services/pipeline/sweeper.ts
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { PipelineDispatcher } from '../../../src/services/pipeline/dispatcher.js';
import { reclaimStaleJobs } from '../../../src/services/pipeline/sweeper.js';
import { TerminalStageError } from '../../../src/services/pipeline/errors.js';
import {
  cleanupTestDir,
  createFreshDatabase,
  createTestDir,
  safeCloseDatabase,
  type DatabaseService,
} from '../storage/helpers.js';
import { COMPANY_PAGE, FakeFieldExtractor, FakeOcrEngine, createHarness } from './helpers.js';

describe('pipeline batch processing', () => {
  let testDir: string;
  let db: DatabaseService | undefined;

  beforeAll(() => {
    testDir = createTestDir('docextract-dispatch-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    db = createFreshDatabase(testDir, 'dispatch');
  });

  afterEach(() => {
    safeCloseDatabase(db);
  });

  function database(): DatabaseService {
    if (!db) throw new Error('database not initialised');
    return db;
  }

  describe('PipelineDispatcher', () => {
    it('isolates one failing document from the rest and keeps input order', async () => {
      const ocr = new FakeOcrEngine(async (source) => {
        if (source.documentId === 'doc-b') throw new TerminalStageError('unreadable scan', 'ocr');
        return [COMPANY_PAGE];
      });
      const h = createHarness(database(), ocr, new FakeFieldExtractor());
      await h.readyDocument('doc-a');
      await h.readyDocument('doc-b');
      await h.readyDocument('doc-c');
      const dispatcher = new PipelineDispatcher(h.orchestrator, h.statusModel, 2);

      const batch = await dispatcher.runMany(['doc-a', 'doc-b', 'doc-c', 'missing']);

      expect(batch.results.map((r) => [r.documentId, r.outcome])).toEqual([
        ['doc-a', 'done'],
        ['doc-b', 'failed'],
        ['doc-c', 'done'],
        ['missing', 'rejected'],
      ]);
      expect(batch.processed).toBe(2);
      expect(batch.failed).toBe(1);
      expect(batch.rejected).toBe(1);
      expect(batch.requeued).toBe(0);
      expect(batch.results[1].error).toBe('unreadable scan');
      expect(batch.results[3].error).toBe('Document not found: missing');
    });

    it('runs every ready document and skips the rest', async () => {
      const h = createHarness(database(), new FakeOcrEngine(), new FakeFieldExtractor());
      await h.readyDocument('doc-a');
      await h.readyDocument('doc-b');
      h.statusModel.registerDocument({
        id: 'doc-waiting',
        filename: 'scan.tiff',
        storage_locator: 'doc-waiting/raw',
        mime_type: 'image/tiff',
        file_size: 10,
        file_hash: `sha256:${'d'.repeat(64)}`,
        document_type: 'generic',
      });
      const dispatcher = new PipelineDispatcher(h.orchestrator, h.statusModel);

      const batch = await dispatcher.runPending();

      expect(batch.results.map((r) => r.documentId)).toEqual(['doc-a', 'doc-b']);
      expect(batch.processed).toBe(2);
      expect(h.statusModel.getDocument('doc-waiting').text_extraction_status).toBe('not_ready');
    });

    it('returns an empty batch when nothing is ready', async () => {
      const h = createHarness(database(), new FakeOcrEngine(), new FakeFieldExtractor());
      const batch = await new PipelineDispatcher(h.orchestrator, h.statusModel, 4).runPending();

      expect(batch.results).toEqual([]);
      expect(batch.processed).toBe(0);
    });
  });

  describe('reclaimStaleJobs', () => {
    it('fails runs abandoned in progress and leaves waiting jobs alone', async () => {
      const h = createHarness(database(), new FakeOcrEngine(), new FakeFieldExtractor());
      await h.readyDocument('doc-crashed');
      await h.readyDocument('doc-waiting');
      const crashedJob = h.statusModel.claim('doc-crashed').job;
      h.clock.advance(45 * 60_000);

      const result = reclaimStaleJobs(h.statusModel, 30 * 60_000, h.clock.now());

      expect(result.reclaimed).toEqual([{ documentId: 'doc-crashed', jobId: crashedJob.id, ageMs: 45 * 60_000 }]);
      expect(result.skipped).toEqual([]);

      const crashed = h.statusModel.getDocument('doc-crashed');
      expect(crashed.text_extraction_status).toBe('failed');
      expect(crashed.processing_status).toBe('failed');
      expect(h.statusModel.getJob(crashedJob.id)?.error_message).toBe(
        `Run abandoned: job ${crashedJob.id} untouched for 2700s, reclaimed by sweeper`
      );
      expect(h.statusModel.getDocument('doc-waiting').text_extraction_status).toBe('ready');
    });

    it('does nothing before the threshold', async () => {
      const h = createHarness(database(), new FakeOcrEngine(), new FakeFieldExtractor());
      await h.readyDocument('doc-1');
      h.statusModel.claim('doc-1');
      h.clock.advance(5 * 60_000);

      expect(reclaimStaleJobs(h.statusModel, 30 * 60_000, h.clock.now())).toEqual({ reclaimed: [], skipped: [] });
    });
  });
});
