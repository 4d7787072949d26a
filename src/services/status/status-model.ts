/**
 * Document Status Model
 *
 * Owns both status axes of a document and its extraction-job ledger. Every
 * mutation re-reads the row inside an IMMEDIATE transaction, checks the
 * transition against the FSMs in transitions.ts, and writes with a
 * compare-and-set, so two callers racing on one document cannot both win.
 *
 * Active-job policy: a second non-terminal job for a document is rejected
 * with InvariantViolation. The partial unique index on extraction_jobs
 * enforces the same rule at the storage level.
 *
 * @module status/status-model
 */

import { v4 as uuidv4 } from 'uuid';

import {
  isTerminalJobStatus,
  type Document,
  type DocumentStatusView,
  type ExtractionJob,
  type ProcessingStatus,
  type RegisterDocumentInput,
  type TextExtractionStatus,
} from '../../models/document.js';
import type { ExtractedFields } from '../../models/extraction.js';
import type { NormalizedDocument } from '../../models/layout.js';
import { parseNormalizedDocument } from '../layout/schema.js';
import { StoredExtractionSchema } from '../llm/schema.js';
import {
  DocumentNotFoundError,
  InvariantViolation,
  ValidationError,
  errorMessage,
} from '../pipeline/errors.js';
import { getJson, type BlobStore } from '../storage/blob-store.js';
import {
  DatabaseError,
  DatabaseErrorCode,
  type DatabaseService,
  type ListDocumentsOptions,
  type StatusExpectation,
  type StatusUpdate,
} from '../storage/database/index.js';
import { transitionProcessing, transitionTextExtraction } from './transitions.js';

export interface StatusModelOptions {
  /** MIME types accepted by markReady */
  allowedMimeTypes: readonly string[];
  /** Artifact store read by getStatus */
  blobs: BlobStore;
  /** Injected for tests */
  clock?: () => Date;
  idFactory?: () => string;
}

export interface ReadinessCheck {
  /** Defaults to the MIME type recorded at registration */
  mimeType?: string;
  locatorResolvable: boolean;
}

export interface StaleJob {
  job: ExtractionJob;
  textExtractionStatus: TextExtractionStatus;
  ageMs: number;
}

/**
 * Milliseconds since the job was last touched (created, claimed or
 * requeued). NaN timestamps count as infinitely old.
 */
export function jobAgeMs(job: ExtractionJob, now: Date = new Date()): number {
  const touched = Date.parse(job.updated_at);
  return Number.isNaN(touched) ? Number.POSITIVE_INFINITY : Math.max(0, now.getTime() - touched);
}

export class DocumentStatusModel {
  private readonly allowedMimeTypes: ReadonlySet<string>;
  private readonly blobs: BlobStore;
  private readonly clock: () => Date;
  private readonly idFactory: () => string;

  constructor(
    private readonly db: DatabaseService,
    options: StatusModelOptions
  ) {
    this.allowedMimeTypes = new Set(options.allowedMimeTypes.map((m) => m.toLowerCase()));
    this.blobs = options.blobs;
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory ?? uuidv4;
  }

  private now(): string {
    return this.clock().toISOString();
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // DOCUMENTS
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Create a document at not_ready / pending_extraction
   */
  registerDocument(input: RegisterDocumentInput): Document {
    const id = input.id ?? this.idFactory();
    const doc = this.guard(() => this.db.insertDocument({ ...input, id }, this.now()));
    console.error(`[StatusModel] Registered document ${id} (${input.filename}, ${input.mime_type})`);
    return doc;
  }

  getDocument(documentId: string): Document {
    const doc = this.db.getDocument(documentId);
    if (!doc) throw new DocumentNotFoundError(documentId);
    return doc;
  }

  findDocumentByHash(fileHash: string): Document | null {
    return this.db.getDocumentByHash(fileHash);
  }

  listDocuments(options?: ListDocumentsOptions): Document[] {
    return this.db.listDocuments(options);
  }

  /**
   * not_ready -> ready, creating the document's first job in the same
   * transaction.
   *
   * @throws ValidationError when the MIME type is not allowed or the locator
   *   does not resolve; the document stays not_ready and no job is created
   */
  markReady(documentId: string, check: ReadinessCheck): { document: Document; job: ExtractionJob } {
    const doc = this.getDocument(documentId);
    this.assertText(doc, 'ready');

    const mimeType = (check.mimeType ?? doc.mime_type).toLowerCase();
    const problems: string[] = [];
    if (!this.allowedMimeTypes.has(mimeType)) {
      problems.push(`MIME type "${mimeType}" is not allowed`);
    }
    if (!check.locatorResolvable) {
      problems.push(`storage locator "${doc.storage_locator}" does not resolve`);
    }
    if (problems.length > 0) {
      const reason = problems.join('; ');
      this.db.compareAndSetStatus(documentId, { text: 'not_ready' }, { reason }, this.now());
      console.error(`[StatusModel] [WARN] Document ${documentId} not ready: ${reason}`);
      throw new ValidationError(`Document ${documentId} cannot be marked ready: ${reason}`, {
        documentId,
        mimeType,
        locatorResolvable: check.locatorResolvable,
      });
    }

    return this.db.transaction(() => {
      this.casOrThrow(doc, { text: 'not_ready' }, { text: 'ready', reason: null });
      const job = this.createJob(documentId);
      console.error(`[StatusModel] Document ${documentId} ready, job ${job.id} created`);
      return { document: this.getDocument(documentId), job };
    });
  }

  /**
   * Atomic claim-or-reject for a pipeline run: text ready -> in_progress and
   * processing pending_extraction -> ocr_running. Synchronous, so a caller
   * that claims before its first await cannot interleave with another claim.
   *
   * @throws InvariantViolation when the document is already in progress,
   *   not ready, terminal, or has no active job
   */
  claim(documentId: string): { document: Document; job: ExtractionJob } {
    return this.db.transaction(() => {
      const doc = this.getDocument(documentId);
      if (doc.text_extraction_status !== 'ready') {
        throw new InvariantViolation(
          doc.text_extraction_status === 'in_progress'
            ? `Document ${documentId} is already being processed`
            : `Document ${documentId} cannot be claimed from text status "${doc.text_extraction_status}"`,
          { documentId, textExtractionStatus: doc.text_extraction_status }
        );
      }
      const job = this.db.getActiveJob(documentId);
      if (!job) {
        throw new InvariantViolation(`Document ${documentId} has no active extraction job`, { documentId });
      }

      this.assertProcessing(doc, 'ocr_running');
      this.casOrThrow(
        doc,
        { text: 'ready', processing: doc.processing_status },
        { text: 'in_progress', processing: 'ocr_running', reason: null }
      );
      const now = this.now();
      this.db.touchJob(job.id, now);
      console.error(`[StatusModel] Claimed document ${documentId} (job ${job.id})`);
      return { document: this.getDocument(documentId), job: this.getJobOrThrow(job.id) };
    });
  }

  /**
   * Guarded processing-status transition. Only the orchestrator calls this.
   */
  setProcessingStatus(documentId: string, to: ProcessingStatus): Document {
    return this.db.transaction(() => {
      const doc = this.getDocument(documentId);
      this.assertProcessing(doc, to);
      this.casOrThrow(doc, { processing: doc.processing_status }, { processing: to });
      console.error(`[StatusModel] ${documentId}: processing ${doc.processing_status} -> ${to}`);
      return this.getDocument(documentId);
    });
  }

  /**
   * Successful run: processing done, text completed, job done
   */
  completeDocument(documentId: string, jobId: string): Document {
    return this.db.transaction(() => {
      const doc = this.getDocument(documentId);
      this.assertText(doc, 'completed');
      this.assertProcessing(doc, 'done');
      this.assertJobBelongs(jobId, documentId);
      this.completeJob(jobId);
      this.casOrThrow(
        doc,
        { text: doc.text_extraction_status, processing: doc.processing_status },
        { text: 'completed', processing: 'done', reason: null }
      );
      console.error(`[StatusModel] Document ${documentId} completed (job ${jobId})`);
      return this.getDocument(documentId);
    });
  }

  /**
   * Unrecoverable failure: processing failed, text failed where the text
   * FSM allows it, and the active job (if any) failed with `reason`.
   */
  failDocument(documentId: string, reason: string): Document {
    const message = this.requireMessage(reason, 'failing a document');
    return this.db.transaction(() => {
      const doc = this.getDocument(documentId);
      this.assertProcessing(doc, 'failed');

      const job = this.db.getActiveJob(documentId);
      if (job) this.failJob(job.id, message);

      const textOk = transitionTextExtraction(doc.text_extraction_status, 'failed').ok;
      this.casOrThrow(
        doc,
        { text: doc.text_extraction_status, processing: doc.processing_status },
        { processing: 'failed', reason: message, ...(textOk ? { text: 'failed' as const } : {}) }
      );
      console.error(`[StatusModel] Document ${documentId} failed: ${message}`);
      return this.getDocument(documentId);
    });
  }

  /**
   * Retryable failure with budget remaining: the job stays pending with one
   * more attempt recorded, text goes back to ready and processing to
   * pending_extraction.
   */
  releaseForRetry(documentId: string, jobId: string, reason: string): { document: Document; job: ExtractionJob } {
    const message = this.requireMessage(reason, 'releasing a document for retry');
    return this.db.transaction(() => {
      const doc = this.getDocument(documentId);
      this.assertText(doc, 'ready');
      this.assertProcessing(doc, 'pending_extraction');
      this.assertJobBelongs(jobId, documentId);
      const job = this.recordAttempt(jobId, message);
      this.casOrThrow(
        doc,
        { text: doc.text_extraction_status, processing: doc.processing_status },
        { text: 'ready', processing: 'pending_extraction', reason: message }
      );
      console.error(
        `[StatusModel] Document ${documentId} requeued after attempt ${job.attempt_count}: ${message}`
      );
      return { document: this.getDocument(documentId), job };
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // JOB LEDGER
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * @throws InvariantViolation when the document already has a non-terminal job
   */
  createJob(documentId: string): ExtractionJob {
    return this.db.transaction(() => {
      this.getDocument(documentId);
      const active = this.db.getActiveJob(documentId);
      if (active) {
        throw new InvariantViolation(
          `Document ${documentId} already has an active extraction job (${active.id})`,
          { documentId, activeJobId: active.id }
        );
      }
      return this.guard(() => this.db.insertJob(this.idFactory(), documentId, this.now()));
    });
  }

  completeJob(jobId: string): ExtractionJob {
    return this.db.transaction(() => {
      this.assertJobOpen(this.getJobOrThrow(jobId));
      this.db.completeJob(jobId, this.now());
      return this.getJobOrThrow(jobId);
    });
  }

  /**
   * @throws InvariantViolation when the message is empty or the job is terminal
   */
  failJob(jobId: string, message: string): ExtractionJob {
    const text = this.requireMessage(message, `failing job ${jobId}`);
    return this.db.transaction(() => {
      this.assertJobOpen(this.getJobOrThrow(jobId));
      this.db.failJob(jobId, text, this.now());
      return this.getJobOrThrow(jobId);
    });
  }

  recordAttempt(jobId: string, message: string): ExtractionJob {
    const text = this.requireMessage(message, `recording an attempt on job ${jobId}`);
    return this.db.transaction(() => {
      this.assertJobOpen(this.getJobOrThrow(jobId));
      this.db.recordAttempt(jobId, text, this.now());
      return this.getJobOrThrow(jobId);
    });
  }

  getJob(jobId: string): ExtractionJob | null {
    return this.db.getJob(jobId);
  }

  getActiveJob(documentId: string): ExtractionJob | null {
    return this.db.getActiveJob(documentId);
  }

  listJobs(documentId: string): ExtractionJob[] {
    return this.db.listJobs(documentId);
  }

  getLatestJob(documentId: string): ExtractionJob | null {
    return this.db.getLatestJob(documentId);
  }

  /**
   * Jobs with no completed_at untouched for at least `olderThanMs`, for an
   * external sweeper to reclaim
   */
  findStaleJobs(olderThanMs: number, now: Date = this.clock()): StaleJob[] {
    const cutoff = new Date(now.getTime() - olderThanMs).toISOString();
    return this.db.findOpenJobsBefore(cutoff).map(({ job, textExtractionStatus }) => ({
      job,
      textExtractionStatus,
      ageMs: jobAgeMs(job, now),
    }));
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // STATUS VIEW
  // ═══════════════════════════════════════════════════════════════════════════════

  async getStatus(documentId: string): Promise<DocumentStatusView> {
    const doc = this.getDocument(documentId);
    const [normalized, extracted] = await Promise.all([
      this.readNormalized(documentId),
      this.readExtracted(documentId),
    ]);
    return {
      documentId,
      textExtractionStatus: doc.text_extraction_status,
      processingStatus: doc.processing_status,
      statusReason: doc.status_reason,
      latestJob: this.db.getLatestJob(documentId),
      normalized,
      extracted,
    };
  }

  private async readNormalized(documentId: string): Promise<NormalizedDocument | null> {
    const value = await getJson(this.blobs, documentId, 'ocr');
    if (value === null) return null;
    try {
      return parseNormalizedDocument(value);
    } catch (error) {
      console.error(`[StatusModel] [WARN] Ignoring stored ocr artifact for ${documentId}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async readExtracted(documentId: string): Promise<ExtractedFields | null> {
    const value = await getJson(this.blobs, documentId, 'llm');
    if (value === null) return null;
    const parsed = StoredExtractionSchema.safeParse(value);
    if (!parsed.success) {
      console.error(`[StatusModel] [WARN] Ignoring malformed llm artifact for ${documentId}`);
      return null;
    }
    return parsed.data.result;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // GUARDS
  // ═══════════════════════════════════════════════════════════════════════════════

  private assertText(doc: Document, to: TextExtractionStatus): void {
    const result = transitionTextExtraction(doc.text_extraction_status, to);
    if (!result.ok) {
      throw new InvariantViolation(`Document ${doc.id}: ${result.reason}`, {
        documentId: doc.id,
        from: result.from,
        to: result.to,
      });
    }
  }

  private assertProcessing(doc: Document, to: ProcessingStatus): void {
    const result = transitionProcessing(doc.processing_status, to);
    if (!result.ok) {
      throw new InvariantViolation(`Document ${doc.id}: ${result.reason}`, {
        documentId: doc.id,
        from: result.from,
        to: result.to,
      });
    }
  }

  private assertJobBelongs(jobId: string, documentId: string): void {
    const job = this.getJobOrThrow(jobId);
    if (job.document_id !== documentId) {
      throw new InvariantViolation(`Job ${jobId} belongs to document ${job.document_id}, not ${documentId}`, {
        jobId,
        documentId,
      });
    }
  }

  private assertJobOpen(job: ExtractionJob): void {
    if (isTerminalJobStatus(job.status)) {
      throw new InvariantViolation(`Job ${job.id} is already ${job.status}`, {
        jobId: job.id,
        status: job.status,
      });
    }
  }

  private getJobOrThrow(jobId: string): ExtractionJob {
    const job = this.db.getJob(jobId);
    if (!job) {
      throw new DatabaseError(`Extraction job not found: ${jobId}`, DatabaseErrorCode.JOB_NOT_FOUND);
    }
    return job;
  }

  private requireMessage(message: string, context: string): string {
    const trimmed = message.trim();
    if (trimmed.length === 0) {
      throw new InvariantViolation(`A non-empty error message is required when ${context}`, { context });
    }
    return trimmed;
  }

  private casOrThrow(
    doc: Document,
    expected: StatusExpectation,
    next: StatusUpdate
  ): void {
    if (!this.db.compareAndSetStatus(doc.id, expected, next, this.now())) {
      throw new InvariantViolation(`Document ${doc.id} changed status concurrently`, {
        documentId: doc.id,
        expected,
      });
    }
  }

  /**
   * Storage constraint failures become InvariantViolation
   */
  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof DatabaseError && error.code === DatabaseErrorCode.CONSTRAINT_VIOLATION) {
        throw new InvariantViolation(error.message, { code: error.code });
      }
      throw error;
    }
  }
}
