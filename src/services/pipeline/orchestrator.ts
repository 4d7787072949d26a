/**
 * Pipeline Orchestrator
 *
 * Stage graph for one document: ocr -> normalize -> store(ocr) -> llm ->
 * store(llm, annotated). Each stage yields a StageOutcome and settle()
 * maps the first failure to a status transition:
 *
 *   success                          -> done / completed, job done
 *   transient, attempts left         -> pending_extraction / ready, job requeued
 *   transient, budget spent          -> treated as terminal
 *   terminal, abort or timeout       -> failed / failed, job failed
 *
 * Artifacts written by earlier stages are never removed when a later
 * stage fails.
 *
 * There is no retry loop here. The OCR engine and the LLM client retry
 * their own transport errors; a transient failure that survives them ends
 * the run and requeues the job, so one job makes at most
 * maxAttempts x (client attempts) calls to a capability.
 *
 * @module services/pipeline/orchestrator
 */

import type { Document, DocumentStatusView, ExtractionJob } from '../../models/document.js';
import type { ExtractedFields } from '../../models/extraction.js';
import type { NormalizedDocument, OcrPage } from '../../models/layout.js';
import { DEFAULT_LAYOUT_CONFIG, withProfile, type LayoutConfig } from '../layout/config.js';
import { normalizeDocument, structureHash } from '../layout/normalizer.js';
import type { DocumentTypeConfig, DocumentTypeRegistry } from '../llm/document-types.js';
import type { FieldExtractor } from '../llm/field-extractor.js';
import type { StoredExtraction } from '../llm/schema.js';
import type { OcrEngine } from '../ocr/http-engine.js';
import type { DocumentStatusModel } from '../status/status-model.js';
import { putJson, type BlobStore } from '../storage/blob-store.js';
import { buildAnnotationOverlay } from './annotations.js';
import { loadPipelineConfig, type PipelineConfig } from './config.js';
import { TerminalStageError, type PipelineStage } from './errors.js';
import { runStage, type StageFailure, type StageOutcome } from './stages.js';

export interface PipelineDependencies {
  statusModel: DocumentStatusModel;
  blobs: BlobStore;
  ocr: OcrEngine;
  extractor: FieldExtractor;
  documentTypes: DocumentTypeRegistry;
  layoutConfig?: LayoutConfig;
  config?: PipelineConfig;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Overrides config.runTimeoutMs for this run; 0 disables */
  timeoutMs?: number;
}

export type RunOutcome = 'done' | 'requeued' | 'failed';

export interface PipelineRunResult extends DocumentStatusView {
  outcome: RunOutcome;
  /** Failure message recorded for the run, null on success */
  error: string | null;
  durationMs: number;
}

interface RunContext {
  document: Document;
  job: ExtractionJob;
  docType: DocumentTypeConfig;
  signal: AbortSignal;
  /** Set once the run is aborted; explains why */
  abortReason: () => string | null;
}

export class PipelineOrchestrator {
  private readonly statusModel: DocumentStatusModel;
  private readonly blobs: BlobStore;
  private readonly ocr: OcrEngine;
  private readonly extractor: FieldExtractor;
  private readonly documentTypes: DocumentTypeRegistry;
  private readonly layoutConfig: LayoutConfig;
  readonly config: PipelineConfig;

  constructor(deps: PipelineDependencies) {
    this.statusModel = deps.statusModel;
    this.blobs = deps.blobs;
    this.ocr = deps.ocr;
    this.extractor = deps.extractor;
    this.documentTypes = deps.documentTypes;
    this.layoutConfig = deps.layoutConfig ?? DEFAULT_LAYOUT_CONFIG;
    this.config = deps.config ?? loadPipelineConfig();
  }

  /**
   * Run the full pipeline for one document.
   *
   * The claim happens synchronously before the first await, so of two
   * concurrent calls for one document exactly one proceeds.
   *
   * @throws InvariantViolation when the document cannot be claimed
   * @throws DocumentNotFoundError when the document does not exist
   */
  async runPipeline(documentId: string, options: RunOptions = {}): Promise<PipelineRunResult> {
    const { document, job } = this.statusModel.claim(documentId);
    const startTime = Date.now();
    console.error(
      `[Pipeline] Starting ${documentId} (job ${job.id}, attempt ${job.attempt_count + 1}/${this.config.maxAttempts})`
    );

    const controller = new AbortController();
    let abortReason: string | null = null;
    const abort = (reason: string): void => {
      if (abortReason !== null) return;
      abortReason = reason;
      controller.abort();
    };

    const timeoutMs = options.timeoutMs ?? this.config.runTimeoutMs;
    const timer =
      timeoutMs > 0 ? setTimeout(() => abort(`Pipeline run timed out after ${timeoutMs}ms`), timeoutMs) : null;
    const onExternalAbort = (): void => abort('Pipeline run aborted by caller');
    if (options.signal?.aborted) onExternalAbort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });

    try {
      let failure: StageFailure | null;
      if (this.documentTypes.has(document.document_type)) {
        failure = await this.execute({
          document,
          job,
          docType: this.documentTypes.get(document.document_type),
          signal: controller.signal,
          abortReason: () => abortReason,
        });
      } else {
        failure = {
          kind: 'terminal',
          stage: 'ocr',
          error: new TerminalStageError(`Unknown document type "${document.document_type}"`, 'ocr'),
        };
      }
      return await this.settle(documentId, job, failure, abortReason, startTime);
    } finally {
      if (timer !== null) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  getStatus(documentId: string): Promise<DocumentStatusView> {
    return this.statusModel.getStatus(documentId);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // STAGES
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * @returns the first failure, or null when every stage succeeded
   */
  private async execute(ctx: RunContext): Promise<StageFailure | null> {
    const { document } = ctx;

    const ocr = await this.stage(ctx, 'ocr', () => this.runOcr(ctx));
    if (ocr.kind !== 'success') return ocr;

    const layout = withProfile(this.layoutConfig, ctx.docType.layoutProfile);
    const normalized = await this.stage(ctx, 'normalize', async () => normalizeDocument(ocr.artifact, layout));
    if (normalized.kind !== 'success') return normalized;
    const structure = normalized.artifact;

    const storedOcr = await this.stage(ctx, 'store', () => putJson(this.blobs, document.id, 'ocr', structure));
    if (storedOcr.kind !== 'success') return storedOcr;
    console.error(
      `[Pipeline] ${document.id}: normalized ${structure.summary.pageCount} pages, ` +
        `${structure.summary.pairCount} pairs, ${structure.summary.leftoverCount} leftovers (${structureHash(structure)})`
    );

    const aborted = this.abortedOutcome(ctx, 'llm');
    if (aborted) return aborted;
    this.statusModel.setProcessingStatus(document.id, 'llm_running');

    const llm = await this.stage(ctx, 'llm', () =>
      this.extractor.extractFields(structure, ctx.docType, { signal: ctx.signal })
    );
    if (llm.kind !== 'success') return llm;

    const stored = await this.stage(ctx, 'store', () => this.storeExtraction(ctx, structure, llm.artifact));
    if (stored.kind !== 'success') return stored;

    return this.abortedOutcome(ctx, 'store');
  }

  private async runOcr(ctx: RunContext): Promise<OcrPage[]> {
    const { document } = ctx;
    const data = await this.blobs.get(document.id, 'raw');
    if (data === null || data.length === 0) {
      throw new TerminalStageError(`Raw upload for ${document.id} is missing or empty`, 'ocr');
    }
    return this.ocr.extract(
      { documentId: document.id, filename: document.filename, mimeType: document.mime_type, data },
      { signal: ctx.signal }
    );
  }

  private async storeExtraction(
    ctx: RunContext,
    structure: NormalizedDocument,
    result: ExtractedFields
  ): Promise<void> {
    const envelope: StoredExtraction = {
      documentId: ctx.document.id,
      documentType: ctx.docType.key,
      jobId: ctx.job.id,
      extractedAt: new Date().toISOString(),
      result,
    };
    await putJson(this.blobs, ctx.document.id, 'llm', envelope);
    await putJson(
      this.blobs,
      ctx.document.id,
      'annotated',
      buildAnnotationOverlay(ctx.document.id, structure, result)
    );
  }

  /**
   * Run a stage body unless the run is already aborted
   */
  private async stage<T>(ctx: RunContext, stage: PipelineStage, body: () => Promise<T>): Promise<StageOutcome<T>> {
    const aborted = this.abortedOutcome(ctx, stage);
    if (aborted) return aborted;
    console.error(`[Pipeline] ${ctx.document.id}: ${stage} stage`);
    return runStage(stage, body);
  }

  private abortedOutcome(ctx: RunContext, stage: PipelineStage): StageFailure | null {
    const reason = ctx.abortReason();
    if (reason === null) return null;
    return { kind: 'terminal', stage, error: new TerminalStageError(reason, stage) };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SETTLE
  // ═══════════════════════════════════════════════════════════════════════════════

  private async settle(
    documentId: string,
    job: ExtractionJob,
    failure: StageFailure | null,
    abortReason: string | null,
    startTime: number
  ): Promise<PipelineRunResult> {
    let outcome: RunOutcome;
    let message: string | null = null;

    if (failure === null) {
      this.statusModel.completeDocument(documentId, job.id);
      outcome = 'done';
    } else {
      message = failure.error.message;
      if (abortReason !== null && message !== abortReason) {
        message = `${abortReason} (during ${failure.stage} stage: ${message})`;
      }

      const runsUsed = job.attempt_count + 1;
      if (failure.kind === 'transient' && abortReason === null && runsUsed < this.config.maxAttempts) {
        this.statusModel.releaseForRetry(documentId, job.id, message);
        outcome = 'requeued';
      } else {
        if (failure.kind === 'transient' && abortReason === null) {
          message = `${message} (retry budget exhausted after ${runsUsed} attempts)`;
        }
        this.statusModel.failDocument(documentId, message);
        outcome = 'failed';
      }
    }

    const durationMs = Date.now() - startTime;
    console.error(
      `[Pipeline] Finished ${documentId}: ${outcome} in ${durationMs}ms${message ? ` (${message})` : ''}`
    );
    const status = await this.statusModel.getStatus(documentId);
    return { ...status, outcome, error: message, durationMs };
  }
}
