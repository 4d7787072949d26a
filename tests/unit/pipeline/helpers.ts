/**
 * In-process stand-ins for the OCR engine and field extractor, and a
 * harness wiring them to a real status model
 */

import type { ExtractedFields } from '../../../src/models/extraction.js';
import type { NormalizedDocument, OcrPage, RawFragment } from '../../../src/models/layout.js';
import { DocumentTypeRegistry, type DocumentTypeConfig } from '../../../src/services/llm/document-types.js';
import type { FieldExtractionOptions, FieldExtractor } from '../../../src/services/llm/field-extractor.js';
import type { OcrEngine, OcrExtractOptions, OcrSource } from '../../../src/services/ocr/http-engine.js';
import { loadPipelineConfig, type PipelineConfigOverrides } from '../../../src/services/pipeline/config.js';
import { PipelineOrchestrator } from '../../../src/services/pipeline/orchestrator.js';
import { DocumentStatusModel } from '../../../src/services/status/status-model.js';
import { MemoryBlobStore } from '../../../src/services/storage/blob-store.js';
import { createTestDocumentInput, TestClock, type DatabaseService } from '../storage/helpers.js';

export function raw(text: string, x1: number, x2: number, y = 0, confidence = 0.9): RawFragment {
  return { text, bbox: { x1, y1: y, x2, y2: y + 10 }, confidence };
}

/**
 * One row: "Company Name" label, "DemoTech Solutions GmbH" value (span p1-r0-s1)
 */
export const COMPANY_PAGE: OcrPage = {
  pageNumber: 1,
  fragments: [
    raw('Company', 0, 70),
    raw('Name', 75, 110),
    raw('DemoTech', 140, 210),
    raw('Solutions', 215, 280),
    raw('GmbH', 285, 320),
  ],
};

export const COMPANY_FIELDS: ExtractedFields = {
  fields: {
    company_name: { value: 'DemoTech Solutions GmbH', confidence: 0.9, sourceSpanIds: ['p1-r0-s1'], page: 1 },
  },
  missingFields: [],
  validation: { company_name: { isValid: true, errors: [] } },
};

export function abortError(): Error {
  const error = new Error('aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Resolves or rejects only when the signal aborts; `started` resolves once
 * the call is in flight
 */
export function hangUntilAborted(): { started: Promise<void>; run: (signal?: AbortSignal) => Promise<never> } {
  let markStarted: () => void = () => undefined;
  const started = new Promise<void>((resolve) => {
    markStarted = resolve;
  });
  return {
    started,
    run: (signal) =>
      new Promise<never>((_, reject) => {
        markStarted();
        if (!signal) {
          reject(new Error('no signal passed'));
          return;
        }
        signal.addEventListener('abort', () => reject(abortError()), { once: true });
      }),
  };
}

type OcrBehaviour = (source: OcrSource, signal?: AbortSignal) => Promise<OcrPage[]>;

/**
 * OCR engine driven by a queue of behaviours; the last one repeats
 */
export class FakeOcrEngine implements OcrEngine {
  readonly calls: OcrSource[] = [];
  private readonly behaviours: OcrBehaviour[];

  constructor(...behaviours: OcrBehaviour[]) {
    this.behaviours = behaviours.length > 0 ? behaviours : [async () => [COMPANY_PAGE]];
  }

  extract(source: OcrSource, options?: OcrExtractOptions): Promise<OcrPage[]> {
    this.calls.push(source);
    const index = Math.min(this.calls.length - 1, this.behaviours.length - 1);
    return this.behaviours[index](source, options?.signal);
  }
}

type ExtractBehaviour = (structure: NormalizedDocument, signal?: AbortSignal) => Promise<ExtractedFields>;

export class FakeFieldExtractor implements FieldExtractor {
  readonly calls: Array<{ structure: NormalizedDocument; docType: DocumentTypeConfig }> = [];
  private readonly behaviours: ExtractBehaviour[];

  constructor(...behaviours: ExtractBehaviour[]) {
    this.behaviours = behaviours.length > 0 ? behaviours : [async () => COMPANY_FIELDS];
  }

  extractFields(
    structure: NormalizedDocument,
    docType: DocumentTypeConfig,
    options?: FieldExtractionOptions
  ): Promise<ExtractedFields> {
    this.calls.push({ structure, docType });
    const index = Math.min(this.calls.length - 1, this.behaviours.length - 1);
    return this.behaviours[index](structure, options?.signal);
  }
}

export function testDocumentTypes(): DocumentTypeRegistry {
  return DocumentTypeRegistry.fromObject({
    generic: { name: 'Generic Form', expected_fields: ['company_name'] },
  });
}

export interface PipelineHarness {
  blobs: MemoryBlobStore;
  statusModel: DocumentStatusModel;
  orchestrator: PipelineOrchestrator;
  clock: TestClock;
  /** Register, store the raw upload and mark ready */
  readyDocument(id: string, options?: { documentType?: string; withRaw?: boolean }): Promise<void>;
}

export function createHarness(
  db: DatabaseService,
  ocr: OcrEngine,
  extractor: FieldExtractor,
  config: PipelineConfigOverrides = {}
): PipelineHarness {
  const blobs = new MemoryBlobStore();
  const clock = new TestClock();
  const pipelineConfig = loadPipelineConfig({
    runTimeoutMs: 0,
    ...config,
  });
  const statusModel = new DocumentStatusModel(db, {
    allowedMimeTypes: pipelineConfig.allowedMimeTypes,
    blobs,
    clock: clock.now,
  });
  const orchestrator = new PipelineOrchestrator({
    statusModel,
    blobs,
    ocr,
    extractor,
    documentTypes: testDocumentTypes(),
    config: pipelineConfig,
  });

  return {
    blobs,
    statusModel,
    orchestrator,
    clock,
    async readyDocument(id, options = {}) {
      if (options.withRaw ?? true) {
        await blobs.put(id, 'raw', Buffer.from('%PDF-1.7 test upload'));
      }
      statusModel.registerDocument(
        createTestDocumentInput({ id, document_type: options.documentType ?? 'generic' })
      );
      statusModel.markReady(id, { locatorResolvable: true });
    },
  };
}
