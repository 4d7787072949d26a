/**
 * Service wiring
 *
 * Builds the database, blob store, status model, collaborators and
 * pipeline for one data directory. The CLI creates one App per invocation;
 * tests pass fakes for the OCR engine and field extractor.
 *
 * @module app
 */

import { join } from 'path';

import { DocumentIngestor } from './services/ingestion/ingestor.js';
import { loadLayoutConfig, type LayoutConfig } from './services/layout/config.js';
import { OllamaClient } from './services/llm/client.js';
import { DocumentTypeRegistry } from './services/llm/document-types.js';
import { LlmFieldExtractor, type FieldExtractor } from './services/llm/field-extractor.js';
import { HttpOcrEngine, type OcrEngine } from './services/ocr/http-engine.js';
import { loadPipelineConfig, type PipelineConfig } from './services/pipeline/config.js';
import { PipelineDispatcher } from './services/pipeline/dispatcher.js';
import { PipelineOrchestrator } from './services/pipeline/orchestrator.js';
import { reclaimStaleJobs, type SweepResult } from './services/pipeline/sweeper.js';
import { DocumentStatusModel } from './services/status/status-model.js';
import { FileSystemBlobStore, type BlobStore } from './services/storage/blob-store.js';
import { DEFAULT_STORAGE_PATH, DatabaseService } from './services/storage/database/index.js';

export const DEFAULT_DATABASE_NAME = 'docextract';

export interface AppOptions {
  /** Root for the database file and blobs (default: DOCEXTRACT_DATA_PATH or ~/.docextract) */
  dataPath?: string;
  databaseName?: string;
  blobs?: BlobStore;
  ocr?: OcrEngine;
  extractor?: FieldExtractor;
  documentTypes?: DocumentTypeRegistry;
  layoutConfig?: LayoutConfig;
  pipelineConfig?: PipelineConfig;
  clock?: () => Date;
}

export interface App {
  db: DatabaseService;
  blobs: BlobStore;
  statusModel: DocumentStatusModel;
  documentTypes: DocumentTypeRegistry;
  ingestor: DocumentIngestor;
  orchestrator: PipelineOrchestrator;
  dispatcher: PipelineDispatcher;
  config: PipelineConfig;
  sweep(now?: Date): SweepResult;
  close(): void;
}

export function createApp(options: AppOptions = {}): App {
  const dataPath = options.dataPath ?? DEFAULT_STORAGE_PATH;
  const config = options.pipelineConfig ?? loadPipelineConfig();
  const documentTypes = options.documentTypes ?? DocumentTypeRegistry.load();

  const db = DatabaseService.openOrCreate(options.databaseName ?? DEFAULT_DATABASE_NAME, dataPath);
  const blobs = options.blobs ?? new FileSystemBlobStore(join(dataPath, 'blobs'));
  const statusModel = new DocumentStatusModel(db, {
    allowedMimeTypes: config.allowedMimeTypes,
    blobs,
    clock: options.clock,
  });

  const orchestrator = new PipelineOrchestrator({
    statusModel,
    blobs,
    ocr: options.ocr ?? new HttpOcrEngine(),
    extractor: options.extractor ?? new LlmFieldExtractor(new OllamaClient()),
    documentTypes,
    layoutConfig: options.layoutConfig ?? loadLayoutConfig(),
    config,
  });

  return {
    db,
    blobs,
    statusModel,
    documentTypes,
    ingestor: new DocumentIngestor(statusModel, blobs, documentTypes),
    orchestrator,
    dispatcher: new PipelineDispatcher(orchestrator, statusModel, config.concurrency),
    config,
    sweep: (now?: Date) => reclaimStaleJobs(statusModel, config.staleJobMs, now),
    close: () => db.close(),
  };
}
