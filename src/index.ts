/**
 * docextract
 *
 * Layout reconstruction and staged field extraction for scanned documents.
 * Library entry point; the CLI lives in bin.ts.
 *
 * @module index
 */

export * from './models/index.js';
export { createApp, DEFAULT_DATABASE_NAME, type App, type AppOptions } from './app.js';
export { runCli, formatError, formatSuccess, type CliOutput } from './cli.js';

export {
  DEFAULT_LAYOUT_CONFIG,
  LayoutConfigSchema,
  loadLayoutConfig,
  withProfile,
  type LayoutConfig,
} from './services/layout/config.js';
export { normalizeDocument, structureHash } from './services/layout/normalizer.js';
export { parseNormalizedDocument, NormalizedDocumentFormatError } from './services/layout/schema.js';

export * from './services/llm/index.js';
export { HttpOcrEngine, type OcrEngine, type OcrSource } from './services/ocr/http-engine.js';
export { OCRError } from './services/ocr/errors.js';

export {
  PipelineError,
  ValidationError,
  TransientStageError,
  TerminalStageError,
  InvariantViolation,
  DocumentNotFoundError,
  type PipelineErrorCategory,
  type PipelineStage,
} from './services/pipeline/errors.js';
export { loadPipelineConfig, type PipelineConfig } from './services/pipeline/config.js';
export {
  PipelineOrchestrator,
  type PipelineDependencies,
  type PipelineRunResult,
  type RunOptions,
  type RunOutcome,
} from './services/pipeline/orchestrator.js';
export { PipelineDispatcher, type BatchResult, type DispatchResult } from './services/pipeline/dispatcher.js';
export { reclaimStaleJobs, type SweepResult } from './services/pipeline/sweeper.js';
export { buildAnnotationOverlay, type AnnotationOverlay } from './services/pipeline/annotations.js';

export { DocumentStatusModel } from './services/status/status-model.js';
export { transitionTextExtraction, transitionProcessing } from './services/status/transitions.js';
export { DocumentIngestor, type IngestInput, type IngestResult } from './services/ingestion/ingestor.js';

export * from './services/storage/index.js';
