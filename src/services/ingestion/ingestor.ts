/**
 * Document ingestion
 *
 * Stores the raw upload, registers the document, then tries to mark it
 * ready. A document that fails the readiness guard is still registered and
 * stays not_ready with the reason recorded.
 *
 * @module services/ingestion/ingestor
 */

import * as fs from 'fs';
import { basename } from 'path';
import { v4 as uuidv4 } from 'uuid';

import type { Document, ExtractionJob } from '../../models/document.js';
import { computeHash } from '../../utils/hash.js';
import { IngestInputSchema, validateInput } from '../../utils/validation.js';
import type { DocumentTypeRegistry } from '../llm/document-types.js';
import { ValidationError } from '../pipeline/errors.js';
import type { DocumentStatusModel } from '../status/status-model.js';
import { isLocatorResolvable, type BlobStore } from '../storage/blob-store.js';
import { mimeTypeFromFilename } from './mime.js';

export interface IngestInput {
  filename: string;
  data: Buffer;
  documentType: string;
  /** Detected from the filename extension when omitted */
  mimeType?: string;
}

export interface IngestResult {
  document: Document;
  ready: boolean;
  /** Job created when the document became ready */
  job: ExtractionJob | null;
  /** Why the document is not ready */
  reason: string | null;
  /** Earlier document with identical content, if any */
  duplicateOf: string | null;
}

export class DocumentIngestor {
  private readonly idFactory: () => string;

  constructor(
    private readonly statusModel: DocumentStatusModel,
    private readonly blobs: BlobStore,
    private readonly documentTypes: DocumentTypeRegistry,
    idFactory?: () => string
  ) {
    this.idFactory = idFactory ?? uuidv4;
  }

  /**
   * @throws ValidationError for an unknown document type, bad filename or
   *   empty upload; nothing is stored in that case
   */
  async ingest(input: IngestInput): Promise<IngestResult> {
    const fields = validateInput(IngestInputSchema, {
      filename: input.filename,
      documentType: input.documentType,
      mimeType: input.mimeType,
    });
    if (!this.documentTypes.has(fields.documentType)) {
      throw new ValidationError(`Unknown document type "${fields.documentType}"`, {
        documentType: fields.documentType,
        known: this.documentTypes.keys(),
      });
    }
    if (input.data.length === 0) {
      throw new ValidationError(`Upload "${fields.filename}" is empty`, { filename: fields.filename });
    }

    const id = this.idFactory();
    const fileHash = computeHash(input.data);
    const mimeType = fields.mimeType ?? mimeTypeFromFilename(fields.filename);
    const duplicate = this.statusModel.findDocumentByHash(fileHash);
    if (duplicate) {
      console.error(`[Ingestion] [INFO] ${fields.filename} has the same content as document ${duplicate.id}`);
    }

    const locator = await this.blobs.put(id, 'raw', input.data);
    const registered = this.statusModel.registerDocument({
      id,
      filename: fields.filename,
      storage_locator: locator,
      mime_type: mimeType,
      file_size: input.data.length,
      file_hash: fileHash,
      document_type: fields.documentType,
    });

    const resolvable = await isLocatorResolvable(this.blobs, locator);
    try {
      const { document, job } = this.statusModel.markReady(id, { locatorResolvable: resolvable });
      console.error(`[Ingestion] ${fields.filename} -> ${id} ready`);
      return { document, ready: true, job, reason: null, duplicateOf: duplicate?.id ?? null };
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      console.error(`[Ingestion] [WARN] ${fields.filename} -> ${id} not ready: ${error.message}`);
      return {
        document: this.statusModel.getDocument(registered.id),
        ready: false,
        job: null,
        reason: error.message,
        duplicateOf: duplicate?.id ?? null,
      };
    }
  }

  /**
   * Read a file from disk and ingest it
   *
   * @throws ValidationError when the file cannot be read
   */
  async ingestFile(filePath: string, documentType: string, mimeType?: string): Promise<IngestResult> {
    let data: Buffer;
    try {
      data = await fs.promises.readFile(filePath);
    } catch (error) {
      throw new ValidationError(
        `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }
    return this.ingest({ filename: basename(filePath), data, documentType, mimeType });
  }
}
