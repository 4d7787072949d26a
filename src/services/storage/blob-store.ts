/**
 * Blob storage keyed by document id and pipeline stage
 *
 * The raw upload is stored as bytes; every later stage is a JSON artifact.
 * A locator is the string `${documentId}/${stage}`, which is what the
 * documents table records as storage_locator for the raw upload.
 *
 * @module storage/blob-store
 */

import * as fs from 'fs';
import { dirname, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { StorageStage } from '../../models/document.js';

export const STORAGE_STAGES: readonly StorageStage[] = ['raw', 'ocr', 'llm', 'annotated'];

const SAFE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export class BlobStoreError extends Error {
  constructor(
    message: string,
    public readonly locator: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'BlobStoreError';
  }
}

export interface BlobStore {
  put(documentId: string, stage: StorageStage, data: Buffer): Promise<string>;
  /** null when nothing is stored for this key */
  get(documentId: string, stage: StorageStage): Promise<Buffer | null>;
  exists(documentId: string, stage: StorageStage): Promise<boolean>;
}

export function blobLocator(documentId: string, stage: StorageStage): string {
  if (!SAFE_ID_PATTERN.test(documentId)) {
    throw new BlobStoreError(`Invalid document id for blob key: "${documentId}"`, `${documentId}/${stage}`);
  }
  return `${documentId}/${stage}`;
}

/**
 * Split a locator back into its key, or null when it is not one of ours
 */
export function parseLocator(locator: string): { documentId: string; stage: StorageStage } | null {
  const [documentId, stageName, ...rest] = locator.split('/');
  if (rest.length > 0 || documentId === undefined || !SAFE_ID_PATTERN.test(documentId)) return null;
  const stage = STORAGE_STAGES.find((s) => s === stageName);
  return stage === undefined ? null : { documentId, stage };
}

/**
 * Whether a locator names a non-empty blob in the store
 */
export async function isLocatorResolvable(store: BlobStore, locator: string): Promise<boolean> {
  const key = parseLocator(locator);
  if (key === null) return false;
  const data = await store.get(key.documentId, key.stage);
  return data !== null && data.length > 0;
}

export async function putJson(
  store: BlobStore,
  documentId: string,
  stage: StorageStage,
  value: unknown
): Promise<string> {
  return store.put(documentId, stage, Buffer.from(JSON.stringify(value, null, 2), 'utf-8'));
}

/**
 * Read a JSON artifact; null when absent
 * @throws BlobStoreError when the stored bytes are not JSON
 */
export async function getJson(store: BlobStore, documentId: string, stage: StorageStage): Promise<unknown> {
  const data = await store.get(documentId, stage);
  if (data === null) return null;
  try {
    return JSON.parse(data.toString('utf-8'));
  } catch (error) {
    throw new BlobStoreError(
      `Stored ${stage} artifact for ${documentId} is not valid JSON`,
      blobLocator(documentId, stage),
      error
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FILESYSTEM
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One directory per document under `root`, one file per stage. Writes go to
 * a temp file first and are renamed into place.
 */
export class FileSystemBlobStore implements BlobStore {
  constructor(private readonly root: string) {}

  private pathFor(documentId: string, stage: StorageStage): string {
    const locator = blobLocator(documentId, stage);
    return join(this.root, stage === 'raw' ? locator : `${locator}.json`);
  }

  async put(documentId: string, stage: StorageStage, data: Buffer): Promise<string> {
    const target = this.pathFor(documentId, stage);
    const tmp = `${target}.${uuidv4()}.tmp`;
    try {
      await fs.promises.mkdir(dirname(target), { recursive: true, mode: 0o700 });
      await fs.promises.writeFile(tmp, data, { mode: 0o600 });
      await fs.promises.rename(tmp, target);
    } catch (error) {
      await fs.promises.rm(tmp, { force: true }).catch((rmError: unknown) => {
        console.error(
          `[BlobStore] [WARN] Could not remove ${tmp}: ${rmError instanceof Error ? rmError.message : String(rmError)}`
        );
      });
      throw new BlobStoreError(
        `Failed to write ${stage} blob for ${documentId}: ${error instanceof Error ? error.message : String(error)}`,
        blobLocator(documentId, stage),
        error
      );
    }
    return blobLocator(documentId, stage);
  }

  async get(documentId: string, stage: StorageStage): Promise<Buffer | null> {
    try {
      return await fs.promises.readFile(this.pathFor(documentId, stage));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw new BlobStoreError(
        `Failed to read ${stage} blob for ${documentId}: ${error instanceof Error ? error.message : String(error)}`,
        blobLocator(documentId, stage),
        error
      );
    }
  }

  async exists(documentId: string, stage: StorageStage): Promise<boolean> {
    try {
      await fs.promises.access(this.pathFor(documentId, stage));
      return true;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
      throw error;
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY
// ═══════════════════════════════════════════════════════════════════════════════

export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Buffer>();

  async put(documentId: string, stage: StorageStage, data: Buffer): Promise<string> {
    const locator = blobLocator(documentId, stage);
    this.blobs.set(locator, Buffer.from(data));
    return locator;
  }

  async get(documentId: string, stage: StorageStage): Promise<Buffer | null> {
    const data = this.blobs.get(blobLocator(documentId, stage));
    return data === undefined ? null : Buffer.from(data);
  }

  async exists(documentId: string, stage: StorageStage): Promise<boolean> {
    return this.blobs.has(blobLocator(documentId, stage));
  }

  /** Stored keys, for inspection in tests */
  keys(): string[] {
    return [...this.blobs.keys()].sort();
  }
}
