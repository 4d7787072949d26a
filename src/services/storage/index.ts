/**
 * Storage Service Module
 *
 * Metadata store (SQLite) and blob store for the extraction pipeline.
 */

export {
  initializeDatabase,
  checkSchemaVersion,
  migrateToLatest,
  getCurrentSchemaVersion,
  verifySchema,
  MigrationError,
} from './migrations/index.js';

export {
  DatabaseService,
  DatabaseError,
  DatabaseErrorCode,
  DEFAULT_STORAGE_PATH,
  type DatabaseCounts,
  type ListDocumentsOptions,
  type OpenJobRecord,
  type StatusExpectation,
  type StatusUpdate,
} from './database/index.js';

export {
  BlobStoreError,
  FileSystemBlobStore,
  MemoryBlobStore,
  STORAGE_STAGES,
  blobLocator,
  getJson,
  isLocatorResolvable,
  parseLocator,
  putJson,
  type BlobStore,
} from './blob-store.js';
