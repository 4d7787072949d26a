/**
 * SQL schema definitions for the document metadata store
 *
 * Contains table creation SQL, indexes, and connection pragmas.
 * These are constants used by the migration system.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Per-connection pragmas. Not persistent in SQLite, so they are applied on
 * every open.
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -16000',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Documents table - one row per upload, two independent status axes
 */
export const CREATE_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  filename TEXT NOT NULL,
  storage_locator TEXT NOT NULL,
  mime_type TEXT NOT NULL,
  file_size INTEGER NOT NULL CHECK (file_size >= 0),
  file_hash TEXT NOT NULL,
  document_type TEXT NOT NULL,
  text_extraction_status TEXT NOT NULL DEFAULT 'not_ready'
    CHECK (text_extraction_status IN ('not_ready', 'ready', 'in_progress', 'completed', 'failed')),
  processing_status TEXT NOT NULL DEFAULT 'pending_extraction'
    CHECK (processing_status IN ('pending_extraction', 'ocr_running', 'llm_running', 'done', 'failed')),
  status_reason TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Extraction job ledger. completed_at is set exactly when the job is
 * terminal, and a failed job always carries a message.
 */
export const CREATE_EXTRACTION_JOBS_TABLE = `
CREATE TABLE IF NOT EXISTS extraction_jobs (
  id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
  status TEXT NOT NULL DEFAULT 'pending_extraction'
    CHECK (status IN ('pending_extraction', 'done', 'failed')),
  error_message TEXT,
  attempt_count INTEGER NOT NULL DEFAULT 0 CHECK (attempt_count >= 0),
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  completed_at TEXT,
  CHECK ((status IN ('done', 'failed')) = (completed_at IS NOT NULL)),
  CHECK (status <> 'failed' OR length(trim(coalesce(error_message, ''))) > 0)
)
`;

/**
 * At most one non-terminal job per document
 */
export const CREATE_ACTIVE_JOB_INDEX = `
CREATE UNIQUE INDEX IF NOT EXISTS idx_extraction_jobs_active
  ON extraction_jobs(document_id) WHERE status = 'pending_extraction'
`;

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_documents_file_hash ON documents(file_hash)',
  'CREATE INDEX IF NOT EXISTS idx_documents_text_status ON documents(text_extraction_status)',
  'CREATE INDEX IF NOT EXISTS idx_documents_processing_status ON documents(processing_status)',
  'CREATE INDEX IF NOT EXISTS idx_extraction_jobs_document ON extraction_jobs(document_id, created_at)',
  'CREATE INDEX IF NOT EXISTS idx_extraction_jobs_open ON extraction_jobs(completed_at, updated_at)',
  CREATE_ACTIVE_JOB_INDEX,
];

/**
 * Tables in dependency order
 */
export const TABLE_DEFINITIONS = [
  { name: 'documents', sql: CREATE_DOCUMENTS_TABLE },
  { name: 'extraction_jobs', sql: CREATE_EXTRACTION_JOBS_TABLE },
] as const;

export const REQUIRED_TABLES = ['schema_version', 'documents', 'extraction_jobs'] as const;

export const REQUIRED_INDEXES = [
  'idx_documents_file_hash',
  'idx_documents_text_status',
  'idx_documents_processing_status',
  'idx_extraction_jobs_document',
  'idx_extraction_jobs_open',
  'idx_extraction_jobs_active',
] as const;

/** Critical columns checked on open */
export const REQUIRED_COLUMNS: Record<string, readonly string[]> = {
  documents: [
    'id',
    'storage_locator',
    'mime_type',
    'document_type',
    'text_extraction_status',
    'processing_status',
  ],
  extraction_jobs: ['id', 'document_id', 'status', 'error_message', 'attempt_count', 'completed_at'],
};
