/**
 * Database service package
 */

export { DatabaseService } from './service.js';
export {
  DatabaseError,
  DatabaseErrorCode,
  type DatabaseCounts,
  type ListDocumentsOptions,
  type OpenJobRecord,
  type StatusExpectation,
  type StatusUpdate,
} from './types.js';
export { DEFAULT_STORAGE_PATH, getDatabasePath } from './helpers.js';
export { MigrationError } from '../migrations/index.js';
