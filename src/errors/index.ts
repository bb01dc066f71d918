/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
} from './ApplicationError.js';
export type { ErrorContext } from './ApplicationError.js';

// Validation errors
export {
  ValidationError,
  SchemaValidationError,
  InvalidScanRootError,
} from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  FileSystemError,
  FileReadError,
  PersistenceError,
  ConflictUnresolvedError,
  CacheCorruptError,
} from './ApplicationError.js';

// Permanent errors
export {
  PermanentError,
  ConfigurationError,
  InvalidStateError,
} from './ApplicationError.js';
