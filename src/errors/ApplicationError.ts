/**
 * Unified Error Hierarchy for clipsift
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Retry hints
 * - Structured logging support
 *
 * Per-file failures during a scan are wrapped in one of these classes so the
 * coordinator can report them without aborting the scan.
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',
  VALIDATION_SCHEMA_MISMATCH = 'VALIDATION_SCHEMA_MISMATCH',
  VALIDATION_SCAN_ROOT_INVALID = 'VALIDATION_SCAN_ROOT_INVALID',

  // File System Errors (operational)
  FS_FILE_NOT_FOUND = 'FS_FILE_NOT_FOUND',
  FS_PERMISSION_DENIED = 'FS_PERMISSION_DENIED',
  FS_READ_FAILED = 'FS_READ_FAILED',
  FS_WRITE_FAILED = 'FS_WRITE_FAILED',
  FS_CONFLICT_UNRESOLVED = 'FS_CONFLICT_UNRESOLVED',

  // Cache Errors (operational, always recovered)
  CACHE_CORRUPT = 'CACHE_CORRUPT',

  // Configuration Errors (permanent)
  CONFIG_MISSING = 'CONFIG_MISSING',
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System Errors (permanent)
  SYSTEM_INVALID_STATE = 'SYSTEM_INVALID_STATE',

  // Generic fallback
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'extract', 'moveFile') */
  operation?: string;

  /** File the failure relates to, if any */
  filePath?: string;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors in clipsift should extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether this error is retryable
   */
  public readonly retryable: boolean;

  /**
   * Rich context for logging and debugging
   */
  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  declare readonly cause?: Error;

  /**
   * Timestamp when error was created
   */
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error, code = ErrorCode.VALIDATION_INPUT_INVALID) {
    super(message, code, {
      isOperational: true,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class SchemaValidationError extends ValidationError {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Schema validation failed: ${errors.length} error(s)`,
      { ...context, metadata: { ...context?.metadata, errors } },
      undefined,
      ErrorCode.VALIDATION_SCHEMA_MISMATCH
    );
  }
}

/**
 * The scan root is missing, unreadable or not a directory.
 * This is the only error that aborts a scan.
 */
export class InvalidScanRootError extends ValidationError {
  constructor(
    public readonly rootPath: string,
    public readonly reason: string,
    cause?: Error
  ) {
    super(
      `Invalid scan root '${rootPath}': ${reason}`,
      { operation: 'scan', filePath: rootPath },
      cause,
      ErrorCode.VALIDATION_SCAN_ROOT_INVALID
    );
  }
}

// ============================================
// OPERATIONAL ERRORS
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// File System Errors
export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      retryable,
      { ...context, filePath: path },
      cause
    );
  }
}

/**
 * A file could not be opened, read or stat'ed.
 * The file is skipped; the scan continues.
 */
export class FileReadError extends FileSystemError {
  constructor(path: string, message?: string, context?: ErrorContext, cause?: Error) {
    super(
      message || `Failed to read file: ${path}`,
      ErrorCode.FS_READ_FAILED,
      path,
      true,
      context,
      cause
    );
  }
}

/**
 * A best-effort write (cache file, organisation folder, sidecar record) failed.
 * Routine on read-mostly device mounts; logged, never fatal.
 */
export class PersistenceError extends FileSystemError {
  constructor(path: string, message?: string, context?: ErrorContext, cause?: Error) {
    super(
      message || `Failed to write: ${path}`,
      ErrorCode.FS_WRITE_FAILED,
      path,
      false,
      context,
      cause
    );
  }
}

export class ConflictUnresolvedError extends FileSystemError {
  constructor(
    path: string,
    public readonly attempts: number,
    context?: ErrorContext
  ) {
    super(
      `Could not resolve filename conflict for ${path} after ${attempts} attempts`,
      ErrorCode.FS_CONFLICT_UNRESOLVED,
      path,
      false,
      { ...context, metadata: { ...context?.metadata, attempts } }
    );
  }
}

/**
 * Cache document could not be parsed. Always recovered into a fresh cache.
 */
export class CacheCorruptError extends FileSystemError {
  constructor(path: string, message?: string, cause?: Error) {
    super(
      message || `Cache file is corrupt: ${path}`,
      ErrorCode.CACHE_CORRUPT,
      path,
      false,
      { service: 'ResultCache', operation: 'load' },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS (not retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: false, // These are programmer errors
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      { ...context, metadata: { ...context?.metadata, configKey } },
      cause
    );
  }
}

export class InvalidStateError extends PermanentError {
  constructor(
    public readonly expectedState: string,
    public readonly actualState: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Invalid state: expected '${expectedState}', got '${actualState}'`,
      ErrorCode.SYSTEM_INVALID_STATE,
      { ...context, metadata: { ...context?.metadata, expectedState, actualState } }
    );
  }
}
