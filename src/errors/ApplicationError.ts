/**
 * Unified Error Hierarchy
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Retry hints
 * - Structured logging support
 *
 * Classification never throws; these errors cover input paths,
 * configuration and the filesystem side of renaming.
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',
  VALIDATION_SCHEMA_MISMATCH = 'VALIDATION_SCHEMA_MISMATCH',
  VALIDATION_PATH_INVALID = 'VALIDATION_PATH_INVALID',

  // File System Errors
  FS_FILE_NOT_FOUND = 'FS_FILE_NOT_FOUND',
  FS_PERMISSION_DENIED = 'FS_PERMISSION_DENIED',
  FS_RENAME_FAILED = 'FS_RENAME_FAILED',
  FS_TARGET_EXISTS = 'FS_TARGET_EXISTS',

  // Configuration Errors
  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'renameFile', 'loadRegistry') */
  operation?: string;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors should extend this class
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
   * Whether retrying the same operation could succeed
   */
  public readonly retryable: boolean;

  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

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
  constructor(
    message: string,
    context?: ErrorContext,
    cause?: Error,
    code: ErrorCode = ErrorCode.VALIDATION_INPUT_INVALID
  ) {
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
 * The supplied input path is neither a regular file nor a directory
 */
export class InvalidInputPathError extends ValidationError {
  constructor(
    public readonly inputPath: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Invalid path: ${inputPath}`,
      { ...context, metadata: { ...context?.metadata, inputPath } },
      undefined,
      ErrorCode.VALIDATION_PATH_INVALID
    );
  }
}

// ============================================
// FILE SYSTEM ERRORS
// ============================================

export class FileSystemError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    retryable = false,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: true,
      retryable,
      context: { ...context, metadata: { ...context?.metadata, path } },
      ...(cause && { cause }),
    });
  }
}

export class FileNotFoundError extends FileSystemError {
  constructor(path: string, message?: string, context?: ErrorContext) {
    super(
      message || `File not found: ${path}`,
      ErrorCode.FS_FILE_NOT_FOUND,
      path,
      false,
      context
    );
  }
}

export class PermissionError extends FileSystemError {
  constructor(
    path: string,
    public readonly operation: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Permission denied for ${operation}: ${path}`,
      ErrorCode.FS_PERMISSION_DENIED,
      path,
      false,
      { ...context, operation },
      cause
    );
  }
}

/**
 * Physical rename failed
 */
export class RenameError extends FileSystemError {
  constructor(
    path: string,
    public readonly targetPath: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error,
    code: ErrorCode = ErrorCode.FS_RENAME_FAILED
  ) {
    super(
      message || `Failed to rename ${path} -> ${targetPath}`,
      code,
      path,
      false,
      { ...context, operation: 'rename', metadata: { ...context?.metadata, targetPath } },
      cause
    );
  }
}

/**
 * Rename target already exists as a different file
 */
export class RenameConflictError extends RenameError {
  constructor(path: string, targetPath: string, context?: ErrorContext) {
    super(
      path,
      targetPath,
      `Target already exists: ${targetPath}`,
      context,
      undefined,
      ErrorCode.FS_TARGET_EXISTS
    );
  }
}

// ============================================
// CONFIGURATION ERRORS
// ============================================

export class ConfigurationError extends ApplicationError {
  constructor(
    public readonly configKey: string,
    message: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, ErrorCode.CONFIG_INVALID, {
      isOperational: false,
      retryable: false,
      context: { ...context, metadata: { ...context?.metadata, configKey } },
      ...(cause && { cause }),
    });
  }
}
