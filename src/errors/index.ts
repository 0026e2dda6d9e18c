/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors
export {
  ValidationError,
  SchemaValidationError,
  InvalidInputPathError,
} from './ApplicationError.js';

// File system errors
export {
  FileSystemError,
  FileNotFoundError,
  PermissionError,
  RenameError,
  RenameConflictError,
} from './ApplicationError.js';

// Configuration errors
export {
  ConfigurationError,
} from './ApplicationError.js';
