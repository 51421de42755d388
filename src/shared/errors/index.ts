/**
 * Shared Errors Module
 *
 * @module errors
 */

export {
  // Error codes
  CommandErrorCode,
  ERROR_CATEGORY,
  CATEGORY_HTTP_STATUS,
  isCommandErrorCode,
  type ErrorCategory,
  // Base class
  CommandError,
  type CommandErrorJSON,
  // Specific errors
  FormatError,
  ValidationError,
  ExecutionError,
  StaleStateError,
  ProtocolError,
  BoardCorruptionError,
  // Utilities
  isCommandError,
  isFatalError,
  categoryOf,
  wrapError,
} from './CommandErrors';
