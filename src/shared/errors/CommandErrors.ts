/**
 * Command Errors - Structured error types for the command pipeline
 *
 * Shared by the authoritative server and the client tracker so that both sides
 * agree on error codes and categories. The string value of each code is the
 * `error_code` tag that travels in RESPONSE payloads.
 *
 * Error Categories:
 * - **format**: malformed envelope or command shape, rejected before validation
 * - **validation**: existence, bounds, state consistency or legality failure
 * - **execution**: validation passed but the commit failed
 * - **stale_state**: client-side version gap, triggers a resync
 * - **protocol**: unmatched response, unknown message type; logged and dropped
 * - **fatal**: board invariants broken; the session must be reset
 *
 * Usage:
 * ```typescript
 * import { ValidationError, CommandErrorCode } from './CommandErrors';
 *
 * throw new ValidationError(CommandErrorCode.OUT_OF_BOUNDS, 'Cell (9,9) is off the board', {
 *   cell: [9, 9],
 * });
 * ```
 *
 * @module CommandErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

export enum CommandErrorCode {
  // Format
  FORMAT_INVALID = 'format_invalid',
  UNKNOWN_KIND = 'unknown_kind',

  // Validation
  PIECE_NOT_FOUND = 'piece_not_found',
  OUT_OF_BOUNDS = 'out_of_bounds',
  STALE_STATE = 'stale_state',
  CELL_OCCUPIED = 'cell_occupied',
  INVALID_TARGET = 'invalid_target',
  NO_PENDING_OFFER = 'no_pending_offer',
  SESSION_FINISHED = 'session_finished',
  RULE_REJECTED = 'rule_rejected',
  NOT_IN_SESSION = 'not_in_session',

  // Execution
  EXECUTION_FAILED = 'execution_failed',

  // Client-side staleness
  STALE_VERSION = 'stale_version',

  // Protocol
  UNMATCHED_RESPONSE = 'unmatched_response',
  UNKNOWN_MESSAGE_TYPE = 'unknown_message_type',

  // Fatal
  BOARD_CORRUPTED = 'board_corrupted',

  INTERNAL_ERROR = 'internal_error',
}

export type ErrorCategory =
  | 'format'
  | 'validation'
  | 'execution'
  | 'stale_state'
  | 'protocol'
  | 'fatal';

export const ERROR_CATEGORY: Record<CommandErrorCode, ErrorCategory> = {
  [CommandErrorCode.FORMAT_INVALID]: 'format',
  [CommandErrorCode.UNKNOWN_KIND]: 'format',

  [CommandErrorCode.PIECE_NOT_FOUND]: 'validation',
  [CommandErrorCode.OUT_OF_BOUNDS]: 'validation',
  [CommandErrorCode.STALE_STATE]: 'validation',
  [CommandErrorCode.CELL_OCCUPIED]: 'validation',
  [CommandErrorCode.INVALID_TARGET]: 'validation',
  [CommandErrorCode.NO_PENDING_OFFER]: 'validation',
  [CommandErrorCode.SESSION_FINISHED]: 'validation',
  [CommandErrorCode.RULE_REJECTED]: 'validation',
  [CommandErrorCode.NOT_IN_SESSION]: 'validation',

  [CommandErrorCode.EXECUTION_FAILED]: 'execution',

  [CommandErrorCode.STALE_VERSION]: 'stale_state',

  [CommandErrorCode.UNMATCHED_RESPONSE]: 'protocol',
  [CommandErrorCode.UNKNOWN_MESSAGE_TYPE]: 'protocol',

  [CommandErrorCode.BOARD_CORRUPTED]: 'fatal',

  [CommandErrorCode.INTERNAL_ERROR]: 'execution',
};

/**
 * HTTP status used when a command error surfaces through the Express API.
 */
export const CATEGORY_HTTP_STATUS: Record<ErrorCategory, number> = {
  format: 400,
  validation: 422,
  execution: 500,
  stale_state: 409,
  protocol: 400,
  fatal: 500,
};

const CODE_VALUES = new Set<string>(Object.values(CommandErrorCode));

export function isCommandErrorCode(value: string): value is CommandErrorCode {
  return CODE_VALUES.has(value);
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

export interface CommandErrorJSON {
  error: true;
  code: CommandErrorCode;
  category: ErrorCategory;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

export class CommandError extends Error {
  /** Error code for programmatic handling; also the wire `error_code`. */
  readonly code: CommandErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether the session's authoritative state must be reset */
  readonly isFatal: boolean;

  readonly timestamp: Date;

  constructor(
    code: CommandErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'CommandError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, CommandError.prototype);
  }

  get category(): ErrorCategory {
    return ERROR_CATEGORY[this.code];
  }

  get httpStatus(): number {
    return CATEGORY_HTTP_STATUS[this.category];
  }

  toJSON(): CommandErrorJSON {
    return {
      error: true,
      code: this.code,
      category: this.category,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Malformed envelope or command shape.
 */
export class FormatError extends CommandError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    code: CommandErrorCode.FORMAT_INVALID | CommandErrorCode.UNKNOWN_KIND = CommandErrorCode.FORMAT_INVALID
  ) {
    super(code, message, context, false);
    this.name = 'FormatError';
    Object.setPrototypeOf(this, FormatError.prototype);
  }
}

export class ValidationError extends CommandError {
  constructor(code: CommandErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context, false);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * A validated command could not be committed. Distinct from ValidationError so
 * clients can tell "illegal" apart from "the system failed to apply it".
 */
export class ExecutionError extends CommandError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(CommandErrorCode.EXECUTION_FAILED, message, context, false);
    this.name = 'ExecutionError';
    Object.setPrototypeOf(this, ExecutionError.prototype);
  }
}

/**
 * Client-side version gap. Triggers a full resync.
 */
export class StaleStateError extends CommandError {
  constructor(localVersion: number, incomingVersion: number, context: Record<string, unknown> = {}) {
    super(
      CommandErrorCode.STALE_VERSION,
      `Version gap: local ${localVersion}, incoming ${incomingVersion}`,
      { localVersion, incomingVersion, ...context },
      false
    );
    this.name = 'StaleStateError';
    Object.setPrototypeOf(this, StaleStateError.prototype);
  }
}

export class ProtocolError extends CommandError {
  constructor(
    code: CommandErrorCode.UNMATCHED_RESPONSE | CommandErrorCode.UNKNOWN_MESSAGE_TYPE,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(code, message, context, false);
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

/**
 * Authoritative board invariants no longer hold. Unrecoverable for the session.
 */
export class BoardCorruptionError extends CommandError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(CommandErrorCode.BOARD_CORRUPTED, message, context, true);
    this.name = 'BoardCorruptionError';
    Object.setPrototypeOf(this, BoardCorruptionError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isCommandError(error: unknown): error is CommandError {
  return error instanceof CommandError;
}

export function isFatalError(error: unknown): boolean {
  return isCommandError(error) && error.isFatal;
}

export function categoryOf(error: unknown): ErrorCategory {
  return isCommandError(error) ? error.category : 'execution';
}

/**
 * Wrap an unknown error in a CommandError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): CommandError {
  if (isCommandError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CommandError(CommandErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalError: error instanceof Error ? error.name : typeof error,
  });
}
