/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * This module provides consistent error types for engine-level errors that occur
 * during board construction, move resolution and turn handling.
 *
 * Error Categories:
 * - **RulesViolation**: Placements the rules do not allow (occupied square, no captures)
 * - **BoardConstraintViolation**: Board geometry issues (bad size, index outside the grid)
 * - **InputViolation**: Turn input that does not satisfy the pre-validated contract
 *
 * Usage:
 * ```typescript
 * import { RulesViolation, EngineErrorCode } from './errors';
 *
 * throw new RulesViolation(
 *   EngineErrorCode.RULES_NO_CAPTURES,
 *   'Placement does not capture any opposing square',
 *   { targetIndex: 19, player: 'black' }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: Illegal placements
 * - BOARD_*: Board geometry issues
 * - INPUT_*: Malformed turn input
 * - FSM_*: State machine transition errors
 */
export enum EngineErrorCode {
  // Rules Violations - recoverable, the player must supply another move
  /** Target square already holds a piece */
  RULES_OCCUPIED_SQUARE = 'RULES_OCCUPIED_SQUARE',
  /** No direction yields a capture line */
  RULES_NO_CAPTURES = 'RULES_NO_CAPTURES',

  // Board Constraint Violations - fatal
  /** Board edge length is odd, too small or not an integer */
  BOARD_INVALID_SIZE = 'BOARD_INVALID_SIZE',
  /** Square index outside [0, size * size) */
  BOARD_OUT_OF_RANGE = 'BOARD_OUT_OF_RANGE',

  // Input Violations - recoverable, re-prompt
  /** Row or column outside the board */
  INPUT_INVALID = 'INPUT_INVALID',

  // FSM Errors
  /** Event not valid in the current state */
  FSM_INVALID_TRANSITION = 'FSM_INVALID_TRANSITION',
  /** Game already terminated */
  FSM_GAME_OVER = 'FSM_GAME_OVER',

  // Internal Errors - should never happen in correct code
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Illegal placement',
  BOARD_: 'Board geometry constraint violation',
  INPUT_: 'Malformed turn input',
  FSM_: 'Invalid state machine transition',
  INTERNAL_: 'Internal engine error (bug)',
};

/**
 * Codes a caller can recover from by supplying a different move.
 */
export type RejectionCode =
  | EngineErrorCode.RULES_OCCUPIED_SQUARE
  | EngineErrorCode.RULES_NO_CAPTURES
  | EngineErrorCode.INPUT_INVALID
  | EngineErrorCode.FSM_GAME_OVER;

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Context for debugging
 * - Domain indicator for error routing
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'Board', 'CaptureResolver') */
  readonly domain: string;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for illegal placements.
 *
 * Examples:
 * - Target square is already occupied
 * - No direction produces a capture line
 */
export class RulesViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'RulesViolation';
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

/**
 * Error for board geometry violations.
 *
 * Examples:
 * - Board created with an odd or too-small edge length
 * - Square index outside the grid
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * Error for turn input that breaks the pre-validated contract, e.g. a row of
 * 0 or a column past the right edge.
 */
export class InputViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Input'
  ) {
    super(code, message, context, domain);
    this.name = 'InputViolation';
    Object.setPrototypeOf(this, InputViolation.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is an EngineError.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Check if an error is a RulesViolation.
 */
export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

/**
 * Check if an error is a BoardConstraintViolation.
 */
export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

/**
 * Check if an error is an InputViolation.
 */
export function isInputViolation(error: unknown): error is InputViolation {
  return error instanceof InputViolation;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}

/**
 * Create the standard "index outside the grid" error.
 */
export function outOfRange(
  index: number,
  size: number,
  domain: string = 'Board'
): BoardConstraintViolation {
  return new BoardConstraintViolation(
    EngineErrorCode.BOARD_OUT_OF_RANGE,
    `Square index ${index} is outside a ${size}x${size} board`,
    { index, size },
    domain
  );
}
