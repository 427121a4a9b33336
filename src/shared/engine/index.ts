// =============================================================================
// OTHELLO RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (the game session, tests, any future UI) should import from this file.
//
// Design principles:
// - NARROW: Only essential functions are exported
// - PURE: Board, direction and capture helpers never mutate their inputs
// - SINGLE WRITER: GameEngine is the only code that changes a live board
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  Player,
  SquareStatus,
  Square,
  BoardState,
  Direction,
  Coordinates,
  CaptureLine,
  ResolvedMove,
  TerminationReason,
  Score,
  GameStatus,
  GameState,
  DisplaySnapshot,
  MoveRecord,
} from '../types/game';
export { opponentOf, BOARD_SIZE_DEFAULT, BOARD_SIZE_MIN } from '../types/game';

// =============================================================================
// BOARD
// =============================================================================

export {
  createBoard,
  squareAt,
  replaceSquares,
  cloneBoard,
  countSquares,
  emptySquareIndices,
  isBoardFull,
  isOnBoard,
  isValidBoardSize,
  assertBoardShape,
  centerIndex,
  startingSquares,
  coordinatesOf,
  indexOf,
} from './board';

// =============================================================================
// DIRECTIONS
// =============================================================================

export {
  DIRECTIONS,
  DIRECTION_VECTORS,
  step,
  neighbors,
  oppositeDirection,
  directionDelta,
} from './directions';
export type { DirectionVector, Neighbor } from './directions';

// =============================================================================
// CAPTURE
// =============================================================================

export {
  findCaptureLine,
  resolveCapture,
  resolveCaptureOrThrow,
  enumerateLegalMoves,
  hasAnyLegalMove,
} from './captureLogic';
export type { CaptureResolution, CaptureRejectionCode } from './captureLogic';

// =============================================================================
// TURN CONTROL
// =============================================================================

export { GameEngine, validatePlacementInput } from './GameEngine';
export type { GameEngineOptions, MoveOutcome, PlacementInput } from './GameEngine';
export { TurnStateMachine, transition } from './fsm';
export type { TurnState, TurnEvent, TransitionResult, Action } from './fsm';

// =============================================================================
// NOTATION
// =============================================================================

export {
  columnLetter,
  columnFromLetter,
  formatSquare,
  formatMoveRecord,
  renderBoardText,
} from './notation';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  RulesViolation,
  BoardConstraintViolation,
  InputViolation,
  isEngineError,
  isRulesViolation,
  isBoardConstraintViolation,
  isInputViolation,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON, RejectionCode } from './errors';
