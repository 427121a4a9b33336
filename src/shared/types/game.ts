/**
 * The two sides of an Othello game. Black always moves first.
 */
export type Player = 'black' | 'white';

/**
 * Ownership of a single square. A square leaves 'empty' exactly once (when a
 * piece is placed on it) and afterwards only flips between the two players.
 */
export type SquareStatus = 'empty' | Player;

export interface Square {
  readonly status: SquareStatus;
  /** Row-major offset, 0 <= index < size * size. */
  readonly index: number;
}

/**
 * An N×N board stored row-major. `size` never changes after creation and
 * `squares.length === size * size` always holds.
 */
export interface BoardState {
  readonly size: number;
  squares: Square[];
}

/**
 * The eight compass directions a capture line can radiate in.
 */
export type Direction =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'up_left'
  | 'up_right'
  | 'down_left'
  | 'down_right';

/** 0-based board coordinates. */
export interface Coordinates {
  row: number;
  column: number;
}

export interface CaptureLine {
  readonly direction: Direction;
  /** Opponent squares flipped by this line, closest to the placement first. */
  readonly indices: readonly number[];
}

/**
 * A legal placement together with everything it flips.
 */
export interface ResolvedMove {
  readonly targetIndex: number;
  readonly player: Player;
  readonly lines: readonly CaptureLine[];
  /** All flipped squares across every line, in direction order. */
  readonly flips: readonly number[];
}

export type TerminationReason = 'quit' | 'no_legal_moves' | 'board_full';

export interface Score {
  black: number;
  white: number;
}

export type GameStatus =
  | { readonly kind: 'in_progress' }
  | {
      readonly kind: 'terminated';
      readonly reason: TerminationReason;
      /** null when the score is level. */
      readonly winner: Player | null;
      readonly score: Score;
    };

export interface GameState {
  board: BoardState;
  activePlayer: Player;
  /** Number of placements accepted so far. */
  turnNumber: number;
  status: GameStatus;
}

/**
 * Read-only view handed to anything that displays the board.
 */
export interface DisplaySnapshot {
  readonly board: BoardState;
  readonly size: number;
  readonly activePlayer: Player;
  readonly blackCount: number;
  readonly whiteCount: number;
}

/**
 * One entry of a game's history: either a placement or a forced pass.
 */
export type MoveRecord =
  | {
      readonly type: 'placement';
      readonly turnNumber: number;
      readonly player: Player;
      readonly targetIndex: number;
      readonly flips: readonly number[];
    }
  | {
      readonly type: 'pass';
      readonly turnNumber: number;
      readonly player: Player;
    };

export const BOARD_SIZE_DEFAULT = 8;
export const BOARD_SIZE_MIN = 4;

export function opponentOf(player: Player): Player {
  return player === 'black' ? 'white' : 'black';
}
