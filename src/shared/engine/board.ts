import {
  BoardState,
  BOARD_SIZE_MIN,
  Coordinates,
  Player,
  Square,
  SquareStatus,
} from '../types/game';
import { BoardConstraintViolation, EngineErrorCode, outOfRange } from './errors';

/**
 * Board construction and indexed access.
 *
 * Squares are addressed by a row-major index. The only mutation entry point
 * is {@link replaceSquares}; the game controller is its sole caller.
 */

export function isValidBoardSize(size: number): boolean {
  return Number.isInteger(size) && size >= BOARD_SIZE_MIN && size % 2 === 0;
}

/**
 * Top-left square of the central 2×2 block.
 */
export function centerIndex(size: number): number {
  return (size / 2 - 1) * (size + 1);
}

/**
 * The four starting squares in fixed order: centre, its right neighbour,
 * its down neighbour, its down-right neighbour. The first and last start
 * white, the middle two black.
 */
export function startingSquares(size: number): [number, number, number, number] {
  const start = centerIndex(size);
  return [start, start + 1, start + size, start + size + 1];
}

function startingStatus(index: number, starts: readonly number[]): SquareStatus {
  const position = starts.indexOf(index);
  if (position === -1) {
    return 'empty';
  }
  return position === 0 || position === 3 ? 'white' : 'black';
}

/**
 * Create a board with the four centre squares filled and every other square
 * empty.
 *
 * @throws BoardConstraintViolation when `size` is odd, below 4 or not an integer.
 */
export function createBoard(size: number): BoardState {
  if (!isValidBoardSize(size)) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_SIZE,
      `Board size must be an even integer of at least ${BOARD_SIZE_MIN}, got ${size}`,
      { size }
    );
  }

  const starts = startingSquares(size);
  const squares: Square[] = Array.from({ length: size * size }, (_, index) => ({
    index,
    status: startingStatus(index, starts),
  }));

  return { size, squares };
}

/**
 * Check that a board built elsewhere (a fixture or a set-up position) has a
 * legal size and one correctly indexed square per cell.
 */
export function assertBoardShape(board: BoardState): BoardState {
  const shapeValid =
    isValidBoardSize(board.size) &&
    board.squares.length === board.size * board.size &&
    board.squares.every((square, index) => square.index === index);
  if (!shapeValid) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_SIZE,
      `Board must hold ${board.size}x${board.size} row-major squares of an even size of at least ${BOARD_SIZE_MIN}`,
      { size: board.size, squareCount: board.squares.length }
    );
  }
  return board;
}

export function isOnBoard(board: BoardState, index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < board.squares.length;
}

/**
 * @throws BoardConstraintViolation when `index` is outside the grid.
 */
export function squareAt(board: BoardState, index: number): Square {
  const square = isOnBoard(board, index) ? board.squares[index] : undefined;
  if (!square) {
    throw outOfRange(index, board.size);
  }
  return square;
}

/**
 * Apply every status change in one step. All indices are checked before any
 * square is touched, so a failing call leaves the board as it was.
 */
export function replaceSquares(board: BoardState, changes: ReadonlyMap<number, Player>): void {
  for (const index of changes.keys()) {
    if (!isOnBoard(board, index)) {
      throw outOfRange(index, board.size);
    }
  }

  const next = board.squares.slice();
  for (const [index, status] of changes) {
    next[index] = { index, status };
  }
  board.squares = next;
}

export function cloneBoard(board: BoardState): BoardState {
  return { size: board.size, squares: board.squares.map((square) => ({ ...square })) };
}

export function countSquares(board: BoardState): Record<SquareStatus, number> {
  const counts: Record<SquareStatus, number> = { empty: 0, black: 0, white: 0 };
  for (const square of board.squares) {
    counts[square.status] += 1;
  }
  return counts;
}

export function emptySquareIndices(board: BoardState): number[] {
  return board.squares.filter((square) => square.status === 'empty').map((s) => s.index);
}

export function isBoardFull(board: BoardState): boolean {
  return board.squares.every((square) => square.status !== 'empty');
}

export function coordinatesOf(index: number, size: number): Coordinates {
  return { row: Math.floor(index / size), column: index % size };
}

export function indexOf(row: number, column: number, size: number): number {
  return row * size + column;
}
