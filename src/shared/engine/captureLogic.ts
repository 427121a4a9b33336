import { BoardState, CaptureLine, Direction, Player, ResolvedMove, opponentOf } from '../types/game';
import { squareAt, emptySquareIndices } from './board';
import { DIRECTIONS, step } from './directions';
import { EngineErrorCode, RulesViolation } from './errors';
import { debugLog, isEngineDebugEnabled } from '../utils/envFlags';

/**
 * Capture resolution for Othello placements.
 *
 * A placement is legal when at least one direction radiating from the
 * target holds an unbroken run of opponent squares that ends on one of the
 * mover's own squares. Every such run flips. Lines in different directions
 * never share a square, so they are unioned without any tie-break.
 *
 * Everything here is pure: the board is read, never written.
 */

export type CaptureRejectionCode =
  | EngineErrorCode.RULES_OCCUPIED_SQUARE
  | EngineErrorCode.RULES_NO_CAPTURES;

export type CaptureResolution =
  | { readonly ok: true; readonly move: ResolvedMove }
  | { readonly ok: false; readonly code: CaptureRejectionCode; readonly reason: string };

/**
 * Walk from `targetIndex` in one direction and return the opponent squares
 * that would flip, closest first. Returns an empty array when the run is
 * empty, reaches an empty square, or runs off the board.
 */
export function findCaptureLine(
  board: BoardState,
  player: Player,
  targetIndex: number,
  direction: Direction
): number[] {
  const opponent = opponentOf(player);
  const collected: number[] = [];

  let current = step(targetIndex, board.size, direction);
  while (current !== null) {
    const status = squareAt(board, current).status;
    if (status === opponent) {
      collected.push(current);
      current = step(current, board.size, direction);
      continue;
    }
    if (status === player && collected.length > 0) {
      return collected;
    }
    return [];
  }

  return [];
}

/**
 * Decide whether `player` may place at `targetIndex` and, if so, which
 * squares flip.
 *
 * @throws BoardConstraintViolation when `targetIndex` is off the board.
 */
export function resolveCapture(
  board: BoardState,
  player: Player,
  targetIndex: number
): CaptureResolution {
  const target = squareAt(board, targetIndex);
  if (target.status !== 'empty') {
    return {
      ok: false,
      code: EngineErrorCode.RULES_OCCUPIED_SQUARE,
      reason: `Square ${targetIndex} is already occupied by ${target.status}`,
    };
  }

  const lines: CaptureLine[] = [];
  for (const direction of DIRECTIONS) {
    const indices = findCaptureLine(board, player, targetIndex, direction);
    if (indices.length > 0) {
      lines.push({ direction, indices });
    }
  }

  if (lines.length === 0) {
    return {
      ok: false,
      code: EngineErrorCode.RULES_NO_CAPTURES,
      reason: `Placing ${player} at square ${targetIndex} captures nothing`,
    };
  }

  const flips = lines.flatMap((line) => line.indices);
  debugLog(isEngineDebugEnabled(), '[captureLogic] resolved', { player, targetIndex, flips });

  return { ok: true, move: { targetIndex, player, lines, flips } };
}

/**
 * Throwing variant of {@link resolveCapture} for callers that treat an
 * illegal placement as a bug.
 */
export function resolveCaptureOrThrow(
  board: BoardState,
  player: Player,
  targetIndex: number
): ResolvedMove {
  const resolution = resolveCapture(board, player, targetIndex);
  if (resolution.ok === false) {
    throw new RulesViolation(resolution.code, resolution.reason, { player, targetIndex });
  }
  return resolution.move;
}

/**
 * Every legal placement for `player`, ordered by target index.
 */
export function enumerateLegalMoves(board: BoardState, player: Player): ResolvedMove[] {
  const moves: ResolvedMove[] = [];
  for (const index of emptySquareIndices(board)) {
    const resolution = resolveCapture(board, player, index);
    if (resolution.ok) {
      moves.push(resolution.move);
    }
  }
  return moves;
}

export function hasAnyLegalMove(board: BoardState, player: Player): boolean {
  return emptySquareIndices(board).some((index) => resolveCapture(board, player, index).ok);
}
