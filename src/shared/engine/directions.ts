import { Direction } from '../types/game';
import { outOfRange } from './errors';

/**
 * Row/column vector for a direction. Rows grow downwards.
 */
export interface DirectionVector {
  readonly dRow: number;
  readonly dColumn: number;
}

/**
 * Canonical order in which capture lines are scanned.
 */
export const DIRECTIONS: readonly Direction[] = [
  'up',
  'down',
  'left',
  'right',
  'up_left',
  'up_right',
  'down_left',
  'down_right',
];

export const DIRECTION_VECTORS: Readonly<Record<Direction, DirectionVector>> = {
  up: { dRow: -1, dColumn: 0 },
  down: { dRow: 1, dColumn: 0 },
  left: { dRow: 0, dColumn: -1 },
  right: { dRow: 0, dColumn: 1 },
  up_left: { dRow: -1, dColumn: -1 },
  up_right: { dRow: -1, dColumn: 1 },
  down_left: { dRow: 1, dColumn: -1 },
  down_right: { dRow: 1, dColumn: 1 },
};

const OPPOSITES: Readonly<Record<Direction, Direction>> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
  up_left: 'down_right',
  up_right: 'down_left',
  down_left: 'up_right',
  down_right: 'up_left',
};

export function oppositeDirection(direction: Direction): Direction {
  return OPPOSITES[direction];
}

/**
 * Linear index offset of one step on a board of the given edge length,
 * e.g. `right` is +1, `down` is +size, `down_right` is +size+1.
 */
export function directionDelta(direction: Direction, size: number): number {
  const { dRow, dColumn } = DIRECTION_VECTORS[direction];
  return dRow * size + dColumn;
}

/**
 * Index of the neighbouring square in `direction`, or null when the step
 * leaves the board. Both row and column are bounds-checked, so horizontal
 * and diagonal steps never wrap into the adjacent row.
 *
 * @throws BoardConstraintViolation when `index` itself is off the board.
 */
export function step(index: number, size: number, direction: Direction): number | null {
  if (!Number.isInteger(index) || index < 0 || index >= size * size) {
    throw outOfRange(index, size, 'Directions');
  }

  const { dRow, dColumn } = DIRECTION_VECTORS[direction];
  const row = Math.floor(index / size) + dRow;
  const column = (index % size) + dColumn;

  if (row < 0 || row >= size || column < 0 || column >= size) {
    return null;
  }
  return row * size + column;
}

export interface Neighbor {
  readonly direction: Direction;
  readonly index: number;
}

/**
 * Every on-board neighbour of `index`, in {@link DIRECTIONS} order.
 */
export function neighbors(index: number, size: number): Neighbor[] {
  const result: Neighbor[] = [];
  for (const direction of DIRECTIONS) {
    const next = step(index, size, direction);
    if (next !== null) {
      result.push({ direction, index: next });
    }
  }
  return result;
}
