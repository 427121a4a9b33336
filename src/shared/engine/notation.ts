import { DisplaySnapshot, MoveRecord, SquareStatus } from '../types/game';
import { coordinatesOf } from './board';

/**
 * Shared board-notation helpers.
 *
 * Squares are written as a lowercase column letter followed by a 1-based
 * row number counted from the top, so on an 8×8 board index 0 is `a1` and
 * index 19 is `d3`. Columns are lettered from A, which limits notation to
 * boards of at most 26 columns.
 */

const FIRST_COLUMN_CODE = 'A'.charCodeAt(0);

const STATUS_GLYPHS: Record<SquareStatus, string> = {
  empty: ' ',
  black: 'B',
  white: 'W',
};

export function columnLetter(column: number): string {
  return String.fromCharCode(FIRST_COLUMN_CODE + column);
}

/**
 * Map a single column letter (either case) to a 0-based column index, or
 * null when it is not a letter or lies beyond the board's last column.
 */
export function columnFromLetter(letter: string, size: number): number | null {
  if (letter.length !== 1) {
    return null;
  }
  const column = letter.toUpperCase().charCodeAt(0) - FIRST_COLUMN_CODE;
  if (column < 0 || column >= size) {
    return null;
  }
  return column;
}

export function formatSquare(index: number, size: number): string {
  const { row, column } = coordinatesOf(index, size);
  return `${columnLetter(column).toLowerCase()}${row + 1}`;
}

/**
 * Compact history entry, e.g. `1. B d3 (+1)` or `7. W pass`.
 */
export function formatMoveRecord(record: MoveRecord, size: number): string {
  const side = record.player === 'black' ? 'B' : 'W';
  if (record.type === 'pass') {
    return `${record.turnNumber}. ${side} pass`;
  }
  return `${record.turnNumber}. ${side} ${formatSquare(record.targetIndex, size)} (+${record.flips.length})`;
}

function rowLabel(row: number): string {
  return String(row + 1).padStart(2, ' ');
}

/**
 * Plain-text board: a header of column letters, then one line per row with
 * a right-aligned row number and `B`, `W` or a blank in each cell.
 *
 * ```
 *     A   B   C   D
 *  1|   |   |   |   |
 *  2|   | W | B |   |
 * ```
 */
export function renderBoardText(snapshot: DisplaySnapshot): string {
  const { board, size } = snapshot;
  const letters = Array.from({ length: size }, (_, column) => columnLetter(column));
  const lines = [`    ${letters.join('   ')}`];

  for (let row = 0; row < size; row++) {
    const cells = board.squares
      .slice(row * size, (row + 1) * size)
      .map((square) => STATUS_GLYPHS[square.status]);
    lines.push(`${rowLabel(row)}| ${cells.join(' | ')} |`);
  }

  return lines.join('\n');
}
