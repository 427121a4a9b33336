/**
 * Test suite for src/shared/engine/captureLogic.ts
 */

import {
  enumerateLegalMoves,
  findCaptureLine,
  hasAnyLegalMove,
  resolveCapture,
  resolveCaptureOrThrow,
} from '../../../src/shared/engine/captureLogic';
import { createBoard } from '../../../src/shared/engine/board';
import { EngineErrorCode, RulesViolation } from '../../../src/shared/engine/errors';
import { boardFromRows, boardToRows, squareIndex } from '../../helpers/boardFixtures';

describe('captureLogic', () => {
  describe('findCaptureLine', () => {
    it('should collect opponent squares up to the mover’s own square', () => {
      const board = boardFromRows(['.WWB', '....', '....', '....']);
      expect(findCaptureLine(board, 'black', 0, 'right')).toEqual([1, 2]);
    });

    it('should return nothing when the run reaches the edge', () => {
      const board = boardFromRows(['.WWW', '....', '....', '....']);
      expect(findCaptureLine(board, 'black', 0, 'right')).toEqual([]);
    });

    it('should return nothing when the run reaches an empty square', () => {
      const board = boardFromRows(['.W.B', '....', '....', '....']);
      expect(findCaptureLine(board, 'black', 0, 'right')).toEqual([]);
    });

    it('should return nothing when the first square is the mover’s own', () => {
      const board = boardFromRows(['.BWB', '....', '....', '....']);
      expect(findCaptureLine(board, 'black', 0, 'right')).toEqual([]);
    });

    it('should not continue a line across the row boundary', () => {
      // Stepping left from square 4 would land on square 3 without the row guard.
      const board = boardFromRows(['...B', 'W...', '....', '....']);
      expect(findCaptureLine(board, 'black', 5, 'left')).toEqual([]);
      expect(resolveCapture(board, 'black', 5)).toEqual({
        ok: false,
        code: EngineErrorCode.RULES_NO_CAPTURES,
        reason: 'Placing black at square 5 captures nothing',
      });
    });
  });

  describe('resolveCapture', () => {
    it('should flip exactly one square for black at row 4, column c', () => {
      const board = createBoard(8);
      const target = squareIndex(4, 'c', 8);
      const resolution = resolveCapture(board, 'black', target);

      expect(resolution).toEqual({
        ok: true,
        move: {
          targetIndex: 26,
          player: 'black',
          lines: [{ direction: 'right', indices: [27] }],
          flips: [27],
        },
      });
    });

    it('should reject an occupied square', () => {
      const resolution = resolveCapture(createBoard(8), 'black', squareIndex(4, 'd', 8));

      expect(resolution).toEqual({
        ok: false,
        code: EngineErrorCode.RULES_OCCUPIED_SQUARE,
        reason: 'Square 27 is already occupied by white',
      });
    });

    it('should reject a placement touching only its own colour', () => {
      const resolution = resolveCapture(createBoard(8), 'black', squareIndex(6, 'c', 8));

      expect(resolution.ok).toBe(false);
      if (resolution.ok === false) {
        expect(resolution.code).toBe(EngineErrorCode.RULES_NO_CAPTURES);
      }
    });

    it('should reject a placement with no neighbours at all', () => {
      const resolution = resolveCapture(createBoard(8), 'white', 0);
      expect(resolution.ok).toBe(false);
    });

    it('should union capture lines from several directions', () => {
      const board = boardFromRows([
        'B.B.B.',
        '.WWW..',
        'BW.WB.',
        '.WWW..',
        'B.B.B.',
        '......',
      ]);
      const target = 14; // row 2, column 2

      const move = resolveCaptureOrThrow(board, 'black', target);

      expect(move.lines).toEqual([
        { direction: 'up', indices: [8] },
        { direction: 'down', indices: [20] },
        { direction: 'left', indices: [13] },
        { direction: 'right', indices: [15] },
        { direction: 'up_left', indices: [7] },
        { direction: 'up_right', indices: [9] },
        { direction: 'down_left', indices: [19] },
        { direction: 'down_right', indices: [21] },
      ]);
      expect(move.flips).toEqual([8, 20, 13, 15, 7, 9, 19, 21]);
    });

    it('should order each line closest first', () => {
      const board = boardFromRows(['B...', 'W...', 'W...', '....']);
      const move = resolveCaptureOrThrow(board, 'black', 12);

      expect(move.lines).toEqual([{ direction: 'up', indices: [8, 4] }]);
    });

    it('should not modify the board', () => {
      const board = createBoard(8);
      const before = boardToRows(board);
      resolveCapture(board, 'black', 26);
      expect(boardToRows(board)).toEqual(before);
    });

    it('should throw OutOfRange for a target off the board', () => {
      expect(() => resolveCapture(createBoard(4), 'black', 16)).toThrow(
        expect.objectContaining({ code: EngineErrorCode.BOARD_OUT_OF_RANGE })
      );
    });
  });

  describe('resolveCaptureOrThrow', () => {
    it('should throw a RulesViolation with the rejection code', () => {
      expect(() => resolveCaptureOrThrow(createBoard(8), 'black', 27)).toThrow(RulesViolation);
      expect(() => resolveCaptureOrThrow(createBoard(8), 'black', 0)).toThrow(
        expect.objectContaining({
          code: EngineErrorCode.RULES_NO_CAPTURES,
          context: { player: 'black', targetIndex: 0 },
        })
      );
    });
  });

  describe('legal move enumeration', () => {
    it('should find the four opening moves for black', () => {
      const moves = enumerateLegalMoves(createBoard(8), 'black');
      expect(moves.map((m) => m.targetIndex)).toEqual([19, 26, 37, 44]);
    });

    it('should find the four opening moves for white', () => {
      const moves = enumerateLegalMoves(createBoard(8), 'white');
      expect(moves.map((m) => m.targetIndex)).toEqual([20, 29, 34, 43]);
    });

    it('should report whether a player can move', () => {
      const board = boardFromRows(['BBBB', 'BBBB', 'BBB.', 'BBBW']);
      expect(hasAnyLegalMove(board, 'black')).toBe(false);
      expect(hasAnyLegalMove(board, 'white')).toBe(false);
      expect(hasAnyLegalMove(createBoard(4), 'white')).toBe(true);
    });
  });
});
