/**
 * Test suite for src/shared/engine/GameEngine.ts
 *
 * Covers the turn cycle end to end: accepted and rejected placements, forced
 * passes, and every way a game can end.
 */

import { GameEngine } from '../../../src/shared/engine/GameEngine';
import { BoardConstraintViolation, EngineErrorCode } from '../../../src/shared/engine/errors';
import { boardFromRows, boardToRows } from '../../helpers/boardFixtures';

describe('GameEngine', () => {
  describe('initial state', () => {
    it('should start in progress with black to move', () => {
      const engine = new GameEngine();
      const state = engine.getGameState();

      expect(engine.size).toBe(8);
      expect(state.activePlayer).toBe('black');
      expect(state.turnNumber).toBe(0);
      expect(state.status).toEqual({ kind: 'in_progress' });
      expect(engine.getScore()).toEqual({ black: 2, white: 2 });
    });

    it('should honour a custom size', () => {
      expect(new GameEngine({ size: 6 }).getGameState().board.squares).toHaveLength(36);
    });

    it('should refuse an invalid size', () => {
      expect(() => new GameEngine({ size: 5 })).toThrow(BoardConstraintViolation);
    });

    it('should copy a supplied starting position', () => {
      const initialBoard = boardFromRows(['....', '.WB.', '.BW.', '....']);
      const engine = new GameEngine({ initialBoard, startingPlayer: 'white' });
      engine.playIndex(7);

      expect(boardToRows(initialBoard)).toEqual(['....', '.WB.', '.BW.', '....']);
      expect(boardToRows(engine.getGameState().board)).toEqual(['....', '.WWW', '.BW.', '....']);
    });
  });

  describe('accepted placements', () => {
    it('should flip one square for black at row 4, column c', () => {
      const engine = new GameEngine();
      const outcome = engine.playMove({ row: 4, column: 2 });

      expect(outcome.accepted).toBe(true);
      if (outcome.accepted) {
        expect(outcome.move.flips).toEqual([27]);
        expect(outcome.passes).toEqual([]);
      }
      const snapshot = engine.getSnapshot();
      expect(snapshot.blackCount).toBe(4);
      expect(snapshot.whiteCount).toBe(1);
      expect(snapshot.activePlayer).toBe('white');
      expect(engine.getGameState().turnNumber).toBe(1);
    });

    it('should alternate players on every accepted move', () => {
      const engine = new GameEngine();
      engine.playMove({ row: 3, column: 3 });
      expect(engine.activePlayer).toBe('white');
      engine.playMove({ row: 5, column: 2 });
      expect(engine.activePlayer).toBe('black');
    });

    it('should record placements in the move history', () => {
      const engine = new GameEngine();
      engine.playIndex(19);

      expect(engine.getMoveHistory()).toEqual([
        { type: 'placement', turnNumber: 1, player: 'black', targetIndex: 19, flips: [27] },
      ]);
    });
  });

  describe('rejected placements', () => {
    it('should reject an occupied square and change nothing', () => {
      const engine = new GameEngine();
      const before = boardToRows(engine.getGameState().board);

      const outcome = engine.playMove({ row: 4, column: 3 });

      expect(outcome.accepted).toBe(false);
      if (outcome.accepted === false) {
        expect(outcome.code).toBe(EngineErrorCode.RULES_OCCUPIED_SQUARE);
      }
      expect(boardToRows(outcome.state.board)).toEqual(before);
      expect(outcome.state.activePlayer).toBe('black');
      expect(outcome.state.turnNumber).toBe(0);
    });

    it('should reject a placement with no capture line', () => {
      const engine = new GameEngine();
      const outcome = engine.playMove({ row: 6, column: 2 });

      expect(outcome).toMatchObject({ accepted: false, code: EngineErrorCode.RULES_NO_CAPTURES });
      expect(engine.activePlayer).toBe('black');
    });

    it.each([
      { row: 0, column: 0 },
      { row: 9, column: 0 },
      { row: 1, column: -1 },
      { row: 1, column: 8 },
      { row: 2.5, column: 1 },
    ])('should reject out-of-range input %p as INPUT_INVALID', (input) => {
      const engine = new GameEngine();
      const outcome = engine.playMove(input);

      expect(outcome).toMatchObject({ accepted: false, code: EngineErrorCode.INPUT_INVALID });
      expect(engine.getGameState().turnNumber).toBe(0);
    });

    it('should throw for an index off the board', () => {
      expect(() => new GameEngine().playIndex(64)).toThrow(BoardConstraintViolation);
    });
  });

  describe('passes', () => {
    // After black takes b1 (index 2), white's two pieces are both sealed
    // against the edge, while black can still capture the white piece at a2.
    const position = ['BW..', 'W...', '....', 'BBBW'];

    it('should skip a player with no legal placement', () => {
      const engine = new GameEngine({ initialBoard: boardFromRows(position) });
      const outcome = engine.playIndex(2);

      expect(outcome.accepted).toBe(true);
      if (outcome.accepted) {
        expect(outcome.passes).toEqual(['white']);
        expect(outcome.state.activePlayer).toBe('black');
        expect(outcome.state.status).toEqual({ kind: 'in_progress' });
      }
      expect(engine.getMoveHistory().map((record) => record.type)).toEqual(['placement', 'pass']);
      expect(engine.getLegalMoves().map((move) => move.targetIndex)).toEqual([8]);
    });

    it('should end the game when neither side can move', () => {
      const engine = new GameEngine({ initialBoard: boardFromRows(position) });
      engine.playIndex(2);
      const outcome = engine.playIndex(8);

      expect(outcome.state.status).toEqual({
        kind: 'terminated',
        reason: 'no_legal_moves',
        winner: 'black',
        score: { black: 8, white: 1 },
      });
      expect(engine.isGameOver).toBe(true);
      expect(engine.getLegalMoves()).toEqual([]);
    });
  });

  describe('termination', () => {
    it('should end with no_legal_moves when a move wipes out the opponent', () => {
      const engine = new GameEngine({ initialBoard: boardFromRows(['.BW.', '....', '....', '....']) });
      const outcome = engine.playIndex(3);

      expect(outcome.state.status).toEqual({
        kind: 'terminated',
        reason: 'no_legal_moves',
        winner: 'black',
        score: { black: 3, white: 0 },
      });
    });

    it('should end with board_full when the last square is filled', () => {
      const engine = new GameEngine({
        initialBoard: boardFromRows(['BWW.', 'WWWW', 'WWWW', 'WWWW']),
      });
      const outcome = engine.playIndex(3);

      expect(outcome.state.status).toEqual({
        kind: 'terminated',
        reason: 'board_full',
        winner: 'white',
        score: { black: 4, white: 12 },
      });
    });

    it('should report a draw when the final score is level', () => {
      const engine = new GameEngine({
        initialBoard: boardFromRows(['BWW.', 'BBBB', 'WWWW', 'WWWW']),
      });
      const outcome = engine.playIndex(3);

      expect(outcome.state.status).toEqual({
        kind: 'terminated',
        reason: 'board_full',
        winner: null,
        score: { black: 8, white: 8 },
      });
    });

    it('should end immediately on quit', () => {
      const engine = new GameEngine();
      engine.playIndex(19);
      const state = engine.quit();

      expect(state.status).toEqual({
        kind: 'terminated',
        reason: 'quit',
        winner: null,
        score: { black: 4, white: 1 },
      });
      expect(state.activePlayer).toBe('white');
    });

    it('should reject moves once the game is over', () => {
      const engine = new GameEngine();
      engine.quit();
      const outcome = engine.playIndex(19);

      expect(outcome).toMatchObject({ accepted: false, code: EngineErrorCode.FSM_GAME_OVER });
      expect(engine.getScore()).toEqual({ black: 2, white: 2 });
    });

    it('should answer FSM_GAME_OVER for off-board coordinates after the game ends', () => {
      const engine = new GameEngine({ initialBoard: boardFromRows(['.BW.', '....', '....', '....']) });
      engine.playIndex(3);

      expect(engine.playMove({ row: 0, column: 0 })).toMatchObject({
        accepted: false,
        code: EngineErrorCode.FSM_GAME_OVER,
        reason: 'Game is over (no_legal_moves)',
      });
      expect(engine.playMove({ row: 2, column: 1 })).toMatchObject({
        accepted: false,
        code: EngineErrorCode.FSM_GAME_OVER,
      });
    });

    it('should ignore a second quit', () => {
      const engine = new GameEngine();
      engine.quit();
      expect(engine.quit().status).toMatchObject({ kind: 'terminated', reason: 'quit' });
    });
  });

  describe('snapshots', () => {
    it('should hand out copies that cannot reach the live board', () => {
      const engine = new GameEngine({ size: 4 });
      const snapshot = engine.getSnapshot();
      snapshot.board.squares[0] = { index: 0, status: 'black' };

      expect(engine.getGameState().board.squares[0].status).toBe('empty');
    });
  });
});
