import {
  BOARD_SIZE_DEFAULT,
  BoardState,
  DisplaySnapshot,
  GameState,
  GameStatus,
  MoveRecord,
  Player,
  ResolvedMove,
  Score,
  TerminationReason,
  opponentOf,
} from '../types/game';
import {
  assertBoardShape,
  cloneBoard,
  countSquares,
  createBoard,
  indexOf,
  isBoardFull,
  isOnBoard,
  replaceSquares,
} from './board';
import { enumerateLegalMoves, hasAnyLegalMove, resolveCapture } from './captureLogic';
import { EngineErrorCode, InputViolation, RejectionCode, outOfRange } from './errors';
import { Action, TurnStateMachine } from './fsm';
import { debugLog, isEngineDebugEnabled } from '../utils/envFlags';

/**
 * A placement addressed by board coordinates: `row` is 1-based (1..size),
 * `column` is 0-based (0..size-1), as produced by a letter-to-column mapping.
 */
export interface PlacementInput {
  row: number;
  column: number;
}

/**
 * Check a coordinate pair against the board before it reaches the resolver.
 * Returns the violation rather than throwing so callers can re-prompt.
 */
export function validatePlacementInput(
  input: PlacementInput,
  size: number
): InputViolation | null {
  const { row, column } = input;
  const rowValid = Number.isInteger(row) && row >= 1 && row <= size;
  const columnValid = Number.isInteger(column) && column >= 0 && column < size;
  if (rowValid && columnValid) {
    return null;
  }
  return new InputViolation(
    EngineErrorCode.INPUT_INVALID,
    `Row must be 1-${size} and column 0-${size - 1}, got row ${row}, column ${column}`,
    { row, column, size }
  );
}

export type MoveOutcome =
  | {
      readonly accepted: true;
      readonly move: ResolvedMove;
      /** Players whose turn was skipped after this move because they had no placement. */
      readonly passes: readonly Player[];
      readonly state: GameState;
    }
  | {
      readonly accepted: false;
      readonly code: RejectionCode;
      readonly reason: string;
      readonly state: GameState;
    };

export interface GameEngineOptions {
  /** Board edge length; defaults to 8. Ignored when `initialBoard` is given. */
  size?: number;
  /** Start from this position instead of the standard opening. The board is copied. */
  initialBoard?: BoardState;
  /** Player to move first; defaults to black. */
  startingPlayer?: Player;
}

/**
 * Authoritative Othello game controller.
 *
 * Owns the board and the turn state machine, and is the only code that
 * mutates the board. Each accepted placement commits the new piece and all
 * of its flips through a single {@link replaceSquares} call. After every
 * accepted move the controller settles the turn: it ends the game when the
 * board is full or neither side can move, and skips a player who has no
 * legal placement.
 *
 * Instances are single-writer: drive one game from one caller.
 */
export class GameEngine {
  private readonly board: BoardState;
  private readonly machine: TurnStateMachine;
  private readonly moveHistory: MoveRecord[] = [];

  constructor(options: GameEngineOptions = {}) {
    this.board = options.initialBoard
      ? cloneBoard(assertBoardShape(options.initialBoard))
      : createBoard(options.size ?? BOARD_SIZE_DEFAULT);
    this.machine = new TurnStateMachine(
      TurnStateMachine.createInitialState(options.startingPlayer ?? 'black')
    );
    this.settleTurn();
  }

  get size(): number {
    return this.board.size;
  }

  get activePlayer(): Player {
    return this.resolveActivePlayer();
  }

  get isGameOver(): boolean {
    return this.machine.isTerminal;
  }

  public getGameState(): GameState {
    const state = this.machine.state;
    return {
      board: cloneBoard(this.board),
      activePlayer: this.resolveActivePlayer(),
      turnNumber: state.turnNumber,
      status: this.buildStatus(),
    };
  }

  public getSnapshot(): DisplaySnapshot {
    const score = this.getScore();
    return {
      board: cloneBoard(this.board),
      size: this.board.size,
      activePlayer: this.resolveActivePlayer(),
      blackCount: score.black,
      whiteCount: score.white,
    };
  }

  public getScore(): Score {
    const counts = countSquares(this.board);
    return { black: counts.black, white: counts.white };
  }

  public getMoveHistory(): MoveRecord[] {
    return this.moveHistory.slice();
  }

  /**
   * Legal placements for the player on turn; empty once the game is over.
   */
  public getLegalMoves(): ResolvedMove[] {
    const state = this.machine.state;
    if (state.phase === 'game_over') {
      return [];
    }
    return enumerateLegalMoves(this.board, state.player);
  }

  /**
   * Play the active player's piece at a coordinate pair. Once the game is
   * over every call is rejected with FSM_GAME_OVER; otherwise coordinates
   * outside the board are rejected with INPUT_INVALID. Neither changes
   * anything.
   */
  public playMove(input: PlacementInput): MoveOutcome {
    const state = this.machine.state;
    if (state.phase === 'game_over') {
      return this.gameOver(state.reason);
    }

    const violation = validatePlacementInput(input, this.board.size);
    if (violation) {
      return this.reject(EngineErrorCode.INPUT_INVALID, violation.message);
    }
    return this.playIndex(indexOf(input.row - 1, input.column, this.board.size));
  }

  /**
   * Play the active player's piece at a board index.
   *
   * @throws BoardConstraintViolation when `targetIndex` is off the board.
   */
  public playIndex(targetIndex: number): MoveOutcome {
    if (!isOnBoard(this.board, targetIndex)) {
      throw outOfRange(targetIndex, this.board.size, 'GameEngine');
    }

    const state = this.machine.state;
    if (state.phase === 'game_over') {
      return this.gameOver(state.reason);
    }

    const resolution = resolveCapture(this.board, state.player, targetIndex);
    if (resolution.ok === false) {
      return this.reject(resolution.code, resolution.reason);
    }

    const historyStart = this.moveHistory.length;
    this.applyActions(this.machine.send({ type: 'PLACE_PIECE', move: resolution.move }));
    this.settleTurn();

    const passes = this.moveHistory
      .slice(historyStart)
      .filter((record) => record.type === 'pass')
      .map((record) => record.player);

    return { accepted: true, move: resolution.move, passes, state: this.getGameState() };
  }

  /**
   * End the game at the operator's request. A quit game has no winner. Has
   * no effect on a game that is already over.
   */
  public quit(): GameState {
    if (!this.machine.isTerminal) {
      this.machine.send({ type: 'QUIT' });
    }
    return this.getGameState();
  }

  private applyActions(actions: Action[]): void {
    for (const action of actions) {
      switch (action.type) {
        case 'APPLY_PLACEMENT': {
          const changes = new Map<number, Player>();
          changes.set(action.targetIndex, action.player);
          for (const index of action.flips) {
            changes.set(index, action.player);
          }
          replaceSquares(this.board, changes);
          this.moveHistory.push({
            type: 'placement',
            turnNumber: this.machine.state.turnNumber,
            player: action.player,
            targetIndex: action.targetIndex,
            flips: action.flips,
          });
          break;
        }
        case 'RECORD_PASS':
          this.moveHistory.push({
            type: 'pass',
            turnNumber: this.machine.state.turnNumber,
            player: action.player,
          });
          break;
        case 'ADVANCE_PLAYER':
          debugLog(isEngineDebugEnabled(), '[GameEngine] advance', action);
          break;
      }
    }
  }

  /**
   * Bring the machine to a state where the player on turn can move, or end
   * the game.
   */
  private settleTurn(): void {
    const state = this.machine.state;
    if (state.phase === 'game_over') {
      return;
    }

    if (isBoardFull(this.board)) {
      this.endGame('board_full');
      return;
    }

    if (hasAnyLegalMove(this.board, state.player)) {
      return;
    }

    if (!hasAnyLegalMove(this.board, opponentOf(state.player))) {
      this.endGame('no_legal_moves');
      return;
    }

    debugLog(isEngineDebugEnabled(), '[GameEngine] pass', { player: state.player });
    this.applyActions(this.machine.send({ type: 'PASS', player: state.player }));
  }

  private endGame(reason: 'no_legal_moves' | 'board_full'): void {
    this.machine.send({ type: 'END_GAME', reason, winner: this.leader() });
  }

  private leader(): Player | null {
    const score = this.getScore();
    if (score.black === score.white) {
      return null;
    }
    return score.black > score.white ? 'black' : 'white';
  }

  private buildStatus(): GameStatus {
    const state = this.machine.state;
    if (state.phase === 'awaiting_move') {
      return { kind: 'in_progress' };
    }
    return {
      kind: 'terminated',
      reason: state.reason,
      winner: state.winner,
      score: this.getScore(),
    };
  }

  /**
   * The player on turn. After the game ends this stays on whoever would have
   * moved next, which keeps snapshots meaningful.
   */
  private resolveActivePlayer(): Player {
    const state = this.machine.state;
    if (state.phase === 'awaiting_move') {
      return state.player;
    }
    return this.lastActivePlayer();
  }

  private lastActivePlayer(): Player {
    const history = this.machine.getHistory();
    const last = history[history.length - 1];
    if (last && last.state.phase === 'awaiting_move') {
      return last.state.player;
    }
    return 'black';
  }

  private gameOver(reason: TerminationReason): MoveOutcome {
    return this.reject(EngineErrorCode.FSM_GAME_OVER, `Game is over (${reason})`);
  }

  private reject(code: RejectionCode, reason: string): MoveOutcome {
    return { accepted: false, code, reason, state: this.getGameState() };
  }
}
