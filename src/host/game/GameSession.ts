import { v4 as uuidv4 } from 'uuid';
import type winston from 'winston';
import {
  DisplaySnapshot,
  EngineErrorCode,
  GameEngine,
  GameState,
  MoveOutcome,
  RejectionCode,
  columnFromLetter,
  formatMoveRecord,
  formatSquare,
  renderBoardText,
  wrapEngineError,
} from '../../shared/engine';
import { TurnInputSchema } from '../../shared/validation/schemas';
import { config } from '../config';
import { gameLogger } from '../utils/logger';

export interface GameSessionOptions {
  gameId?: string;
  /** Defaults to the configured OTHELLO_BOARD_SIZE. */
  boardSize?: number;
  /** Defaults to a child of the shared winston logger. */
  logger?: winston.Logger;
}

export type TurnOutcome =
  | MoveOutcome
  | { readonly accepted: true; readonly quit: true; readonly state: GameState };

/**
 * GameSession wraps one GameEngine for a host that talks to a human operator.
 *
 * It accepts raw turn input (`{ kind: 'move', row, column: 'd' }` or
 * `{ kind: 'quit' }`), validates it, maps the column letter to an index and
 * forwards it to the engine. Every rejection is logged and returned with its
 * reason so the caller can re-prompt.
 */
export class GameSession {
  public readonly gameId: string;
  private readonly engine: GameEngine;
  private readonly log: winston.Logger;

  constructor(options: GameSessionOptions = {}) {
    this.gameId = options.gameId ?? uuidv4();
    this.engine = new GameEngine({ size: options.boardSize ?? config.game.boardSize });
    this.log = options.logger ?? gameLogger(this.gameId);

    this.log.info('Game session started', {
      gameId: this.gameId,
      boardSize: this.engine.size,
    });
  }

  get isGameOver(): boolean {
    return this.engine.isGameOver;
  }

  /**
   * Apply one turn of operator input.
   */
  public submit(input: unknown): TurnOutcome {
    const parsed = TurnInputSchema.safeParse(input);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
      return this.rejected(EngineErrorCode.INPUT_INVALID, reason);
    }

    const turn = parsed.data;
    if (turn.kind === 'quit') {
      const state = this.engine.quit();
      this.log.info('Game quit by operator', { gameId: this.gameId, turnNumber: state.turnNumber });
      return { accepted: true, quit: true, state };
    }

    const column = columnFromLetter(turn.column, this.engine.size);
    if (column === null) {
      return this.rejected(
        EngineErrorCode.INPUT_INVALID,
        `Column '${turn.column}' is not on a ${this.engine.size}x${this.engine.size} board`
      );
    }

    const outcome = this.play(turn.row, column);
    if (outcome.accepted === false) {
      this.logRejection(outcome.code, outcome.reason);
      return outcome;
    }

    this.log.debug('Move accepted', {
      gameId: this.gameId,
      player: outcome.move.player,
      square: formatSquare(outcome.move.targetIndex, this.engine.size),
      flips: outcome.move.flips.length,
    });
    for (const player of outcome.passes) {
      this.log.info('Player has no legal placement; turn passes', { gameId: this.gameId, player });
    }
    if (outcome.state.status.kind === 'terminated') {
      this.log.info('Game over', { gameId: this.gameId, ...outcome.state.status });
    }

    return outcome;
  }

  public getSnapshot(): DisplaySnapshot {
    return this.engine.getSnapshot();
  }

  public getGameState(): GameState {
    return this.engine.getGameState();
  }

  public render(): string {
    return renderBoardText(this.engine.getSnapshot());
  }

  /**
   * Human-readable move list, one entry per placement or pass.
   */
  public getMoveHistory(): string[] {
    return this.engine
      .getMoveHistory()
      .map((record) => formatMoveRecord(record, this.engine.size));
  }

  /**
   * The engine only throws on a broken invariant. Such failures are logged
   * with their context and rethrown as EngineErrors.
   */
  private play(row: number, column: number): MoveOutcome {
    try {
      return this.engine.playMove({ row, column });
    } catch (error) {
      const wrapped = wrapEngineError(error, 'GameSession', { gameId: this.gameId, row, column });
      this.log.error('Engine failure', { gameId: this.gameId, error: wrapped.toJSON() });
      throw wrapped;
    }
  }

  private rejected(code: RejectionCode, reason: string): TurnOutcome {
    this.logRejection(code, reason);
    return { accepted: false, code, reason, state: this.engine.getGameState() };
  }

  private logRejection(code: RejectionCode, reason: string): void {
    this.log.warn('Turn rejected', {
      gameId: this.gameId,
      code,
      reason,
      activePlayer: this.engine.activePlayer,
    });
  }
}
