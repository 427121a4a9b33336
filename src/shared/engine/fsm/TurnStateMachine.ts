/**
 * TurnStateMachine - Finite State Machine for Othello turns
 *
 * This FSM provides explicit, type-safe turn transitions with guards.
 * All valid (state, event) → nextState transitions are declared upfront.
 *
 * Key design principles:
 * - Discriminated unions for states
 * - Guards for conditional transitions
 * - Actions for side effects (the controller applies them to the board)
 * - No transitions out of game_over
 *
 * @module TurnStateMachine
 */

import type { Player, ResolvedMove, TerminationReason } from '../../types/game';
import { opponentOf } from '../../types/game';
import { EngineError, EngineErrorCode } from '../errors';

// ═══════════════════════════════════════════════════════════════════════════
// STATES
// ═══════════════════════════════════════════════════════════════════════════

export type TurnState = AwaitingMoveState | GameOverState;

export interface AwaitingMoveState {
  readonly phase: 'awaiting_move';
  readonly player: Player;
  /** Placements accepted so far. */
  readonly turnNumber: number;
}

export interface GameOverState {
  readonly phase: 'game_over';
  readonly reason: TerminationReason;
  readonly winner: Player | null;
  readonly turnNumber: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════

export type TurnEvent =
  | { readonly type: 'PLACE_PIECE'; readonly move: ResolvedMove }
  | { readonly type: 'PASS'; readonly player: Player }
  | { readonly type: 'QUIT' }
  | {
      readonly type: 'END_GAME';
      readonly reason: Exclude<TerminationReason, 'quit'>;
      readonly winner: Player | null;
    };

// ═══════════════════════════════════════════════════════════════════════════
// TRANSITION RESULT
// ═══════════════════════════════════════════════════════════════════════════

export type TransitionResult =
  | { readonly ok: true; readonly state: TurnState; readonly actions: Action[] }
  | { readonly ok: false; readonly error: TransitionError };

export interface TransitionError {
  readonly code: 'INVALID_EVENT' | 'GUARD_FAILED';
  readonly message: string;
  readonly currentPhase: string;
  readonly eventType: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// ACTIONS
// ═══════════════════════════════════════════════════════════════════════════

export type Action =
  | {
      readonly type: 'APPLY_PLACEMENT';
      readonly player: Player;
      readonly targetIndex: number;
      readonly flips: readonly number[];
    }
  | { readonly type: 'RECORD_PASS'; readonly player: Player }
  | { readonly type: 'ADVANCE_PLAYER'; readonly from: Player; readonly to: Player };

// ═══════════════════════════════════════════════════════════════════════════
// STATE MACHINE IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Pure transition function - the heart of the FSM.
 * Takes current state + event, returns new state + actions (or error).
 */
export function transition(state: TurnState, event: TurnEvent): TransitionResult {
  switch (state.phase) {
    case 'awaiting_move':
      return handleAwaitingMove(state, event);
    case 'game_over':
      return invalidTransition(state, event, 'Game is over - no transitions allowed');
  }
}

function handleAwaitingMove(state: AwaitingMoveState, event: TurnEvent): TransitionResult {
  switch (event.type) {
    case 'PLACE_PIECE': {
      const { move } = event;
      if (move.player !== state.player) {
        return guardFailed(state, event, `It is ${state.player}'s turn, not ${move.player}'s`);
      }
      if (move.flips.length === 0) {
        return guardFailed(state, event, 'A placement must flip at least one square');
      }
      const next = opponentOf(state.player);
      return ok<AwaitingMoveState>(
        { phase: 'awaiting_move', player: next, turnNumber: state.turnNumber + 1 },
        [
          {
            type: 'APPLY_PLACEMENT',
            player: move.player,
            targetIndex: move.targetIndex,
            flips: move.flips,
          },
          { type: 'ADVANCE_PLAYER', from: state.player, to: next },
        ]
      );
    }

    case 'PASS': {
      if (event.player !== state.player) {
        return guardFailed(state, event, `Only ${state.player} can pass now`);
      }
      const next = opponentOf(state.player);
      return ok<AwaitingMoveState>(
        { phase: 'awaiting_move', player: next, turnNumber: state.turnNumber },
        [
          { type: 'RECORD_PASS', player: state.player },
          { type: 'ADVANCE_PLAYER', from: state.player, to: next },
        ]
      );
    }

    case 'QUIT':
      return ok<GameOverState>(
        { phase: 'game_over', reason: 'quit', winner: null, turnNumber: state.turnNumber },
        []
      );

    case 'END_GAME':
      return ok<GameOverState>(
        {
          phase: 'game_over',
          reason: event.reason,
          winner: event.winner,
          turnNumber: state.turnNumber,
        },
        []
      );
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════

function ok<S extends TurnState>(state: S, actions: Action[]): TransitionResult {
  return { ok: true, state, actions };
}

function invalidTransition(state: TurnState, event: TurnEvent, message?: string): TransitionResult {
  return {
    ok: false,
    error: {
      code: 'INVALID_EVENT',
      message: message || `Event '${event.type}' not valid in phase '${state.phase}'`,
      currentPhase: state.phase,
      eventType: event.type,
    },
  };
}

function guardFailed(state: TurnState, event: TurnEvent, message: string): TransitionResult {
  return {
    ok: false,
    error: {
      code: 'GUARD_FAILED',
      message,
      currentPhase: state.phase,
      eventType: event.type,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// STATE MACHINE CLASS WRAPPER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * TurnStateMachine class - wraps pure transition function with state management.
 */
export class TurnStateMachine {
  private _state: TurnState;
  private readonly history: Array<{ state: TurnState; event: TurnEvent }> = [];

  constructor(initialState: TurnState = TurnStateMachine.createInitialState()) {
    this._state = initialState;
  }

  get state(): TurnState {
    return this._state;
  }

  get isTerminal(): boolean {
    return this._state.phase === 'game_over';
  }

  /**
   * Send an event to the state machine.
   * Returns actions to apply if successful, or throws an EngineError on an
   * invalid transition.
   */
  send(event: TurnEvent): Action[] {
    const result = transition(this._state, event);

    if (result.ok === false) {
      const { code, message, currentPhase, eventType } = result.error;
      throw new EngineError(
        EngineErrorCode.FSM_INVALID_TRANSITION,
        `[FSM] ${code}: ${message} (phase=${currentPhase}, event=${eventType})`,
        { code, currentPhase, eventType },
        'TurnStateMachine'
      );
    }

    this.history.push({ state: this._state, event });
    this._state = result.state;
    return result.actions;
  }

  /**
   * Check if an event is valid in the current state.
   */
  canSend(event: TurnEvent): boolean {
    return transition(this._state, event).ok;
  }

  /**
   * Get the transition history for debugging.
   */
  getHistory(): ReadonlyArray<{ state: TurnState; event: TurnEvent }> {
    return this.history;
  }

  /**
   * Create initial state for a new game. Black moves first.
   */
  static createInitialState(startingPlayer: Player = 'black'): AwaitingMoveState {
    return { phase: 'awaiting_move', player: startingPlayer, turnNumber: 0 };
  }
}
