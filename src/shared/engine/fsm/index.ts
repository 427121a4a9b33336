/**
 * Turn FSM module exports
 */

export {
  TurnStateMachine,
  transition,
  type TurnState,
  type TurnEvent,
  type TransitionResult,
  type TransitionError,
  type Action,
  type AwaitingMoveState,
  type GameOverState,
} from './TurnStateMachine';
