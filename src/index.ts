export * from './shared/engine';
export { TurnInputSchema, MoveInputSchema, BoardSizeSchema } from './shared/validation/schemas';
export type { TurnInput, MoveInput } from './shared/validation/schemas';
export { GameSession } from './host/game/GameSession';
export type { GameSessionOptions, TurnOutcome } from './host/game/GameSession';
