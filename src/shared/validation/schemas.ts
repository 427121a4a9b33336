import { z } from 'zod';
import { BOARD_SIZE_MIN } from '../types/game';

// Board size: even integer, at least 4. Columns are lettered, so 26 is the
// largest size notation can address.
export const BoardSizeSchema = z
  .number()
  .int()
  .min(BOARD_SIZE_MIN)
  .max(26)
  .refine((size) => size % 2 === 0, { message: 'Board size must be even' });

// Turn input as supplied by whatever reads it from the operator. The row is
// 1-based; the column is a single letter, matched case-insensitively.
export const MoveInputSchema = z.object({
  kind: z.literal('move'),
  row: z.number().int().min(1),
  column: z.string().regex(/^[A-Za-z]$/, 'Column must be a single letter'),
});

export const QuitInputSchema = z.object({
  kind: z.literal('quit'),
});

export const TurnInputSchema = z.discriminatedUnion('kind', [MoveInputSchema, QuitInputSchema]);

export type MoveInput = z.infer<typeof MoveInputSchema>;
export type TurnInput = z.infer<typeof TurnInputSchema>;
