import { z } from 'zod';

/**
 * Inbound request payloads. Anything malformed is answered with
 * INVALID_PAYLOAD before it reaches a use case.
 */

export const placeBetSchema = z.object({
  accountId: z.string().min(1),
  // Range checks belong to the use case, which answers INVALID_STAKE.
  stakeCents: z.number(),
  autoCashoutTarget: z.number().optional(),
});

export const cashoutSchema = z.object({
  accountId: z.string().min(1),
  betId: z.string().min(1),
});

export const currentRoundSchema = z.object({});

export const recentRoundsSchema = z.object({
  limit: z.number().int().positive().max(100).optional(),
});

export const verifyRoundSchema = z.object({
  roundId: z.number().int().positive(),
});

export const betQuerySchema = z.object({
  betId: z.string().min(1),
});
