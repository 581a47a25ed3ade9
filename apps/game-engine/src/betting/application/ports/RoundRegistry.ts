import { Round } from '@engine/domain/Round';
import { Bet } from '@betting/domain/Bet';

/**
 * Single-writer home of the current round, plus a short tail of
 * finished rounds so their bets stay addressable.
 */
export interface RoundRegistry {
  current(): Round | null;
  open(round: Round): void;
  findRound(roundId: number): Round | undefined;
  findBet(betId: string): Bet | undefined;
}
