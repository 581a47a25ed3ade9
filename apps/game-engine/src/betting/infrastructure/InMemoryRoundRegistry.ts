import { RoundRegistry } from '@betting/application/ports/RoundRegistry';
import { Bet } from '@betting/domain/Bet';
import { Round } from '@engine/domain/Round';

export class InMemoryRoundRegistry implements RoundRegistry {
  private readonly rounds = new Map<number, Round>();
  private currentRound: Round | null = null;

  /** `retainedRounds` finished rounds stay addressable besides the current one. */
  constructor(private readonly retainedRounds = 20) {}

  current(): Round | null {
    return this.currentRound;
  }

  open(round: Round): void {
    if (this.rounds.has(round.id)) {
      throw new Error(`Round ${round.id} is already registered`);
    }
    this.rounds.set(round.id, round);
    this.currentRound = round;

    while (this.rounds.size > this.retainedRounds + 1) {
      const oldest = this.rounds.keys().next();
      if (oldest.done) break;
      this.rounds.delete(oldest.value);
    }
  }

  findRound(roundId: number): Round | undefined {
    return this.rounds.get(roundId);
  }

  findBet(betId: string): Bet | undefined {
    for (const round of this.rounds.values()) {
      const bet = round.bets.getById(betId);
      if (bet) return bet;
    }
    return undefined;
  }
}
