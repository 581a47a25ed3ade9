import { InvalidStateTransition } from '@shared/kernel/DomainError';
import { BetSnapshot } from '@shared/kernel/BetSnapshot';
import { toBetSnapshot } from '@betting/application/mappers/toBetSnapshot';
import { CreditDispatcher } from '@betting/application/CreditDispatcher';
import { EventPublisher } from '@engine/application/ports/EventPublisher';
import { PromiseTracker } from '@engine/application/PromiseTracker';
import { Round } from '@engine/domain/Round';
import { RoundPhase } from '@engine/domain/RoundPhase';

/**
 * End-of-round bookkeeping. Both operations only touch bets still
 * PLACED, so repeating either one is a no-op.
 */
export class SettleRoundUseCase {
  constructor(
    private readonly credits: CreditDispatcher,
    private readonly eventPublisher: EventPublisher,
    private readonly events: PromiseTracker,
  ) {}

  settleLosses(round: Round): BetSnapshot[] {
    if (round.phase !== RoundPhase.CRASHED) {
      throw new InvalidStateTransition(`Cannot settle losses of round ${round.id} in ${round.phase}`);
    }

    return round.bets.settleLosses().map((bet) => {
      const snapshot = toBetSnapshot(bet);
      this.events.track(this.eventPublisher.betLost(snapshot));
      return snapshot;
    });
  }

  refundVoided(round: Round): BetSnapshot[] {
    if (round.phase !== RoundPhase.VOIDED) {
      throw new InvalidStateTransition(`Cannot refund bets of round ${round.id} in ${round.phase}`);
    }

    return round.bets.voidPlaced().map((bet) => {
      this.credits.dispatch({
        kind: 'REFUND',
        accountId: bet.accountId,
        roundId: round.id,
        betId: bet.id,
        amount: bet.stake,
      });
      const snapshot = toBetSnapshot(bet);
      this.events.track(this.eventPublisher.betVoided(snapshot));
      return snapshot;
    });
  }
}
