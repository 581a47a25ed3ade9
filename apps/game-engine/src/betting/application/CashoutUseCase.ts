import { Clock } from '@shared/ports/Clock';
import { Money } from '@shared/kernel/Money';
import { AlreadySettledError } from '@shared/kernel/DomainError';
import { Bet } from '@betting/domain/Bet';
import { RoundRegistry } from '@betting/application/ports/RoundRegistry';
import { CashoutCommand } from '@betting/application/commands/CashoutCommand';
import { CashoutResult } from '@betting/application/commands/CashoutResult';
import { toBetSnapshot } from '@betting/application/mappers/toBetSnapshot';
import { CreditDispatcher } from '@betting/application/CreditDispatcher';
import { EventPublisher } from '@engine/application/ports/EventPublisher';
import { PromiseTracker } from '@engine/application/PromiseTracker';
import { Multiplier } from '@engine/domain/Multiplier';
import { Round } from '@engine/domain/Round';

export class CashoutUseCase {
  constructor(
    private readonly registry: RoundRegistry,
    private readonly credits: CreditDispatcher,
    private readonly eventPublisher: EventPublisher,
    private readonly events: PromiseTracker,
    private readonly clock: Clock,
  ) {}

  /** Manual cashout at the current multiplier, truncated to hundredths. */
  execute(cmd: CashoutCommand): CashoutResult {
    const bet = this.registry.findBet(cmd.betId);
    if (!bet) {
      return { success: false, error: 'BET_NOT_FOUND' };
    }
    if (bet.accountId !== cmd.accountId) {
      return { success: false, error: 'NOT_BET_OWNER' };
    }
    if (bet.isSettled) {
      return { success: false, error: 'ALREADY_SETTLED' };
    }

    const round = this.registry.current();
    const now = this.clock.now();
    if (!round || round.id !== bet.roundId || !round.isInFlightAt(now)) {
      return { success: false, error: 'WINDOW_CLOSED' };
    }

    return this.settle(round, bet, Multiplier.toHundredths(round.multiplierAt(now)));
  }

  /** Pays an auto-cashout bet at its target rather than at the current multiplier. */
  settleAutoCashout(round: Round, bet: Bet): CashoutResult {
    if (bet.autoCashoutTarget === undefined) {
      return { success: false, error: 'BET_NOT_FOUND' };
    }
    return this.settle(round, bet, Multiplier.toHundredths(bet.autoCashoutTarget));
  }

  private settle(round: Round, bet: Bet, hundredths: number): CashoutResult {
    let payout: Money;
    try {
      payout = bet.cashOut(hundredths);
    } catch (err) {
      if (err instanceof AlreadySettledError) {
        return { success: false, error: 'ALREADY_SETTLED' };
      }
      throw err;
    }

    this.credits.dispatch({
      kind: 'PAYOUT',
      accountId: bet.accountId,
      roundId: round.id,
      betId: bet.id,
      amount: payout,
    });

    const snapshot = toBetSnapshot(bet);
    this.events.track(this.eventPublisher.betCashedOut(snapshot));

    return {
      success: true,
      payoutCents: payout.toCents(),
      cashoutMultiplier: hundredths / 100,
      snapshot,
    };
  }
}
