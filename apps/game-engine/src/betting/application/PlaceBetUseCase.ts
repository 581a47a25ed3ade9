import { randomUUID } from 'crypto';
import { GameConfig } from '@shared/kernel/GameConfig';
import { Money } from '@shared/kernel/Money';
import { Logger } from '@shared/ports/Logger';
import { WindowClosedError } from '@shared/kernel/DomainError';
import { Bet } from '@betting/domain/Bet';
import { AccountLedger } from '@betting/application/ports/AccountLedger';
import { RoundRegistry } from '@betting/application/ports/RoundRegistry';
import { PlaceBetCommand } from '@betting/application/commands/PlaceBetCommand';
import { PlaceBetError, PlaceBetResult } from '@betting/application/commands/PlaceBetResult';
import { toBetSnapshot } from '@betting/application/mappers/toBetSnapshot';
import { CreditDispatcher } from '@betting/application/CreditDispatcher';
import { EventPublisher } from '@engine/application/ports/EventPublisher';
import { PromiseTracker } from '@engine/application/PromiseTracker';
import { Multiplier } from '@engine/domain/Multiplier';
import { Round } from '@engine/domain/Round';

const LEDGER_ERRORS = {
  INSUFFICIENT_FUNDS: 'INSUFFICIENT_FUNDS',
  ACCOUNT_NOT_FOUND: 'ACCOUNT_NOT_FOUND',
  TIMEOUT: 'COLLABORATOR_TIMEOUT',
} as const;

/**
 * Admits a bet into the current round.
 *
 * Admission is checked before the debit; while the debit is pending the
 * placement is tracked so the scheduler can wait for it before resolving
 * the betting window. A debit that succeeds after the round was voided is
 * refunded through the credit dispatcher.
 */
export class PlaceBetUseCase {
  private readonly inFlight: PromiseTracker;

  constructor(
    private readonly config: GameConfig,
    private readonly registry: RoundRegistry,
    private readonly ledger: AccountLedger,
    private readonly credits: CreditDispatcher,
    private readonly eventPublisher: EventPublisher,
    private readonly events: PromiseTracker,
    private readonly logger: Logger,
  ) {
    this.inFlight = new PromiseTracker('placement', 5_000, logger);
  }

  execute(command: PlaceBetCommand): Promise<PlaceBetResult> {
    const round = this.registry.current();
    if (!round || !round.isAcceptingBets()) {
      return Promise.resolve(this.reject('WINDOW_CLOSED'));
    }

    const invalid = this.validate(command);
    if (invalid) {
      return Promise.resolve(this.reject(invalid));
    }

    const placement = this.place(round, command);
    this.inFlight.track(placement);
    return placement;
  }

  /** Resolves once every placement admitted so far has been recorded or rejected. */
  async awaitInFlight(): Promise<void> {
    await this.inFlight.drain();
  }

  private validate(command: PlaceBetCommand): PlaceBetError | null {
    const stake = command.stakeCents;
    if (
      !Number.isSafeInteger(stake) ||
      stake <= 0 ||
      stake < this.config.minBetCents ||
      stake > this.config.maxBetCents
    ) {
      return 'INVALID_STAKE';
    }

    const target = command.autoCashoutTarget;
    if (
      target !== undefined &&
      (!Number.isFinite(target) || target < 1.0 || target > this.config.maxMultiplier)
    ) {
      return 'INVALID_AUTO_CASHOUT';
    }
    return null;
  }

  private async place(round: Round, command: PlaceBetCommand): Promise<PlaceBetResult> {
    const stake = Money.fromCents(command.stakeCents);
    const betId = randomUUID();
    const target =
      command.autoCashoutTarget === undefined
        ? undefined
        : Multiplier.toHundredths(command.autoCashoutTarget) / 100;

    const debit = await this.ledger.debit(command.accountId, stake, `bet:${betId}`);
    if (!debit.success) {
      return this.reject(LEDGER_ERRORS[debit.error]);
    }

    const bet = new Bet(betId, command.accountId, round.id, stake, target);
    try {
      round.addBet(bet);
    } catch (err) {
      if (!(err instanceof WindowClosedError)) throw err;
      this.credits.dispatch({
        kind: 'REFUND',
        accountId: command.accountId,
        roundId: round.id,
        betId,
        amount: stake,
      });
      this.logger.warn('Round resolved while debit was pending; stake refunded', {
        roundId: round.id,
        betId,
        accountId: command.accountId,
        stakeCents: stake.toCents(),
      });
      return this.reject('WINDOW_CLOSED');
    }

    const snapshot = toBetSnapshot(bet);
    this.events.track(this.eventPublisher.betPlaced(snapshot));
    return { success: true, betId, snapshot };
  }

  private reject(error: PlaceBetError): PlaceBetResult {
    return { success: false, error };
  }
}
