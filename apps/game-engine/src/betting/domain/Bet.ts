import { BetStatus } from '@betting/domain/BetStatus';
import { Money } from '@shared/kernel/Money';
import {
  AlreadySettledError,
  InvalidAutoCashoutError,
  InvalidStakeError,
} from '@shared/kernel/DomainError';

/**
 * A stake on one round. Leaves PLACED exactly once, into
 * CASHED_OUT, LOST or VOIDED.
 */
export class Bet {
  private _status: BetStatus = BetStatus.PLACED;
  private _cashoutMultiplier?: number;
  private _payout?: Money;

  constructor(
    readonly id: string,
    readonly accountId: string,
    readonly roundId: number,
    readonly stake: Money,
    readonly autoCashoutTarget?: number,
  ) {
    if (stake.isZero()) {
      throw new InvalidStakeError('Stake must be greater than zero');
    }
    if (
      autoCashoutTarget !== undefined &&
      (!Number.isFinite(autoCashoutTarget) || autoCashoutTarget < 1.0)
    ) {
      throw new InvalidAutoCashoutError(
        `Auto-cashout target must be >= 1.00, got ${autoCashoutTarget}`,
      );
    }
  }

  get status(): BetStatus {
    return this._status;
  }

  get cashoutMultiplier(): number | undefined {
    return this._cashoutMultiplier;
  }

  /** Amount owed back to the account: winnings, refund, or zero. */
  get payout(): Money | undefined {
    return this._payout;
  }

  get isSettled(): boolean {
    return this._status !== BetStatus.PLACED;
  }

  cashOut(hundredths: number): Money {
    this.assertPlaced('cash out');
    this._status = BetStatus.CASHED_OUT;
    this._cashoutMultiplier = hundredths / 100;
    this._payout = this.stake.multiplyByHundredths(hundredths);
    return this._payout;
  }

  lose(): void {
    this.assertPlaced('lose');
    this._status = BetStatus.LOST;
    this._payout = Money.zero();
  }

  voidStake(): Money {
    this.assertPlaced('void');
    this._status = BetStatus.VOIDED;
    this._payout = this.stake;
    return this._payout;
  }

  shouldAutoCashout(currentMultiplier: number): boolean {
    return (
      this._status === BetStatus.PLACED &&
      this.autoCashoutTarget !== undefined &&
      currentMultiplier >= this.autoCashoutTarget
    );
  }

  private assertPlaced(action: string): void {
    if (this._status !== BetStatus.PLACED) {
      throw new AlreadySettledError(`Cannot ${action} bet ${this.id} in state ${this._status}`);
    }
  }
}
