import { Bet } from '@betting/domain/Bet';
import { BetStatus } from '@betting/domain/BetStatus';
import { Money } from '@shared/kernel/Money';
import { DuplicateBetError } from '@shared/kernel/DomainError';

export interface LedgerTotals {
  wageredCents: number;
  paidOutCents: number;
  refundedCents: number;
}

/**
 * All bets of one round. Every transition goes through Bet, so a
 * bet can only be settled once regardless of which path reaches it.
 */
export class BetLedger {
  private readonly bets: Map<string, Bet> = new Map();

  add(bet: Bet): void {
    if (this.bets.has(bet.id)) {
      throw new DuplicateBetError(`Bet with ID ${bet.id} already exists`);
    }
    this.bets.set(bet.id, bet);
  }

  getById(id: string): Bet | undefined {
    return this.bets.get(id);
  }

  getAll(): Bet[] {
    return Array.from(this.bets.values());
  }

  get size(): number {
    return this.bets.size;
  }

  get placedCount(): number {
    let count = 0;
    for (const bet of this.bets.values()) {
      if (bet.status === BetStatus.PLACED) count++;
    }
    return count;
  }

  forEachAutoCashout(multiplier: number, callback: (bet: Bet) => void): void {
    for (const bet of this.bets.values()) {
      if (bet.shouldAutoCashout(multiplier)) {
        callback(bet);
      }
    }
  }

  /** Auto-cashout bets whose target lies strictly below the given hundredths. */
  autoCashoutsBelow(hundredths: number, toHundredths: (value: number) => number): Bet[] {
    return this.getAll().filter(
      (bet) =>
        bet.status === BetStatus.PLACED &&
        bet.autoCashoutTarget !== undefined &&
        toHundredths(bet.autoCashoutTarget) < hundredths,
    );
  }

  settleLosses(): Bet[] {
    const lost: Bet[] = [];
    for (const bet of this.bets.values()) {
      if (bet.status === BetStatus.PLACED) {
        bet.lose();
        lost.push(bet);
      }
    }
    return lost;
  }

  voidPlaced(): Bet[] {
    const voided: Bet[] = [];
    for (const bet of this.bets.values()) {
      if (bet.status === BetStatus.PLACED) {
        bet.voidStake();
        voided.push(bet);
      }
    }
    return voided;
  }

  totals(): LedgerTotals {
    let wagered = Money.zero();
    let paidOut = Money.zero();
    let refunded = Money.zero();
    for (const bet of this.bets.values()) {
      wagered = wagered.add(bet.stake);
      if (bet.status === BetStatus.CASHED_OUT && bet.payout) paidOut = paidOut.add(bet.payout);
      if (bet.status === BetStatus.VOIDED && bet.payout) refunded = refunded.add(bet.payout);
    }
    return {
      wageredCents: wagered.toCents(),
      paidOutCents: paidOut.toCents(),
      refundedCents: refunded.toCents(),
    };
  }
}
