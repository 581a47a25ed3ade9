import { Bet } from '@betting/domain/Bet';
import { CashoutUseCase } from '@betting/application/CashoutUseCase';
import { BetSnapshot } from '@shared/kernel/BetSnapshot';
import { Multiplier } from '@engine/domain/Multiplier';
import { Round } from '@engine/domain/Round';
import { RoundPhase } from '@engine/domain/RoundPhase';

/**
 * Cashes out bets whose auto-cashout target has been reached.
 * Every payout is at the target, never at the tick's multiplier.
 */
export class AutoCashoutMonitor {
  constructor(private readonly cashoutUseCase: CashoutUseCase) {}

  onTick(round: Round, now: number): BetSnapshot[] {
    if (!round.isInFlightAt(now)) return [];

    const due: Bet[] = [];
    round.bets.forEachAutoCashout(round.multiplierAt(now), (bet) => due.push(bet));
    return this.cashOut(round, due);
  }

  /**
   * Runs at the crash deadline, before losses are settled: any target
   * strictly below the crash point was reached during flight even if
   * no tick landed after it.
   */
  sweepBeforeCrash(round: Round, crashHundredths: number): BetSnapshot[] {
    if (round.phase !== RoundPhase.FLIGHT) return [];
    return this.cashOut(round, round.bets.autoCashoutsBelow(crashHundredths, Multiplier.toHundredths));
  }

  private cashOut(round: Round, bets: Bet[]): BetSnapshot[] {
    const settled: BetSnapshot[] = [];
    for (const bet of bets) {
      const result = this.cashoutUseCase.settleAutoCashout(round, bet);
      if (result.success) settled.push(result.snapshot);
    }
    return settled;
  }
}
