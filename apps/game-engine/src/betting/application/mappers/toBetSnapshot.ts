import { Bet } from '@betting/domain/Bet';
import { BetSnapshot } from '@shared/kernel/BetSnapshot';

export function toBetSnapshot(bet: Bet): BetSnapshot {
  return {
    betId: bet.id,
    accountId: bet.accountId,
    roundId: bet.roundId,
    stakeCents: bet.stake.toCents(),
    status: bet.status,
    autoCashoutTarget: bet.autoCashoutTarget,
    cashoutMultiplier: bet.cashoutMultiplier,
    payoutCents: bet.payout?.toCents(),
  };
}
