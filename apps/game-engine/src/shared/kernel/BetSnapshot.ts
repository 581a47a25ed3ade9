export interface BetSnapshot {
  betId: string;
  accountId: string;
  roundId: number;
  stakeCents: number;
  status: string;
  autoCashoutTarget?: number;
  cashoutMultiplier?: number;
  payoutCents?: number;
}
