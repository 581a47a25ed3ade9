import { BetSnapshot } from '@shared/kernel/BetSnapshot';

export type CashoutResult =
  | {
      success: true;
      payoutCents: number;
      cashoutMultiplier: number;
      snapshot: BetSnapshot;
    }
  | {
      success: false;
      error: 'BET_NOT_FOUND' | 'NOT_BET_OWNER' | 'ALREADY_SETTLED' | 'WINDOW_CLOSED';
    };
