import { BetSnapshot } from '@shared/kernel/BetSnapshot';

export type PlaceBetError =
  | 'WINDOW_CLOSED'
  | 'INVALID_STAKE'
  | 'INVALID_AUTO_CASHOUT'
  | 'INSUFFICIENT_FUNDS'
  | 'ACCOUNT_NOT_FOUND'
  | 'COLLABORATOR_TIMEOUT';

export type PlaceBetResult =
  | { success: true; betId: string; snapshot: BetSnapshot }
  | { success: false; error: PlaceBetError };
