export type CreditKind = 'PAYOUT' | 'REFUND';

/** Durable "credit owed" marker, written before the credit is attempted. */
export interface PendingCredit {
  id: string;
  kind: CreditKind;
  accountId: string;
  roundId: number;
  betId: string;
  amountCents: number;
  createdAt: number;
  attempts: number;
  lastError: string | null;
  escalated: boolean;
  resolved: boolean;
}
