import { Money } from '@shared/kernel/Money';

export type LedgerError = 'INSUFFICIENT_FUNDS' | 'ACCOUNT_NOT_FOUND' | 'TIMEOUT';

export type LedgerResult = { success: true } | { success: false; error: LedgerError };

/**
 * External balance holder. Both operations are idempotent on their
 * transaction/credit id, so a retried call never moves funds twice.
 */
export interface AccountLedger {
  debit(accountId: string, amount: Money, transactionId: string): Promise<LedgerResult>;
  credit(accountId: string, amount: Money, creditId: string): Promise<LedgerResult>;
  /** Releases pooled connections, where the adapter holds any. */
  close?(): Promise<void>;
}
