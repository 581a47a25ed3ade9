import { Money } from '@shared/kernel/Money';
import { Logger } from '@shared/ports/Logger';
import { AccountLedger, LedgerResult } from '@betting/application/ports/AccountLedger';

const TIMED_OUT: LedgerResult = { success: false, error: 'TIMEOUT' };

/**
 * Bounds every ledger call. A call that exceeds the bound, or throws,
 * resolves as TIMEOUT; the underlying request is not cancelled.
 */
export class TimeoutAccountLedger implements AccountLedger {
  constructor(
    private readonly inner: AccountLedger,
    private readonly timeoutMs: number,
    private readonly logger: Logger,
  ) {}

  debit(accountId: string, amount: Money, transactionId: string): Promise<LedgerResult> {
    return this.bounded('debit', transactionId, () =>
      this.inner.debit(accountId, amount, transactionId),
    );
  }

  credit(accountId: string, amount: Money, creditId: string): Promise<LedgerResult> {
    return this.bounded('credit', creditId, () => this.inner.credit(accountId, amount, creditId));
  }

  async close(): Promise<void> {
    await this.inner.close?.();
  }

  private bounded(
    operation: string,
    id: string,
    call: () => Promise<LedgerResult>,
  ): Promise<LedgerResult> {
    return new Promise<LedgerResult>((resolve) => {
      const timer = setTimeout(() => {
        this.logger.warn('Account ledger call timed out', {
          operation,
          id,
          timeoutMs: this.timeoutMs,
        });
        resolve(TIMED_OUT);
      }, this.timeoutMs);

      call().then(
        (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        (err: unknown) => {
          clearTimeout(timer);
          this.logger.warn('Account ledger call failed', {
            operation,
            id,
            error: err instanceof Error ? err.message : String(err),
          });
          resolve(TIMED_OUT);
        },
      );
    });
  }
}
