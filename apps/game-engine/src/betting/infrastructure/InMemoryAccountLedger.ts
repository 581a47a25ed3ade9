import { Money } from '@shared/kernel/Money';
import { AccountLedger, LedgerResult } from '@betting/application/ports/AccountLedger';

/**
 * Process-local ledger for development and tests. Accounts can be
 * opened explicitly, or on first use when an opening balance is set.
 */
export class InMemoryAccountLedger implements AccountLedger {
  private readonly balances = new Map<string, Money>();
  private readonly applied = new Set<string>();

  constructor(private readonly autoOpenBalance?: Money) {}

  openAccount(accountId: string, balance: Money): void {
    this.balances.set(accountId, balance);
  }

  balanceOf(accountId: string): Money | undefined {
    return this.balances.get(accountId);
  }

  async debit(accountId: string, amount: Money, transactionId: string): Promise<LedgerResult> {
    if (this.applied.has(transactionId)) return { success: true };

    const balance = this.resolve(accountId);
    if (!balance) return { success: false, error: 'ACCOUNT_NOT_FOUND' };
    if (balance.isLessThan(amount)) return { success: false, error: 'INSUFFICIENT_FUNDS' };

    this.balances.set(accountId, balance.subtract(amount));
    this.applied.add(transactionId);
    return { success: true };
  }

  async credit(accountId: string, amount: Money, creditId: string): Promise<LedgerResult> {
    if (this.applied.has(creditId)) return { success: true };

    const balance = this.resolve(accountId);
    if (!balance) return { success: false, error: 'ACCOUNT_NOT_FOUND' };

    this.balances.set(accountId, balance.add(amount));
    this.applied.add(creditId);
    return { success: true };
  }

  private resolve(accountId: string): Money | undefined {
    const balance = this.balances.get(accountId);
    if (balance || !this.autoOpenBalance) return balance;
    this.balances.set(accountId, this.autoOpenBalance);
    return this.autoOpenBalance;
  }
}
