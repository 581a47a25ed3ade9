import { setTimeout as sleepFor } from 'timers/promises';
import { Money } from '@shared/kernel/Money';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { AccountLedger, LedgerResult } from '@betting/application/ports/AccountLedger';
import { PendingCreditStore } from '@betting/application/ports/PendingCreditStore';
import { CreditFailedNotifier } from '@betting/application/ports/CreditFailedNotifier';
import { CreditKind, PendingCredit } from '@betting/application/commands/PendingCredit';
import { PromiseTracker } from '@engine/application/PromiseTracker';

export interface CreditRetryPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  alertAfterAttempts: number;
}

export interface CreditRequest {
  kind: CreditKind;
  accountId: string;
  roundId: number;
  betId: string;
  amount: Money;
}

export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

const defaultSleeper: Sleeper = (ms, signal) =>
  sleepFor(ms, undefined, { signal }).then(
    () => undefined,
    () => undefined,
  );

export function creditIdFor(kind: CreditKind, betId: string): string {
  return `${kind === 'PAYOUT' ? 'payout' : 'refund'}:${betId}`;
}

/**
 * Delivers every payout and refund to the account ledger.
 *
 * A PendingCredit record is saved before the first attempt and only
 * marked resolved once the ledger accepts the credit. Until then it is
 * retried with capped exponential backoff; operators are alerted after
 * `alertAfterAttempts` failures, and straight away when the account is
 * unknown to the ledger. Credits are idempotent on their id, so a
 * record re-dispatched after a restart cannot pay twice.
 */
export class CreditDispatcher {
  private readonly deliveries: PromiseTracker;
  private readonly active = new Set<string>();
  private readonly abort = new AbortController();

  constructor(
    private readonly ledger: AccountLedger,
    private readonly store: PendingCreditStore,
    private readonly notifier: CreditFailedNotifier,
    private readonly policy: CreditRetryPolicy,
    private readonly clock: Clock,
    private readonly logger: Logger,
    private readonly sleep: Sleeper = defaultSleeper,
  ) {
    this.deliveries = new PromiseTracker('credit', 10_000, logger);
  }

  dispatch(request: CreditRequest): PendingCredit {
    const id = creditIdFor(request.kind, request.betId);
    const existing = this.store.get(id);
    if (existing) {
      this.logger.warn('Credit already owed; not dispatching twice', { creditId: id });
      return existing;
    }

    const record: PendingCredit = {
      id,
      kind: request.kind,
      accountId: request.accountId,
      roundId: request.roundId,
      betId: request.betId,
      amountCents: request.amount.toCents(),
      createdAt: this.clock.now(),
      attempts: 0,
      lastError: null,
      escalated: false,
      resolved: false,
    };
    this.store.save(record);
    this.start(record);
    return record;
  }

  /** Re-dispatches every unresolved record not already being delivered. */
  resumeUnresolved(): number {
    let resumed = 0;
    for (const record of this.store.getUnresolved()) {
      if (this.active.has(record.id)) continue;
      this.start(record);
      resumed++;
    }
    if (resumed > 0) {
      this.logger.info('Resumed owed credits', { count: resumed });
    }
    return resumed;
  }

  /** Stops retry loops after their current attempt; records stay unresolved. */
  stop(): void {
    this.abort.abort();
  }

  async drain(): Promise<void> {
    await this.deliveries.drain();
  }

  private start(record: PendingCredit): void {
    this.active.add(record.id);
    this.deliveries.track(
      this.deliver(record).finally(() => {
        this.active.delete(record.id);
      }),
    );
  }

  private async deliver(record: PendingCredit): Promise<void> {
    while (!this.abort.signal.aborted) {
      record.attempts++;
      const result = await this.attempt(record);

      if (result.success) {
        this.store.markResolved(record.id);
        if (record.attempts > 1) {
          this.logger.info('Credit delivered after retry', {
            creditId: record.id,
            attempts: record.attempts,
          });
        }
        return;
      }

      record.lastError = result.error;
      this.store.save(record);

      if (result.error === 'ACCOUNT_NOT_FOUND') {
        this.escalate(record);
        return;
      }
      if (record.attempts === this.policy.alertAfterAttempts) {
        this.escalate(record);
      }

      await this.sleep(this.backoff(record.attempts), this.abort.signal);
    }
  }

  private async attempt(record: PendingCredit): Promise<LedgerResult> {
    try {
      return await this.ledger.credit(
        record.accountId,
        Money.fromCents(record.amountCents),
        record.id,
      );
    } catch (err) {
      this.logger.warn('Account ledger credit threw', {
        creditId: record.id,
        error: err instanceof Error ? err.message : String(err),
      });
      return { success: false, error: 'TIMEOUT' };
    }
  }

  private backoff(attempts: number): number {
    const delay = this.policy.baseDelayMs * 2 ** (attempts - 1);
    return Math.min(this.policy.maxDelayMs, delay);
  }

  private escalate(record: PendingCredit): void {
    record.escalated = true;
    this.store.save(record);
    this.logger.error('Credit owed could not be delivered', {
      creditId: record.id,
      kind: record.kind,
      accountId: record.accountId,
      roundId: record.roundId,
      betId: record.betId,
      amountCents: record.amountCents,
      attempts: record.attempts,
      lastError: record.lastError,
    });
    this.deliveries.track(this.notifier.creditFailed({ ...record }));
  }
}
