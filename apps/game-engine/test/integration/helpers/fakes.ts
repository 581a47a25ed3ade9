import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { Money } from '@shared/kernel/Money';
import { Timer } from '@engine/application/ports/Timer';
import { TickScheduler } from '@engine/application/ports/TickScheduler';
import { EventPublisher } from '@engine/application/ports/EventPublisher';
import { AccountLedger, LedgerResult } from '@betting/application/ports/AccountLedger';

export class ManualClock implements Clock {
  constructor(private current = 1_000_000) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Captures the pending deadline; tests decide when it fires. */
export class ManualTimer implements Timer {
  private pending: { callback: () => void; deadlineMs: number } | null = null;
  private readonly immediates: Array<() => void> = [];

  scheduleAt(callback: () => void, deadlineMs: number): void {
    this.pending = { callback, deadlineMs };
  }

  scheduleImmediate(callback: () => void): void {
    this.immediates.push(callback);
  }

  clear(): void {
    this.pending = null;
  }

  get deadline(): number | null {
    return this.pending?.deadlineMs ?? null;
  }

  get immediateCount(): number {
    return this.immediates.length;
  }

  fire(): void {
    const pending = this.pending;
    if (!pending) throw new Error('No deadline scheduled');
    this.pending = null;
    pending.callback();
  }

  runImmediates(): void {
    for (const callback of this.immediates.splice(0)) {
      callback();
    }
  }
}

export class ManualTickScheduler implements TickScheduler {
  private callback: (() => void) | null = null;

  start(callback: () => void): void {
    this.callback = callback;
  }

  stop(): void {
    this.callback = null;
  }

  get isRunning(): boolean {
    return this.callback !== null;
  }

  tick(): void {
    this.callback?.();
  }
}

export interface LedgerCall {
  accountId: string;
  amountCents: number;
  id: string;
}

const OK: LedgerResult = { success: true };

/**
 * Records every ledger call. Results can be queued per call, and debits
 * can be held open to simulate a slow ledger.
 */
export class StubAccountLedger implements AccountLedger {
  readonly debitCalls: LedgerCall[] = [];
  readonly creditCalls: LedgerCall[] = [];
  private readonly debitResults: LedgerResult[] = [];
  private readonly creditResults: LedgerResult[] = [];
  private held: Array<() => void> | null = null;

  queueDebitResult(...results: LedgerResult[]): void {
    this.debitResults.push(...results);
  }

  queueCreditResult(...results: LedgerResult[]): void {
    this.creditResults.push(...results);
  }

  holdDebits(): void {
    this.held = [];
  }

  releaseDebits(): void {
    const held = this.held ?? [];
    this.held = null;
    for (const release of held) release();
  }

  async debit(accountId: string, amount: Money, transactionId: string): Promise<LedgerResult> {
    this.debitCalls.push({ accountId, amountCents: amount.toCents(), id: transactionId });
    const held = this.held;
    if (held) {
      await new Promise<void>((resolve) => held.push(resolve));
    }
    return this.debitResults.shift() ?? OK;
  }

  async credit(accountId: string, amount: Money, creditId: string): Promise<LedgerResult> {
    this.creditCalls.push({ accountId, amountCents: amount.toCents(), id: creditId });
    return this.creditResults.shift() ?? OK;
  }
}

export function createLoggerMock(): jest.Mocked<Logger> {
  return { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

export function createPublisherMock(): jest.Mocked<EventPublisher> {
  return {
    roundBetting: jest.fn().mockResolvedValue(undefined),
    roundStarted: jest.fn().mockResolvedValue(undefined),
    tick: jest.fn().mockResolvedValue(undefined),
    roundCrashed: jest.fn().mockResolvedValue(undefined),
    roundVoided: jest.fn().mockResolvedValue(undefined),
    betPlaced: jest.fn().mockResolvedValue(undefined),
    betCashedOut: jest.fn().mockResolvedValue(undefined),
    betLost: jest.fn().mockResolvedValue(undefined),
    betVoided: jest.fn().mockResolvedValue(undefined),
    creditFailed: jest.fn().mockResolvedValue(undefined),
  };
}
