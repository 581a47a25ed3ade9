import { Dispatcher, Pool } from 'undici';
import { z } from 'zod';
import { Money } from '@shared/kernel/Money';
import { Logger } from '@shared/ports/Logger';
import { AccountLedger, LedgerResult } from '@betting/application/ports/AccountLedger';

export interface HttpLedgerConfig {
  baseUrl: string;
  timeoutMs: number;
}

const ledgerResponseSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('ok') }),
  z.object({ status: z.literal('error'), code: z.string() }),
]);

/**
 * Account ledger reached over HTTP with a pooled undici client.
 * POST /ledger/debit and /ledger/credit; the transaction or credit id
 * is the idempotency key on the ledger side.
 */
export class HttpAccountLedgerAdapter implements AccountLedger {
  private readonly dispatcher: Dispatcher;

  constructor(
    private readonly config: HttpLedgerConfig,
    private readonly logger: Logger,
    dispatcher?: Dispatcher,
  ) {
    this.dispatcher =
      dispatcher ??
      new Pool(config.baseUrl, {
        connections: 100,
        pipelining: 1,
        keepAliveTimeout: 30_000,
        headersTimeout: config.timeoutMs,
        bodyTimeout: config.timeoutMs,
      });
  }

  debit(accountId: string, amount: Money, transactionId: string): Promise<LedgerResult> {
    return this.request('/ledger/debit', {
      account_id: accountId,
      amount: amount.toCents(),
      transaction_id: transactionId,
    });
  }

  credit(accountId: string, amount: Money, creditId: string): Promise<LedgerResult> {
    return this.request('/ledger/credit', {
      account_id: accountId,
      amount: amount.toCents(),
      transaction_id: creditId,
    });
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private async request(path: string, payload: Record<string, unknown>): Promise<LedgerResult> {
    const { statusCode, body } = await this.dispatcher.request({
      origin: this.config.baseUrl,
      path,
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
    });
    const text = await body.text();

    if (statusCode >= 500) {
      this.logger.warn('Account ledger returned a server error', { path, statusCode });
      return { success: false, error: 'TIMEOUT' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new Error(`Account ledger returned invalid JSON from ${path} (${statusCode})`);
    }

    const result = ledgerResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Account ledger returned an unexpected body from ${path} (${statusCode})`);
    }

    if (result.data.status === 'ok') {
      return { success: true };
    }

    switch (result.data.code) {
      case 'insufficient_funds':
        return { success: false, error: 'INSUFFICIENT_FUNDS' };
      case 'account_not_found':
        return { success: false, error: 'ACCOUNT_NOT_FOUND' };
      default:
        this.logger.warn('Account ledger rejected the call', { path, code: result.data.code });
        return { success: false, error: 'TIMEOUT' };
    }
  }
}
