import { Money } from '@shared/kernel/Money';
import { AccountLedger } from '@betting/application/ports/AccountLedger';
import { TimeoutAccountLedger } from '@betting/infrastructure/TimeoutAccountLedger';
import { createLoggerMock } from '../integration/helpers/fakes';

function createInnerMock(): jest.Mocked<Required<AccountLedger>> {
  return {
    debit: jest.fn().mockResolvedValue({ success: true }),
    credit: jest.fn().mockResolvedValue({ success: true }),
    close: jest.fn().mockResolvedValue(undefined),
  };
}

describe('TimeoutAccountLedger', () => {
  let inner: jest.Mocked<Required<AccountLedger>>;
  let logger: ReturnType<typeof createLoggerMock>;
  let ledger: TimeoutAccountLedger;

  beforeEach(() => {
    jest.useFakeTimers();
    inner = createInnerMock();
    logger = createLoggerMock();
    ledger = new TimeoutAccountLedger(inner, 2000, logger);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('passes results through from the inner ledger', async () => {
    inner.debit.mockResolvedValueOnce({ success: false, error: 'INSUFFICIENT_FUNDS' });

    await expect(ledger.debit('acc-1', Money.fromCents(100), 'bet:b1')).resolves.toEqual({
      success: false,
      error: 'INSUFFICIENT_FUNDS',
    });
    expect(inner.debit).toHaveBeenCalledWith('acc-1', Money.fromCents(100), 'bet:b1');
  });

  it('resolves TIMEOUT when the inner call does not answer in time', async () => {
    inner.credit.mockReturnValueOnce(new Promise(() => {}));

    const pending = ledger.credit('acc-1', Money.fromCents(180), 'payout:b1');
    jest.advanceTimersByTime(2000);

    await expect(pending).resolves.toEqual({ success: false, error: 'TIMEOUT' });
    expect(logger.warn).toHaveBeenCalledWith('Account ledger call timed out', {
      operation: 'credit',
      id: 'payout:b1',
      timeoutMs: 2000,
    });
  });

  it('resolves TIMEOUT when the inner call throws', async () => {
    inner.debit.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(ledger.debit('acc-1', Money.fromCents(100), 'bet:b1')).resolves.toEqual({
      success: false,
      error: 'TIMEOUT',
    });
    expect(logger.warn).toHaveBeenCalledWith('Account ledger call failed', {
      operation: 'debit',
      id: 'bet:b1',
      error: 'socket hang up',
    });
  });

  it('does not log a timeout once the call has answered', async () => {
    await ledger.debit('acc-1', Money.fromCents(100), 'bet:b1');
    jest.advanceTimersByTime(5000);

    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('close() closes the inner ledger', async () => {
    await ledger.close();
    expect(inner.close).toHaveBeenCalledTimes(1);
  });
});
