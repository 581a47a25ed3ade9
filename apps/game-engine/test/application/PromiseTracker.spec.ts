import { PromiseTracker } from '@engine/application/PromiseTracker';
import { createLoggerMock } from '../integration/helpers/fakes';

describe('PromiseTracker', () => {
  it('forgets promises once they settle', async () => {
    const tracker = new PromiseTracker('test', 10, createLoggerMock());
    tracker.track(Promise.resolve(1));
    expect(tracker.size).toBe(1);

    await tracker.drain();

    expect(tracker.size).toBe(0);
  });

  it('logs rejections instead of propagating them', async () => {
    const logger = createLoggerMock();
    const tracker = new PromiseTracker('publish', 10, logger);

    tracker.track(Promise.reject(new Error('boom')));
    await tracker.drain();

    expect(logger.error).toHaveBeenCalledWith('Background publish task failed', {
      category: 'publish',
      error: 'boom',
    });
  });

  it('warns when the high water mark is exceeded', () => {
    const logger = createLoggerMock();
    const tracker = new PromiseTracker('slow', 1, logger);
    const never = new Promise<void>(() => {});

    tracker.track(never);
    expect(logger.warn).not.toHaveBeenCalled();
    tracker.track(never);

    expect(logger.warn).toHaveBeenCalledWith('High water mark exceeded for "slow"', {
      category: 'slow',
      pending: 2,
      highWaterMark: 1,
    });
  });

  it('drain also waits for work tracked while draining', async () => {
    const tracker = new PromiseTracker('chain', 10, createLoggerMock());
    const order: string[] = [];

    tracker.track(
      Promise.resolve().then(() => {
        order.push('first');
        tracker.track(
          new Promise<void>((resolve) => setImmediate(resolve)).then(() => {
            order.push('second');
          }),
        );
      }),
    );

    await tracker.drain();

    expect(order).toEqual(['first', 'second']);
    expect(tracker.size).toBe(0);
  });
});
