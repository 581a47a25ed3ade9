import { Logger } from '@shared/ports/Logger';

/**
 * Keeps fire-and-forget work observable: failures are logged and
 * drain() waits for whatever is still pending.
 */
export class PromiseTracker {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly category: string,
    private readonly highWaterMark: number,
    private readonly logger: Logger,
  ) {}

  track(promise: Promise<unknown>): void {
    const settled: Promise<void> = promise
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger.error(`Background ${this.category} task failed`, {
            category: this.category,
            error: err instanceof Error ? err.message : String(err),
          });
        },
      )
      .finally(() => {
        this.pending.delete(settled);
      });
    this.pending.add(settled);

    if (this.pending.size > this.highWaterMark) {
      this.logger.warn(`High water mark exceeded for "${this.category}"`, {
        category: this.category,
        pending: this.pending.size,
        highWaterMark: this.highWaterMark,
      });
    }
  }

  get size(): number {
    return this.pending.size;
  }

  /** Resolves once every task tracked so far, and any tracked meanwhile, has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
