import { TickScheduler } from '@engine/application/ports/TickScheduler';

export class SetIntervalTickScheduler implements TickScheduler {
  private handle: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly intervalMs: number) {
    if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
      throw new Error(`Tick interval must be a positive integer, got ${intervalMs}`);
    }
  }

  get isRunning(): boolean {
    return this.handle !== null;
  }

  start(callback: () => void): void {
    this.stop();
    this.handle = setInterval(callback, this.intervalMs);
  }

  stop(): void {
    if (this.handle !== null) {
      clearInterval(this.handle);
      this.handle = null;
    }
  }
}
