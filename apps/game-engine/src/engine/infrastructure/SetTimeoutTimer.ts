import { Timer } from '@engine/application/ports/Timer';
import { Clock } from '@shared/ports/Clock';

// setTimeout is capped at 2^31-1 ms; longer waits are split.
const MAX_TIMEOUT_MS = 2_147_483_647;

export class SetTimeoutTimer implements Timer {
  private handle: ReturnType<typeof setTimeout> | null = null;

  constructor(private readonly clock: Clock) {}

  scheduleAt(callback: () => void, deadlineMs: number): void {
    this.clear();
    this.arm(callback, deadlineMs);
  }

  scheduleImmediate(callback: () => void): void {
    setImmediate(callback);
  }

  clear(): void {
    if (this.handle !== null) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }

  /** Timers may fire a little early against Date.now(); re-arm until the deadline has passed. */
  private arm(callback: () => void, deadlineMs: number): void {
    const remaining = deadlineMs - this.clock.now();
    if (remaining <= 0) {
      this.handle = setTimeout(() => {
        this.handle = null;
        callback();
      }, 0);
      return;
    }
    this.handle = setTimeout(() => {
      this.handle = null;
      if (this.clock.now() < deadlineMs) {
        this.arm(callback, deadlineMs);
        return;
      }
      callback();
    }, Math.min(Math.ceil(remaining), MAX_TIMEOUT_MS));
  }
}
