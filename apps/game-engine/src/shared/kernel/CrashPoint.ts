import { InvalidCrashPointError } from '@shared/kernel/DomainError';

export class CrashPoint {
  private constructor(readonly value: number) {
    if (!Number.isFinite(value)) {
      throw new InvalidCrashPointError('Crash point must be a finite number');
    }
    if (value < 1.0) {
      throw new InvalidCrashPointError(`Crash point must be >= 1.00, got ${value}`);
    }
  }

  static of(value: number): CrashPoint {
    return new CrashPoint(value);
  }

  /** 2.35x -> 235 */
  get hundredths(): number {
    return Math.round(this.value * 100);
  }
}
