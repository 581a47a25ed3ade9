import { InvalidMoneyError } from '@shared/kernel/DomainError';

/**
 * Non-negative amount in currency minor units. Never fractional.
 */
export class Money {
  private constructor(private readonly cents: number) {
    if (!Number.isFinite(cents)) throw new InvalidMoneyError('Must be finite');
    if (!Number.isSafeInteger(cents)) throw new InvalidMoneyError('Must be integer cents');
    if (cents < 0) throw new InvalidMoneyError('Must be non-negative');
  }

  static fromCents(cents: number): Money {
    return new Money(cents);
  }

  static zero(): Money {
    return new Money(0);
  }

  add(other: Money): Money {
    return new Money(this.cents + other.cents);
  }

  subtract(other: Money): Money {
    return new Money(this.cents - other.cents);
  }

  /**
   * Scales by a multiplier expressed in hundredths (1.80x -> 180),
   * rounding down to the minor unit.
   */
  multiplyByHundredths(hundredths: number): Money {
    if (!Number.isSafeInteger(hundredths) || hundredths < 0) {
      throw new InvalidMoneyError(`Invalid multiplier hundredths: ${hundredths}`);
    }
    return new Money(Math.floor((this.cents * hundredths) / 100));
  }

  isLessThan(other: Money): boolean {
    return this.cents < other.cents;
  }

  isZero(): boolean {
    return this.cents === 0;
  }

  toCents(): number {
    return this.cents;
  }
}
