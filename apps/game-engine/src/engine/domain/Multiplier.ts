export const DEFAULT_GROWTH_RATE = 0.00006;

// Absorbs float error when truncating values such as e^(ln 1.8) = 1.7999999999999998.
const HUNDREDTHS_TOLERANCE = 1e-9;

/**
 * m(t) = e^(k * t), t in milliseconds since flight start. Values stay at
 * full precision; settlement and display truncate to hundredths.
 */
export class Multiplier {
  static valueAt(elapsedMs: number, growthRate: number = DEFAULT_GROWTH_RATE): number {
    if (elapsedMs <= 0) return 1.0;
    return Math.exp(growthRate * elapsedMs);
  }

  /** Inverse of valueAt: ms after flight start at which the curve reaches `multiplier`. */
  static timeFor(multiplier: number, growthRate: number = DEFAULT_GROWTH_RATE): number {
    if (multiplier <= 1.0) return 0;
    return Math.log(multiplier) / growthRate;
  }

  static toHundredths(value: number): number {
    return Math.floor(value * 100 + HUNDREDTHS_TOLERANCE);
  }
}
