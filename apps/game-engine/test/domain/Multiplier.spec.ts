import { Multiplier, DEFAULT_GROWTH_RATE } from '@engine/domain/Multiplier';

describe('Multiplier', () => {
  describe('valueAt', () => {
    it('is exactly 1.00 at and before flight start', () => {
      expect(Multiplier.valueAt(0)).toBe(1.0);
      expect(Multiplier.valueAt(-50)).toBe(1.0);
    });

    it('grows as e^(k t)', () => {
      expect(Multiplier.valueAt(1000, 0.001)).toBeCloseTo(Math.E, 12);
      expect(Multiplier.valueAt(10_000)).toBeCloseTo(Math.exp(DEFAULT_GROWTH_RATE * 10_000), 12);
    });

    it('is strictly increasing', () => {
      let previous = Multiplier.valueAt(0);
      for (let t = 50; t <= 60_000; t += 50) {
        const current = Multiplier.valueAt(t);
        expect(current).toBeGreaterThan(previous);
        previous = current;
      }
    });
  });

  describe('timeFor', () => {
    it('is 0 for multipliers at or below 1.00', () => {
      expect(Multiplier.timeFor(1.0)).toBe(0);
      expect(Multiplier.timeFor(0.5)).toBe(0);
    });

    it('inverts valueAt', () => {
      for (const m of [1.01, 1.8, 2, 2.35, 10, 1000]) {
        expect(Multiplier.valueAt(Multiplier.timeFor(m))).toBeCloseTo(m, 9);
      }
    });

    it('takes about 11.55s to reach 2.00x at the default rate', () => {
      expect(Multiplier.timeFor(2)).toBeCloseTo(Math.LN2 / 0.00006, 6);
      expect(Math.round(Multiplier.timeFor(2))).toBe(11552);
    });
  });

  describe('toHundredths', () => {
    it('truncates rather than rounds', () => {
      expect(Multiplier.toHundredths(1.999)).toBe(199);
      expect(Multiplier.toHundredths(2.3549)).toBe(235);
    });

    it('absorbs float error just below a hundredth', () => {
      expect(Multiplier.toHundredths(1.7999999999999998)).toBe(180);
      expect(Multiplier.toHundredths(Multiplier.valueAt(Multiplier.timeFor(1.8)))).toBe(180);
    });
  });
});
