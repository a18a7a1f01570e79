import { makePoolState } from '../src/modules/pool';
import { computeTrade } from '../src/modules/trade';
import { InvalidArgumentError } from '../src/errors';
import { TradeDirection } from '../src/types/common';

/**
 * Trade math is pure; every case builds pools directly.
 */
describe('computeTrade', () => {
  const FEE = 0.003;

  describe('buying base (price up)', () => {
    const initial = makePoolState(1000, 1.0);
    const final = makePoolState(1000, 1.21);
    const result = computeTrade(initial, final, FEE);

    it('trader receives base and pays quote', () => {
      expect(result.baseWalletDelta).toBeGreaterThan(0);
      expect(result.quoteWalletDelta).toBeLessThan(0);
      expect(result.baseWalletDelta).toBeCloseTo(1000 - 1000 / 1.1, 9);
      expect(result.quoteWalletDelta).toBeCloseTo(-100, 9);
    });

    it('charges the fee on quote only', () => {
      expect(result.quoteFeeCollected).toBeCloseTo(0.3, 10);
      expect(result.baseFeeCollected).toBe(0);
      expect(result.direction).toBe(TradeDirection.BUY_BASE);
    });

    it('reports the price delta', () => {
      expect(result.priceDelta).toBeCloseTo(0.21, 12);
    });
  });

  describe('selling base (price down)', () => {
    const initial = makePoolState(1000, 1.0);
    const final = makePoolState(1000, 0.81);
    const result = computeTrade(initial, final, FEE);

    it('trader pays base and receives quote', () => {
      expect(result.baseWalletDelta).toBeLessThan(0);
      expect(result.quoteWalletDelta).toBeGreaterThan(0);
      expect(result.baseWalletDelta).toBeCloseTo(1000 - 1000 / 0.9, 9);
      expect(result.quoteWalletDelta).toBeCloseTo(100, 9);
    });

    it('charges the fee on base only', () => {
      expect(result.baseFeeCollected).toBeCloseTo((1000 / 0.9 - 1000) * FEE, 10);
      expect(result.quoteFeeCollected).toBe(0);
      expect(result.direction).toBe(TradeDirection.SELL_BASE);
    });
  });

  it('returns exact zeros for identical states', () => {
    const pool = makePoolState(1000, 1.0);
    const result = computeTrade(pool, makePoolState(1000, 1.0), FEE);
    expect(result).toEqual({
      priceDelta: 0,
      baseWalletDelta: 0,
      quoteWalletDelta: 0,
      baseFeeCollected: 0,
      quoteFeeCollected: 0,
      direction: TradeDirection.NONE,
    });
  });

  it('reports wallet deltas gross of fees', () => {
    const initial = makePoolState(500, 2);
    const final = makePoolState(500, 3);
    const result = computeTrade(initial, final, 0.05);
    expect(result.baseWalletDelta).toBe(initial.baseReserves() - final.baseReserves());
    expect(result.quoteWalletDelta).toBe(initial.quoteReserves() - final.quoteReserves());
    expect(result.quoteFeeCollected).toBe(-result.quoteWalletDelta * 0.05);
  });

  it('collects nothing at a zero fee', () => {
    const result = computeTrade(makePoolState(1000, 1), makePoolState(1000, 1.21), 0);
    expect(result.baseFeeCollected).toBe(0);
    expect(result.quoteFeeCollected).toBe(0);
    expect(result.direction).toBe(TradeDirection.BUY_BASE);
  });

  it('keeps fees exclusive and signs consistent across price moves', () => {
    const prices = [0.001, 0.5, 0.99, 1, 1.01, 2, 750];
    for (const from of prices) {
      for (const to of prices) {
        const result = computeTrade(makePoolState(42, from), makePoolState(42, to), 0.01);

        expect(result.baseFeeCollected).toBeGreaterThanOrEqual(0);
        expect(result.quoteFeeCollected).toBeGreaterThanOrEqual(0);
        if (result.baseFeeCollected > 0) expect(result.quoteFeeCollected).toBe(0);
        if (result.quoteFeeCollected > 0) expect(result.baseFeeCollected).toBe(0);

        if (to > from) {
          expect(result.baseWalletDelta).toBeGreaterThan(0);
          expect(result.quoteWalletDelta).toBeLessThan(0);
          expect(result.quoteFeeCollected).toBeGreaterThan(0);
        } else if (to < from) {
          expect(result.baseWalletDelta).toBeLessThan(0);
          expect(result.quoteWalletDelta).toBeGreaterThan(0);
          expect(result.baseFeeCollected).toBeGreaterThan(0);
        } else {
          expect(result.baseFeeCollected).toBe(0);
          expect(result.quoteFeeCollected).toBe(0);
        }
      }
    }
  });

  describe('fee validation', () => {
    const a = makePoolState(1000, 1);
    const b = makePoolState(1000, 2);

    it('rejects a fee of 1 or more', () => {
      expect(() => computeTrade(a, b, 1)).toThrow(InvalidArgumentError);
      expect(() => computeTrade(a, b, 1)).toThrow('feeFraction must be less than 1');
    });

    it('rejects a negative fee', () => {
      expect(() => computeTrade(a, b, -0.01)).toThrow('feeFraction must be at least 0');
    });

    it('rejects NaN', () => {
      expect(() => computeTrade(a, b, NaN)).toThrow(InvalidArgumentError);
    });

    it('accepts a fee just below 1', () => {
      expect(() => computeTrade(a, b, 0.999)).not.toThrow();
    });
  });
});
