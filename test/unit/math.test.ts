import { describe, it, expect } from 'vitest';
import { fitLogistic, intRange, linreg, logistic, logisticDeriv, round, rSquared } from '../../src/analysis/math.js';

describe('linreg', () => {
  it('fits a straight line exactly', () => {
    expect(linreg([0, 1, 2], [1, 3, 5])).toEqual({ intercept: 1, slope: 2 });
  });

  it('returns (0, 0) for fewer than two points', () => {
    expect(linreg([1], [4])).toEqual({ intercept: 0, slope: 0 });
  });

  it('returns (0, 0) when x has no spread', () => {
    expect(linreg([2, 2, 2], [1, 2, 3])).toEqual({ intercept: 0, slope: 0 });
  });
});

describe('rSquared', () => {
  it('is 1 for a perfect prediction', () => {
    expect(rSquared([1, 2, 3], [1, 2, 3])).toBe(1);
  });

  it('is 0 when the actual values are constant', () => {
    expect(rSquared([4, 4, 4], [1, 2, 3])).toBe(0);
  });

  it('is 0 for empty input', () => {
    expect(rSquared([], [])).toBe(0);
  });
});

describe('logistic', () => {
  it('is half of L at the midpoint', () => {
    expect(logistic(4, 100, 0.8, 4)).toBe(50);
  });

  it('saturates beyond the exponent limit', () => {
    expect(logistic(100, 50, 1, 0)).toBe(50);
    expect(logistic(-100, 50, 1, 0)).toBe(0);
    expect(logisticDeriv(100, 50, 1, 0)).toBe(0);
    expect(logisticDeriv(-100, 50, 1, 0)).toBe(0);
  });

  it('has its steepest slope at the midpoint', () => {
    expect(logisticDeriv(4, 100, 0.8, 4)).toBeCloseTo(20);
    expect(logisticDeriv(6, 100, 0.8, 4)).toBeLessThan(20);
  });
});

describe('fitLogistic', () => {
  it('returns null for an empty grid', () => {
    expect(fitLogistic([0, 1], [1, 2], { L: [], r10: [3], tMid10: [5] })).toBeNull();
  });

  it('keeps the first candidate on ties', () => {
    const fit = fitLogistic([0, 1, 2], [5, 5, 5], { L: [10, 20], r10: [3, 4], tMid10: [5, 6] });
    expect(fit).toEqual({ L: 10, r: 0.3, tMid: 0.5, rSquared: 0 });
  });

  it('finds the generating parameters when they are on the grid', () => {
    const t = intRange(0, 12);
    const y = t.map(ti => logistic(ti, 120, 0.8, 4));
    const fit = fitLogistic(t, y, { L: [100, 120, 140], r10: intRange(3, 30), tMid10: intRange(5, 50) });
    expect(fit?.L).toBe(120);
    expect(fit?.r).toBe(0.8);
    expect(fit?.tMid).toBe(4);
    expect(fit?.rSquared).toBeCloseTo(1);
  });
});

describe('helpers', () => {
  it('intRange behaves like a half-open loop', () => {
    expect(intRange(3, 9, 2)).toEqual([3, 5, 7]);
    expect(intRange(5, 5)).toEqual([]);
  });

  it('round keeps the requested decimals', () => {
    expect(round(1.23456, 2)).toBe(1.23);
    expect(round(2.5)).toBe(3);
  });
});
