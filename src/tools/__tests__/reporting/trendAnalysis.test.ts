import { describe, expect, it } from 'vitest';
import { analyzeTrend } from '../../reporting/trendAnalysis.js';
import { ArithmeticOverflowError } from '../../../types/index.js';
import { I128_MAX, I128_MIN } from '../../../utils/int128.js';

describe('analyzeTrend', () => {
  it('reports a 50% rise from 100 to 150', () => {
    expect(analyzeTrend(150n, 100n)).toEqual({
      current_amount: 150n,
      previous_amount: 100n,
      change_amount: 50n,
      change_percentage: 50,
    });
  });

  it('reports a fall as a negative percentage truncated toward zero', () => {
    expect(analyzeTrend(200n, 300n)).toMatchObject({
      change_amount: -100n,
      change_percentage: -33,
    });
  });

  it('reports +100 for any rise from a zero baseline', () => {
    expect(analyzeTrend(50n, 0n).change_percentage).toBe(100);
  });

  it('reports 0 when neither amount is positive', () => {
    expect(analyzeTrend(0n, 0n).change_percentage).toBe(0);
    expect(analyzeTrend(-5n, -10n)).toMatchObject({ change_amount: 5n, change_percentage: 0 });
  });

  it('reports +100 for a positive amount after a negative baseline', () => {
    expect(analyzeTrend(10n, -10n)).toMatchObject({ change_amount: 20n, change_percentage: 100 });
  });

  it('fails when the change overflows', () => {
    expect(() => analyzeTrend(I128_MAX, -1n)).toThrow(ArithmeticOverflowError);
    expect(() => analyzeTrend(I128_MIN, 1n)).toThrow(ArithmeticOverflowError);
  });

  it('fails when the percentage does not fit 32 bits', () => {
    expect(() => analyzeTrend(100_000_000n, 1n)).toThrow(ArithmeticOverflowError);
  });
});
