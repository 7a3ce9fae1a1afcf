import { percentOf, subInt128, toI32 } from '../../utils/int128.js';
import type { TrendData } from './types.js';

/**
 * Compare two period amounts.
 *
 * The percentage is relative to `previous`. From a zero or negative baseline
 * any rise reports as exactly +100 and anything else as 0.
 */
export function analyzeTrend(currentAmount: bigint, previousAmount: bigint): TrendData {
  const changeAmount = subInt128(currentAmount, previousAmount, 'Trend change');

  let changePercentage: number;
  if (previousAmount > 0n) {
    changePercentage = toI32(
      percentOf(changeAmount, previousAmount, 'Trend change'),
      'Trend change percentage',
    );
  } else if (currentAmount > 0n) {
    changePercentage = 100;
  } else {
    changePercentage = 0;
  }

  return {
    current_amount: currentAmount,
    previous_amount: previousAmount,
    change_amount: changeAmount,
    change_percentage: changePercentage,
  };
}
