import type { RemittanceSplitClient } from '../../collaborators/types.js';
import {
  REPORT_CATEGORIES,
  type CategoryBreakdown,
  type RemittanceSummary,
  type ReportPeriod,
} from './types.js';

/**
 * Zip split percentages and amounts onto the four report categories.
 * Missing upstream entries read as 0; extra entries are ignored.
 */
export function buildCategoryBreakdown(
  percentages: readonly number[],
  amounts: readonly bigint[],
): CategoryBreakdown[] {
  return REPORT_CATEGORIES.map((category, index) => ({
    category,
    amount: amounts[index] ?? 0n,
    percentage: percentages[index] ?? 0,
  }));
}

/**
 * Assemble a remittance summary. Received and allocated totals are both the
 * caller-supplied amount: every remittance is treated as fully allocated.
 */
export function summarizeRemittance(
  totalAmount: bigint,
  percentages: readonly number[],
  amounts: readonly bigint[],
  period: ReportPeriod,
): RemittanceSummary {
  return {
    total_received: totalAmount,
    total_allocated: totalAmount,
    category_breakdown: buildCategoryBreakdown(percentages, amounts),
    period_start: period.period_start,
    period_end: period.period_end,
  };
}

export async function generateRemittanceSummary(
  splitClient: RemittanceSplitClient,
  totalAmount: bigint,
  period: ReportPeriod,
): Promise<RemittanceSummary> {
  const percentages = await splitClient.getSplit();
  const amounts = await splitClient.calculateSplit(totalAmount);
  return summarizeRemittance(totalAmount, percentages, amounts, period);
}
