import { describe, expect, it } from 'vitest';
import {
  buildCategoryBreakdown,
  generateRemittanceSummary,
  summarizeRemittance,
} from '../../reporting/remittanceSummary.js';
import { InMemoryCollaborators, TEST_ADDRESSES } from '../../../__tests__/testUtils.js';

const period = { period_start: 100n, period_end: 200n };

describe('remittance summary', () => {
  it('zips percentages and amounts onto the four categories in order', () => {
    expect(buildCategoryBreakdown([50, 30, 15, 5], [500n, 300n, 150n, 50n])).toEqual([
      { category: 'Spending', amount: 500n, percentage: 50 },
      { category: 'Savings', amount: 300n, percentage: 30 },
      { category: 'Bills', amount: 150n, percentage: 15 },
      { category: 'Insurance', amount: 50n, percentage: 5 },
    ]);
  });

  it('reads missing entries as zero and ignores extra ones', () => {
    expect(buildCategoryBreakdown([60, 40], [600n, 400n, 7n, 8n, 9n])).toEqual([
      { category: 'Spending', amount: 600n, percentage: 60 },
      { category: 'Savings', amount: 400n, percentage: 40 },
      { category: 'Bills', amount: 7n, percentage: 0 },
      { category: 'Insurance', amount: 8n, percentage: 0 },
    ]);
  });

  it('reports the total as both received and allocated', () => {
    const summary = summarizeRemittance(1000n, [50, 30, 15, 5], [500n, 300n, 150n, 50n], period);
    expect(summary.total_received).toBe(1000n);
    expect(summary.total_allocated).toBe(1000n);
    expect(summary.period_start).toBe(100n);
    expect(summary.period_end).toBe(200n);
  });

  it('asks the split service for percentages and then amounts', async () => {
    const collaborators = new InMemoryCollaborators();
    const summary = await generateRemittanceSummary(
      collaborators.remittanceSplit(TEST_ADDRESSES.remittance_split),
      1000n,
      period,
    );

    expect(collaborators.calls).toEqual([
      'remittance_split.get_split',
      'remittance_split.calculate_split',
    ]);
    expect(summary.category_breakdown.map((entry) => entry.amount)).toEqual([
      500n,
      300n,
      150n,
      50n,
    ]);
  });
});
