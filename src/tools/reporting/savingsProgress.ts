import type { SavingsGoalsClient } from '../../collaborators/types.js';
import { addInt128, percentOf, toU32 } from '../../utils/int128.js';
import type { ReportPeriod, SavingsGoal, SavingsReport } from './types.js';

export interface SavingsTotals {
  total_target: bigint;
  total_saved: bigint;
  completed_goals: number;
}

export function totalSavings(goals: readonly SavingsGoal[]): SavingsTotals {
  let totalTarget = 0n;
  let totalSaved = 0n;
  let completed = 0;

  for (const goal of goals) {
    totalTarget = addInt128(totalTarget, goal.target_amount, 'Savings target total');
    totalSaved = addInt128(totalSaved, goal.current_amount, 'Savings balance total');
    if (goal.current_amount >= goal.target_amount) {
      completed += 1;
    }
  }

  return { total_target: totalTarget, total_saved: totalSaved, completed_goals: completed };
}

/**
 * Reduce an owner's goals into a savings report. The period is echoed on the
 * report but does not filter goals; every goal the owner has counts.
 */
export function summarizeSavings(goals: readonly SavingsGoal[], period: ReportPeriod): SavingsReport {
  const totals = totalSavings(goals);

  const completionPercentage =
    totals.total_target > 0n
      ? toU32(
          percentOf(totals.total_saved, totals.total_target, 'Savings completion'),
          'Savings completion percentage',
        )
      : 0;

  return {
    total_goals: goals.length,
    completed_goals: totals.completed_goals,
    total_target: totals.total_target,
    total_saved: totals.total_saved,
    completion_percentage: completionPercentage,
    period_start: period.period_start,
    period_end: period.period_end,
  };
}

export async function generateSavingsReport(
  savingsClient: SavingsGoalsClient,
  owner: string,
  period: ReportPeriod,
): Promise<SavingsReport> {
  const goals = await savingsClient.getAllGoals(owner);
  return summarizeSavings(goals, period);
}
