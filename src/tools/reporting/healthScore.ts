import type {
  BillPaymentsClient,
  InsuranceClient,
  SavingsGoalsClient,
} from '../../collaborators/types.js';
import { percentOf, toU32 } from '../../utils/int128.js';
import { totalSavings } from './savingsProgress.js';
import type { Bill, HealthScore, InsurancePolicy, SavingsGoal } from './types.js';

/**
 * Weighting of the composite score:
 * - savings: up to 40, proportional to progress across all goals
 * - bills: 40 with nothing unpaid, 35 with unpaid bills none overdue, 20 otherwise
 * - insurance: 20 with at least one active policy
 */
export const HEALTH_SCORE_WEIGHTS = {
  SAVINGS_MAX: 40,
  SAVINGS_WITHOUT_GOALS: 20,
  BILLS_ALL_PAID: 40,
  BILLS_UNPAID_NONE_OVERDUE: 35,
  BILLS_OVERDUE: 20,
  INSURANCE_COVERED: 20,
  INSURANCE_UNCOVERED: 0,
} as const;

export function calculateSavingsScore(goals: readonly SavingsGoal[]): number {
  const { total_target, total_saved } = totalSavings(goals);
  if (total_target <= 0n) {
    return HEALTH_SCORE_WEIGHTS.SAVINGS_WITHOUT_GOALS;
  }

  // Capped before narrowing to u32
  const progress = percentOf(total_saved, total_target, 'Savings progress');
  if (progress > 100n) {
    return HEALTH_SCORE_WEIGHTS.SAVINGS_MAX;
  }
  const percent = toU32(progress, 'Savings progress');
  return Math.floor((percent * HEALTH_SCORE_WEIGHTS.SAVINGS_MAX) / 100);
}

export function calculateBillsScore(unpaidBills: readonly Bill[], now: bigint): number {
  if (unpaidBills.length === 0) {
    return HEALTH_SCORE_WEIGHTS.BILLS_ALL_PAID;
  }
  const anyOverdue = unpaidBills.some((bill) => bill.due_date < now);
  return anyOverdue
    ? HEALTH_SCORE_WEIGHTS.BILLS_OVERDUE
    : HEALTH_SCORE_WEIGHTS.BILLS_UNPAID_NONE_OVERDUE;
}

export function calculateInsuranceScore(activePolicies: readonly InsurancePolicy[]): number {
  return activePolicies.length > 0
    ? HEALTH_SCORE_WEIGHTS.INSURANCE_COVERED
    : HEALTH_SCORE_WEIGHTS.INSURANCE_UNCOVERED;
}

export function scoreFinancialHealth(
  goals: readonly SavingsGoal[],
  unpaidBills: readonly Bill[],
  activePolicies: readonly InsurancePolicy[],
  now: bigint,
): HealthScore {
  const savingsScore = calculateSavingsScore(goals);
  const billsScore = calculateBillsScore(unpaidBills, now);
  const insuranceScore = calculateInsuranceScore(activePolicies);

  return {
    score: savingsScore + billsScore + insuranceScore,
    savings_score: savingsScore,
    bills_score: billsScore,
    insurance_score: insuranceScore,
  };
}

export interface HealthScoreSources {
  savings: SavingsGoalsClient;
  bills: BillPaymentsClient;
  insurance: InsuranceClient;
}

/**
 * Fetches goals, unpaid bills and active policies itself; it never reads the
 * domain reports.
 */
export async function computeHealthScore(
  sources: HealthScoreSources,
  owner: string,
  now: bigint,
): Promise<HealthScore> {
  const goals = await sources.savings.getAllGoals(owner);
  const unpaidBills = await sources.bills.getUnpaidBills(owner);
  const activePolicies = await sources.insurance.getActivePolicies(owner);
  return scoreFinancialHealth(goals, unpaidBills, activePolicies, now);
}
