import type { Bill, InsurancePolicy, SavingsGoal } from '../tools/reporting/types.js';

/**
 * Contracts of the upstream domain services. The reporting engine only reads
 * through these; it never reimplements their logic.
 */

export interface RemittanceSplitClient {
  /** Percentage per category, in Spending, Savings, Bills, Insurance order */
  getSplit(): Promise<number[]>;
  /** Amount per category for the given total, same order as getSplit */
  calculateSplit(totalAmount: bigint): Promise<bigint[]>;
}

export interface SavingsGoalsClient {
  getAllGoals(owner: string): Promise<SavingsGoal[]>;
  isGoalCompleted(goalId: number): Promise<boolean>;
}

export interface BillPaymentsClient {
  getUnpaidBills(owner: string): Promise<Bill[]>;
  getTotalUnpaid(owner: string): Promise<bigint>;
  /** Every bill known to the service, across all owners */
  getAllBills(): Promise<Bill[]>;
}

export interface InsuranceClient {
  getActivePolicies(owner: string): Promise<InsurancePolicy[]>;
  getTotalMonthlyPremium(owner: string): Promise<bigint>;
}

/**
 * Resolves a configured address to a client for that service
 */
export interface CollaboratorDirectory {
  remittanceSplit(address: string): RemittanceSplitClient;
  savingsGoals(address: string): SavingsGoalsClient;
  billPayments(address: string): BillPaymentsClient;
  insurance(address: string): InsuranceClient;
}
