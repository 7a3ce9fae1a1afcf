/**
 * Domain types for reporting.
 *
 * Amounts are signed 128-bit and timestamps unsigned 64-bit, both carried as
 * bigint. Counts and percentages are 32-bit and carried as number.
 */

export const REPORT_CATEGORIES = ['Spending', 'Savings', 'Bills', 'Insurance'] as const;

export type ReportCategory = (typeof REPORT_CATEGORIES)[number];

export interface CategoryBreakdown {
  category: ReportCategory;
  amount: bigint;
  percentage: number;
}

export interface RemittanceSummary {
  total_received: bigint;
  total_allocated: bigint;
  category_breakdown: CategoryBreakdown[];
  period_start: bigint;
  period_end: bigint;
}

export interface SavingsReport {
  total_goals: number;
  completed_goals: number;
  total_target: bigint;
  total_saved: bigint;
  completion_percentage: number;
  period_start: bigint;
  period_end: bigint;
}

export interface BillComplianceReport {
  total_bills: number;
  paid_bills: number;
  unpaid_bills: number;
  overdue_bills: number;
  total_amount: bigint;
  paid_amount: bigint;
  unpaid_amount: bigint;
  compliance_percentage: number;
  period_start: bigint;
  period_end: bigint;
}

export interface InsuranceReport {
  active_policies: number;
  total_coverage: bigint;
  monthly_premium: bigint;
  annual_premium: bigint;
  coverage_to_premium_ratio: number;
  period_start: bigint;
  period_end: bigint;
}

/**
 * Composite 0-100 score; `score` is always the sum of the three parts.
 */
export interface HealthScore {
  score: number;
  savings_score: number;
  bills_score: number;
  insurance_score: number;
}

export interface FinancialHealthReport {
  health_score: HealthScore;
  remittance_summary: RemittanceSummary;
  savings_report: SavingsReport;
  bill_compliance: BillComplianceReport;
  insurance_report: InsuranceReport;
  generated_at: bigint;
}

export interface TrendData {
  current_amount: bigint;
  previous_amount: bigint;
  change_amount: bigint;
  change_percentage: number;
}

export interface ReportPeriod {
  period_start: bigint;
  period_end: bigint;
}

// Records owned by the upstream services

export interface SavingsGoal {
  id: number;
  owner: string;
  name: string;
  target_amount: bigint;
  current_amount: bigint;
  target_date: bigint;
  locked: boolean;
}

export interface Bill {
  id: number;
  owner: string;
  name: string;
  amount: bigint;
  due_date: bigint;
  recurring: boolean;
  frequency_days: number;
  paid: boolean;
  created_at: bigint;
  paid_at: bigint | null;
}

export interface InsurancePolicy {
  id: number;
  owner: string;
  name: string;
  coverage_type: string;
  monthly_premium: bigint;
  coverage_amount: bigint;
  active: boolean;
  next_payment_date: bigint;
}

/**
 * Where each upstream service lives. `family_wallet` is recorded for
 * completeness; no report reads from it.
 */
export interface CollaboratorAddresses {
  remittance_split: string;
  savings_goals: string;
  bill_payments: string;
  insurance: string;
  family_wallet: string;
}

export type ReportEvent =
  | { type: 'report_generated'; generated_at: bigint }
  | { type: 'report_stored'; owner: string; period_key: bigint }
  | { type: 'addresses_configured'; caller: string };

export type StoredReportLookup =
  | { found: true; owner: string; period_key: bigint; report: FinancialHealthReport }
  | { found: false; owner: string; period_key: bigint };
