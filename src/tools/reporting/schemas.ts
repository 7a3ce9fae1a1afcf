import { z } from 'zod';
import { U32_MAX, isInt128, isU64 } from '../../utils/int128.js';
import {
  REPORT_CATEGORIES,
  type Bill,
  type FinancialHealthReport,
  type InsurancePolicy,
  type ReportPeriod,
  type SavingsGoal,
} from './types.js';

/**
 * Integers arrive either as decimal strings (required beyond 2^53) or as safe
 * JSON numbers.
 */
const integerInput = z.union([
  z.string().trim().regex(/^-?\d+$/, 'Expected an integer'),
  z
    .number()
    .int()
    .refine((value) => Number.isSafeInteger(value), 'Expected a safe integer; pass larger values as strings'),
]);

export const int128Schema = integerInput.transform((value, ctx) => {
  const parsed = BigInt(value);
  if (!isInt128(parsed)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Amount is outside the signed 128-bit range',
    });
    return z.NEVER;
  }
  return parsed;
});

export const u64Schema = integerInput.transform((value, ctx) => {
  const parsed = BigInt(value);
  if (!isU64(parsed)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Value is outside the unsigned 64-bit range',
    });
    return z.NEVER;
  }
  return parsed;
});

export const u32Schema = z.number().int().min(0).max(U32_MAX);

const identitySchema = z.string().trim().min(1, 'Identity must be a non-empty string');

// Upstream records

export const savingsGoalSchema: z.ZodType<SavingsGoal, z.ZodTypeDef, unknown> = z.object({
  id: u32Schema,
  owner: identitySchema,
  name: z.string(),
  target_amount: int128Schema,
  current_amount: int128Schema,
  target_date: u64Schema,
  locked: z.boolean(),
});

export const billSchema: z.ZodType<Bill, z.ZodTypeDef, unknown> = z.object({
  id: u32Schema,
  owner: identitySchema,
  name: z.string(),
  amount: int128Schema,
  due_date: u64Schema,
  recurring: z.boolean(),
  frequency_days: u32Schema,
  paid: z.boolean(),
  created_at: u64Schema,
  paid_at: u64Schema.nullable().default(null),
});

export const insurancePolicySchema: z.ZodType<InsurancePolicy, z.ZodTypeDef, unknown> = z.object({
  id: u32Schema,
  owner: identitySchema,
  name: z.string(),
  coverage_type: z.string(),
  monthly_premium: int128Schema,
  coverage_amount: int128Schema,
  active: z.boolean(),
  next_payment_date: u64Schema,
});

// Composite report, accepted by store_report and read back from snapshots

const categoryBreakdownSchema = z.object({
  category: z.enum(REPORT_CATEGORIES),
  amount: int128Schema,
  percentage: u32Schema,
});

// One entry per category, in REPORT_CATEGORIES order
const categoryBreakdownListSchema = z
  .array(categoryBreakdownSchema)
  .length(REPORT_CATEGORIES.length, `Expected ${REPORT_CATEGORIES.length} category entries`)
  .refine(
    (entries) => entries.every((entry, index) => entry.category === REPORT_CATEGORIES[index]),
    `Expected categories in the order ${REPORT_CATEGORIES.join(', ')}`,
  );

const periodShape = {
  period_start: u64Schema,
  period_end: u64Schema,
};

export const financialHealthReportSchema: z.ZodType<FinancialHealthReport, z.ZodTypeDef, unknown> =
  z.object({
    health_score: z.object({
      score: u32Schema,
      savings_score: u32Schema,
      bills_score: u32Schema,
      insurance_score: u32Schema,
    }),
    remittance_summary: z.object({
      total_received: int128Schema,
      total_allocated: int128Schema,
      category_breakdown: categoryBreakdownListSchema,
      ...periodShape,
    }),
    savings_report: z.object({
      total_goals: u32Schema,
      completed_goals: u32Schema,
      total_target: int128Schema,
      total_saved: int128Schema,
      completion_percentage: u32Schema,
      ...periodShape,
    }),
    bill_compliance: z.object({
      total_bills: u32Schema,
      paid_bills: u32Schema,
      unpaid_bills: u32Schema,
      overdue_bills: u32Schema,
      total_amount: int128Schema,
      paid_amount: int128Schema,
      unpaid_amount: int128Schema,
      compliance_percentage: u32Schema,
      ...periodShape,
    }),
    insurance_report: z.object({
      active_policies: u32Schema,
      total_coverage: int128Schema,
      monthly_premium: int128Schema,
      annual_premium: int128Schema,
      coverage_to_premium_ratio: u32Schema,
      ...periodShape,
    }),
    generated_at: u64Schema,
  });

// Tool parameters

/**
 * Period fields shared by period-taking tools
 * - period_start / period_end: inclusive unix-second bounds
 * - month: YYYY-MM shorthand used to fill missing bounds
 *
 * The bounds are optional on the wire because `month` can stand in for them;
 * `withRequiredPeriod` rejects a call that ends up with neither.
 */
const periodParams = {
  period_start: u64Schema.optional(),
  period_end: u64Schema.optional(),
  month: z
    .string()
    .regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'Expected YYYY-MM')
    .optional(),
};

interface PeriodArguments {
  period_start?: bigint | undefined;
  period_end?: bigint | undefined;
}

function withRequiredPeriod<T extends PeriodArguments>(
  value: T,
  ctx: z.RefinementCtx,
): Omit<T, 'period_start' | 'period_end'> & ReportPeriod {
  const { period_start, period_end, ...rest } = value;
  if (period_start === undefined || period_end === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [period_start === undefined ? 'period_start' : 'period_end'],
      message: 'Provide period_start and period_end, or a month (YYYY-MM)',
    });
    return z.NEVER;
  }
  return { ...rest, period_start, period_end };
}

export const GetRemittanceSummarySchema = z
  .object({
    owner: identitySchema,
    total_amount: int128Schema,
    ...periodParams,
  })
  .strict()
  .transform(withRequiredPeriod);

export const GetSavingsReportSchema = z
  .object({
    owner: identitySchema,
    ...periodParams,
  })
  .strict()
  .transform(withRequiredPeriod);

export const GetBillComplianceReportSchema = z
  .object({
    owner: identitySchema,
    ...periodParams,
  })
  .strict()
  .transform(withRequiredPeriod);

export const GetInsuranceReportSchema = z
  .object({
    owner: identitySchema,
    ...periodParams,
  })
  .strict()
  .transform(withRequiredPeriod);

export const CalculateHealthScoreSchema = z
  .object({
    owner: identitySchema,
  })
  .strict();

export const GetFinancialHealthReportSchema = z
  .object({
    owner: identitySchema,
    total_remittance: int128Schema,
    ...periodParams,
  })
  .strict()
  .transform(withRequiredPeriod);

export const GetTrendAnalysisSchema = z
  .object({
    owner: identitySchema,
    current_amount: int128Schema,
    previous_amount: int128Schema,
  })
  .strict();

export const StoreReportSchema = z
  .object({
    owner: identitySchema,
    report: financialHealthReportSchema,
    period_key: u64Schema,
  })
  .strict();

export const GetStoredReportSchema = z
  .object({
    owner: identitySchema,
    period_key: u64Schema,
  })
  .strict();

export const InitializeSchema = z
  .object({
    admin: identitySchema,
  })
  .strict();

export const ConfigureAddressesSchema = z
  .object({
    caller: identitySchema,
    remittance_split: identitySchema,
    savings_goals: identitySchema,
    bill_payments: identitySchema,
    insurance: identitySchema,
    family_wallet: identitySchema,
  })
  .strict();

export type GetRemittanceSummaryParams = z.infer<typeof GetRemittanceSummarySchema>;
export type GetSavingsReportParams = z.infer<typeof GetSavingsReportSchema>;
export type GetBillComplianceReportParams = z.infer<typeof GetBillComplianceReportSchema>;
export type GetInsuranceReportParams = z.infer<typeof GetInsuranceReportSchema>;
export type CalculateHealthScoreParams = z.infer<typeof CalculateHealthScoreSchema>;
export type GetFinancialHealthReportParams = z.infer<typeof GetFinancialHealthReportSchema>;
export type GetTrendAnalysisParams = z.infer<typeof GetTrendAnalysisSchema>;
export type StoreReportParams = z.infer<typeof StoreReportSchema>;
export type GetStoredReportParams = z.infer<typeof GetStoredReportSchema>;
export type InitializeParams = z.infer<typeof InitializeSchema>;
export type ConfigureAddressesParams = z.infer<typeof ConfigureAddressesSchema>;
