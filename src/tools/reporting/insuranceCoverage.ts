import type { InsuranceClient } from '../../collaborators/types.js';
import { mulInt128, percentOf, sumInt128, toU32 } from '../../utils/int128.js';
import type { InsurancePolicy, InsuranceReport, ReportPeriod } from './types.js';

const MONTHS_PER_YEAR = 12n;

/**
 * Reduce active policies and the service-reported monthly premium into a
 * coverage report. The premium is taken as reported; it is not recomputed from
 * the policy list. The period is echoed only.
 */
export function summarizeInsurance(
  policies: readonly InsurancePolicy[],
  monthlyPremium: bigint,
  period: ReportPeriod,
): InsuranceReport {
  const totalCoverage = sumInt128(
    policies.map((policy) => policy.coverage_amount),
    'Coverage total',
  );
  const annualPremium = mulInt128(monthlyPremium, MONTHS_PER_YEAR, 'Annual premium');

  const ratio =
    annualPremium > 0n
      ? toU32(
          percentOf(totalCoverage, annualPremium, 'Coverage ratio'),
          'Coverage-to-premium ratio',
        )
      : 0;

  return {
    active_policies: policies.length,
    total_coverage: totalCoverage,
    monthly_premium: monthlyPremium,
    annual_premium: annualPremium,
    coverage_to_premium_ratio: ratio,
    period_start: period.period_start,
    period_end: period.period_end,
  };
}

export async function generateInsuranceReport(
  insuranceClient: InsuranceClient,
  owner: string,
  period: ReportPeriod,
): Promise<InsuranceReport> {
  const policies = await insuranceClient.getActivePolicies(owner);
  const monthlyPremium = await insuranceClient.getTotalMonthlyPremium(owner);
  return summarizeInsurance(policies, monthlyPremium, period);
}
