import type { BillPaymentsClient } from '../../collaborators/types.js';
import { addInt128, inWindow } from '../../utils/int128.js';
import type { Bill, BillComplianceReport, ReportPeriod } from './types.js';

/**
 * Bills belonging to `owner` that were created inside the inclusive period.
 */
export function selectBillsForPeriod(
  bills: readonly Bill[],
  owner: string,
  period: ReportPeriod,
): Bill[] {
  return bills.filter(
    (bill) =>
      bill.owner === owner && inWindow(bill.created_at, period.period_start, period.period_end),
  );
}

export const isOverdue = (bill: Bill, now: bigint): boolean => !bill.paid && bill.due_date < now;

/**
 * Reduce the system-wide bill list into a compliance report for one owner.
 * With no bills in the period compliance is 100: nothing was missed.
 */
export function summarizeBillCompliance(
  allBills: readonly Bill[],
  owner: string,
  period: ReportPeriod,
  now: bigint,
): BillComplianceReport {
  const bills = selectBillsForPeriod(allBills, owner, period);

  let paidBills = 0;
  let unpaidBills = 0;
  let overdueBills = 0;
  let totalAmount = 0n;
  let paidAmount = 0n;
  let unpaidAmount = 0n;

  for (const bill of bills) {
    totalAmount = addInt128(totalAmount, bill.amount, 'Bill amount total');
    if (bill.paid) {
      paidBills += 1;
      paidAmount = addInt128(paidAmount, bill.amount, 'Paid bill total');
    } else {
      unpaidBills += 1;
      unpaidAmount = addInt128(unpaidAmount, bill.amount, 'Unpaid bill total');
      if (isOverdue(bill, now)) {
        overdueBills += 1;
      }
    }
  }

  const totalBills = bills.length;
  const compliancePercentage =
    totalBills > 0 ? Math.floor((paidBills * 100) / totalBills) : 100;

  return {
    total_bills: totalBills,
    paid_bills: paidBills,
    unpaid_bills: unpaidBills,
    overdue_bills: overdueBills,
    total_amount: totalAmount,
    paid_amount: paidAmount,
    unpaid_amount: unpaidAmount,
    compliance_percentage: compliancePercentage,
    period_start: period.period_start,
    period_end: period.period_end,
  };
}

export async function generateBillComplianceReport(
  billClient: BillPaymentsClient,
  owner: string,
  period: ReportPeriod,
  now: bigint,
): Promise<BillComplianceReport> {
  const allBills = await billClient.getAllBills();
  return summarizeBillCompliance(allBills, owner, period, now);
}
