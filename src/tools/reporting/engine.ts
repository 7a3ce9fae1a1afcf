/**
 * Reporting engine
 *
 * Coordinates the calculators with configuration, authorization and the
 * transactional report store. Every public operation is one store transaction:
 * collaborator calls are made one after another, and any failure leaves no
 * stored report and no event behind.
 */

import type { CollaboratorDirectory } from '../../collaborators/types.js';
import type { ReportStore, StateTransaction } from '../../server/reportStore.js';
import { AlreadyInitializedError, AuthorizationError, ConfigurationError } from '../../types/index.js';
import { currentUnixSeconds } from '../../utils/periods.js';
import { generateBillComplianceReport } from './billCompliance.js';
import { computeHealthScore } from './healthScore.js';
import { generateInsuranceReport } from './insuranceCoverage.js';
import { generateRemittanceSummary } from './remittanceSummary.js';
import { generateSavingsReport } from './savingsProgress.js';
import { analyzeTrend } from './trendAnalysis.js';
import type {
  BillComplianceReport,
  CollaboratorAddresses,
  FinancialHealthReport,
  HealthScore,
  InsuranceReport,
  RemittanceSummary,
  ReportPeriod,
  SavingsReport,
  StoredReportLookup,
  TrendData,
} from './types.js';

/**
 * Ledger time in unix seconds
 */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => currentUnixSeconds(),
};

/**
 * Who is invoking an operation. Ownership checks compare against `principal`.
 */
export interface InvocationContext {
  principal: string;
}

export interface ReportingEngineDependencies {
  store: ReportStore;
  collaborators: CollaboratorDirectory;
  clock?: Clock;
}

export class ReportingEngine {
  private readonly store: ReportStore;
  private readonly collaborators: CollaboratorDirectory;
  private readonly clock: Clock;

  constructor(deps: ReportingEngineDependencies) {
    this.store = deps.store;
    this.collaborators = deps.collaborators;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Record the admin identity. Only the admin themselves may do so, once.
   */
  async initialize(context: InvocationContext, admin: string): Promise<boolean> {
    return this.store.transaction(async (tx) => {
      this.requireAuth(context, admin, 'initialize the reporting engine');
      if (tx.getAdmin() !== undefined) {
        throw new AlreadyInitializedError();
      }
      tx.setAdmin(admin);
      return true;
    });
  }

  /**
   * Replace the collaborator address record (admin only)
   */
  async configureAddresses(
    context: InvocationContext,
    caller: string,
    addresses: CollaboratorAddresses,
  ): Promise<boolean> {
    return this.store.transaction(async (tx) => {
      this.requireAuth(context, caller, 'configure collaborator addresses');

      const admin = tx.getAdmin();
      if (admin === undefined) {
        throw new ConfigurationError('Reporting engine is not initialized: no admin is recorded');
      }
      if (caller !== admin) {
        throw new AuthorizationError('Only the admin can configure addresses', admin, caller);
      }

      tx.setAddresses(addresses);
      tx.emit({ type: 'addresses_configured', caller });
      return true;
    });
  }

  async getRemittanceSummary(
    _owner: string,
    totalAmount: bigint,
    period: ReportPeriod,
  ): Promise<RemittanceSummary> {
    return this.store.transaction(async (tx) => this.remittanceSummary(tx, totalAmount, period));
  }

  async getSavingsReport(owner: string, period: ReportPeriod): Promise<SavingsReport> {
    return this.store.transaction(async (tx) => this.savingsReport(tx, owner, period));
  }

  async getBillComplianceReport(owner: string, period: ReportPeriod): Promise<BillComplianceReport> {
    return this.store.transaction(async (tx) =>
      this.billComplianceReport(tx, owner, period, this.clock.now()),
    );
  }

  async getInsuranceReport(owner: string, period: ReportPeriod): Promise<InsuranceReport> {
    return this.store.transaction(async (tx) => this.insuranceReport(tx, owner, period));
  }

  async calculateHealthScore(owner: string): Promise<HealthScore> {
    return this.store.transaction(async (tx) => this.healthScore(tx, owner, this.clock.now()));
  }

  /**
   * Build the composite report: health score first, then the four domain
   * reports, each fetching its own data. One clock reading serves the whole
   * report, as ledger time does within a transaction.
   */
  async getFinancialHealthReport(
    owner: string,
    totalRemittance: bigint,
    period: ReportPeriod,
  ): Promise<FinancialHealthReport> {
    return this.store.transaction(async (tx) => {
      const now = this.clock.now();
      const healthScore = await this.healthScore(tx, owner, now);
      const remittanceSummary = await this.remittanceSummary(tx, totalRemittance, period);
      const savingsReport = await this.savingsReport(tx, owner, period);
      const billCompliance = await this.billComplianceReport(tx, owner, period, now);
      const insuranceReport = await this.insuranceReport(tx, owner, period);

      tx.emit({ type: 'report_generated', generated_at: now });

      return {
        health_score: healthScore,
        remittance_summary: remittanceSummary,
        savings_report: savingsReport,
        bill_compliance: billCompliance,
        insurance_report: insuranceReport,
        generated_at: now,
      };
    });
  }

  /**
   * Pure comparison; needs neither configuration nor collaborators
   */
  getTrendAnalysis(_owner: string, currentAmount: bigint, previousAmount: bigint): TrendData {
    return analyzeTrend(currentAmount, previousAmount);
  }

  /**
   * Upsert a report under (owner, periodKey). Last write wins.
   */
  async storeReport(
    context: InvocationContext,
    owner: string,
    report: FinancialHealthReport,
    periodKey: bigint,
  ): Promise<boolean> {
    return this.store.transaction(async (tx) => {
      this.requireAuth(context, owner, 'store reports');
      tx.putReport(owner, periodKey, report);
      tx.emit({ type: 'report_stored', owner, period_key: periodKey });
      return true;
    });
  }

  async getStoredReport(owner: string, periodKey: bigint): Promise<StoredReportLookup> {
    return this.store.transaction(async (tx): Promise<StoredReportLookup> => {
      const report = tx.getReport(owner, periodKey);
      return report
        ? { found: true, owner, period_key: periodKey, report }
        : { found: false, owner, period_key: periodKey };
    });
  }

  async getAddresses(): Promise<CollaboratorAddresses | undefined> {
    return this.store.transaction(async (tx) => tx.getAddresses());
  }

  async getAdmin(): Promise<string | undefined> {
    return this.store.transaction(async (tx) => tx.getAdmin());
  }

  private requireAuth(context: InvocationContext, identity: string, action: string): void {
    if (context.principal !== identity) {
      throw new AuthorizationError(
        `Not authorized to ${action} on behalf of ${identity}`,
        identity,
        context.principal,
      );
    }
  }

  private requireAddresses(tx: StateTransaction): CollaboratorAddresses {
    const addresses = tx.getAddresses();
    if (!addresses) {
      throw new ConfigurationError('Collaborator addresses are not configured');
    }
    return addresses;
  }

  private async remittanceSummary(
    tx: StateTransaction,
    totalAmount: bigint,
    period: ReportPeriod,
  ): Promise<RemittanceSummary> {
    const addresses = this.requireAddresses(tx);
    return generateRemittanceSummary(
      this.collaborators.remittanceSplit(addresses.remittance_split),
      totalAmount,
      period,
    );
  }

  private async savingsReport(
    tx: StateTransaction,
    owner: string,
    period: ReportPeriod,
  ): Promise<SavingsReport> {
    const addresses = this.requireAddresses(tx);
    return generateSavingsReport(
      this.collaborators.savingsGoals(addresses.savings_goals),
      owner,
      period,
    );
  }

  private async billComplianceReport(
    tx: StateTransaction,
    owner: string,
    period: ReportPeriod,
    now: bigint,
  ): Promise<BillComplianceReport> {
    const addresses = this.requireAddresses(tx);
    return generateBillComplianceReport(
      this.collaborators.billPayments(addresses.bill_payments),
      owner,
      period,
      now,
    );
  }

  private async insuranceReport(
    tx: StateTransaction,
    owner: string,
    period: ReportPeriod,
  ): Promise<InsuranceReport> {
    const addresses = this.requireAddresses(tx);
    return generateInsuranceReport(this.collaborators.insurance(addresses.insurance), owner, period);
  }

  private async healthScore(
    tx: StateTransaction,
    owner: string,
    now: bigint,
  ): Promise<HealthScore> {
    const addresses = this.requireAddresses(tx);
    return computeHealthScore(
      {
        savings: this.collaborators.savingsGoals(addresses.savings_goals),
        bills: this.collaborators.billPayments(addresses.bill_payments),
        insurance: this.collaborators.insurance(addresses.insurance),
      },
      owner,
      now,
    );
  }
}
