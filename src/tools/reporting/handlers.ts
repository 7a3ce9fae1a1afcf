import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { withToolErrorHandling } from '../../types/index.js';
import type { InvocationContext, ReportingEngine } from './engine.js';
import {
  buildAcknowledgement,
  buildAddressesResponse,
  buildAdminResponse,
  buildJsonResponse,
  buildStoredReportResponse,
} from './formatter.js';
import type {
  CalculateHealthScoreParams,
  ConfigureAddressesParams,
  GetBillComplianceReportParams,
  GetFinancialHealthReportParams,
  GetInsuranceReportParams,
  GetRemittanceSummaryParams,
  GetSavingsReportParams,
  GetStoredReportParams,
  GetTrendAnalysisParams,
  InitializeParams,
  StoreReportParams,
} from './schemas.js';
import type { ReportPeriod } from './types.js';

const periodOf = (params: { period_start: bigint; period_end: bigint }): ReportPeriod => ({
  period_start: params.period_start,
  period_end: params.period_end,
});

export async function handleGetRemittanceSummary(
  engine: ReportingEngine,
  params: GetRemittanceSummaryParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () =>
      buildJsonResponse(
        await engine.getRemittanceSummary(params.owner, params.total_amount, periodOf(params)),
      ),
    'get_remittance_summary',
    'generating remittance summary',
  );
}

export async function handleGetSavingsReport(
  engine: ReportingEngine,
  params: GetSavingsReportParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => buildJsonResponse(await engine.getSavingsReport(params.owner, periodOf(params))),
    'get_savings_report',
    'generating savings report',
  );
}

export async function handleGetBillComplianceReport(
  engine: ReportingEngine,
  params: GetBillComplianceReportParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () =>
      buildJsonResponse(await engine.getBillComplianceReport(params.owner, periodOf(params))),
    'get_bill_compliance_report',
    'generating bill compliance report',
  );
}

export async function handleGetInsuranceReport(
  engine: ReportingEngine,
  params: GetInsuranceReportParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => buildJsonResponse(await engine.getInsuranceReport(params.owner, periodOf(params))),
    'get_insurance_report',
    'generating insurance report',
  );
}

export async function handleCalculateHealthScore(
  engine: ReportingEngine,
  params: CalculateHealthScoreParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => buildJsonResponse(await engine.calculateHealthScore(params.owner)),
    'calculate_health_score',
    'calculating health score',
  );
}

export async function handleGetFinancialHealthReport(
  engine: ReportingEngine,
  params: GetFinancialHealthReportParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () =>
      buildJsonResponse(
        await engine.getFinancialHealthReport(
          params.owner,
          params.total_remittance,
          periodOf(params),
        ),
      ),
    'get_financial_health_report',
    'generating financial health report',
  );
}

export async function handleGetTrendAnalysis(
  engine: ReportingEngine,
  params: GetTrendAnalysisParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () =>
      buildJsonResponse(
        engine.getTrendAnalysis(params.owner, params.current_amount, params.previous_amount),
      ),
    'get_trend_analysis',
    'analyzing trend',
  );
}

export async function handleStoreReport(
  engine: ReportingEngine,
  params: StoreReportParams,
  context: InvocationContext,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      await engine.storeReport(context, params.owner, params.report, params.period_key);
      return buildAcknowledgement('Report stored', {
        owner: params.owner,
        period_key: params.period_key,
      });
    },
    'store_report',
    'storing report',
  );
}

export async function handleGetStoredReport(
  engine: ReportingEngine,
  params: GetStoredReportParams,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => buildStoredReportResponse(await engine.getStoredReport(params.owner, params.period_key)),
    'get_stored_report',
    'reading stored report',
  );
}

export async function handleGetAddresses(engine: ReportingEngine): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => buildAddressesResponse(await engine.getAddresses()),
    'get_addresses',
    'reading collaborator addresses',
  );
}

export async function handleGetAdmin(engine: ReportingEngine): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => buildAdminResponse(await engine.getAdmin()),
    'get_admin',
    'reading admin',
  );
}

export async function handleInitialize(
  engine: ReportingEngine,
  params: InitializeParams,
  context: InvocationContext,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      await engine.initialize(context, params.admin);
      return buildAcknowledgement('Reporting engine initialized', { admin: params.admin });
    },
    'initialize',
    'initializing reporting engine',
  );
}

export async function handleConfigureAddresses(
  engine: ReportingEngine,
  params: ConfigureAddressesParams,
  context: InvocationContext,
): Promise<CallToolResult> {
  return await withToolErrorHandling(
    async () => {
      const { caller, ...addresses } = params;
      await engine.configureAddresses(context, caller, addresses);
      return buildAcknowledgement('Collaborator addresses configured', { addresses });
    },
    'configure_addresses',
    'configuring collaborator addresses',
  );
}
