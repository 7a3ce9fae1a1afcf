/**
 * Reporting module
 *
 * - types.ts / schemas.ts: domain records and tool input validation
 * - one calculator per report (remittance, savings, bills, insurance, health, trend)
 * - engine.ts: configuration, authorization and transactions around the calculators
 * - handlers.ts / formatter.ts: MCP tool adapters
 */

export {
  GetRemittanceSummarySchema,
  GetSavingsReportSchema,
  GetBillComplianceReportSchema,
  GetInsuranceReportSchema,
  CalculateHealthScoreSchema,
  GetFinancialHealthReportSchema,
  GetTrendAnalysisSchema,
  StoreReportSchema,
  GetStoredReportSchema,
  InitializeSchema,
  ConfigureAddressesSchema,
} from './schemas.js';

export type * from './types.js';

export { ReportingEngine, systemClock } from './engine.js';
export type { Clock, InvocationContext, ReportingEngineDependencies } from './engine.js';

export {
  handleGetRemittanceSummary,
  handleGetSavingsReport,
  handleGetBillComplianceReport,
  handleGetInsuranceReport,
  handleCalculateHealthScore,
  handleGetFinancialHealthReport,
  handleGetTrendAnalysis,
  handleStoreReport,
  handleGetStoredReport,
  handleGetAddresses,
  handleGetAdmin,
  handleInitialize,
  handleConfigureAddresses,
} from './handlers.js';
