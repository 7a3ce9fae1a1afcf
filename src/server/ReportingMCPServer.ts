import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { HttpCollaboratorDirectory } from '../collaborators/httpCollaborators.js';
import type { CollaboratorDirectory } from '../collaborators/types.js';
import type { Clock, InvocationContext } from '../tools/reporting/engine.js';
import {
  CalculateHealthScoreSchema,
  ConfigureAddressesSchema,
  GetBillComplianceReportSchema,
  GetFinancialHealthReportSchema,
  GetInsuranceReportSchema,
  GetRemittanceSummarySchema,
  GetSavingsReportSchema,
  GetStoredReportSchema,
  GetTrendAnalysisSchema,
  InitializeSchema,
  ReportingEngine,
  StoreReportSchema,
  handleCalculateHealthScore,
  handleConfigureAddresses,
  handleGetAddresses,
  handleGetAdmin,
  handleGetBillComplianceReport,
  handleGetFinancialHealthReport,
  handleGetInsuranceReport,
  handleGetRemittanceSummary,
  handleGetSavingsReport,
  handleGetStoredReport,
  handleGetTrendAnalysis,
  handleInitialize,
  handleStoreReport,
} from '../tools/reporting/index.js';
import { isValidReportMonth, monthToPeriod } from '../utils/periods.js';
import { ConfigurationError, ErrorHandler, ServerConfig } from '../types/index.js';
import { validateEnvironment } from './config.js';
import { createErrorHandler } from './errorHandler.js';
import { ReportStore } from './reportStore.js';
import { ResourceManager } from './resources.js';
import { responseFormatter } from './responseFormatter.js';
import { withSecurityWrapper } from './securityMiddleware.js';
import {
  ToolRegistry,
  type DefaultArgumentResolver,
  type ToolDefinition,
  type ToolExecutionPayload,
} from './toolRegistry.js';

/**
 * Collaborators, clock and store can be swapped out, mainly for tests
 */
export interface ReportingServerOverrides {
  collaborators?: CollaboratorDirectory;
  clock?: Clock;
  store?: ReportStore;
}

/**
 * Fills `period_start` / `period_end` from a `month` argument when the caller
 * did not pass explicit bounds. An invalid month is left for the schema to
 * reject.
 */
export const resolvePeriodFromMonth: DefaultArgumentResolver = ({ rawArguments }) => {
  const month = rawArguments['month'];
  if (typeof month !== 'string' || !isValidReportMonth(month)) {
    return undefined;
  }
  const period = monthToPeriod(month);
  return {
    period_start: period.period_start.toString(),
    period_end: period.period_end.toString(),
  };
};

/**
 * MCP server exposing the reporting engine as tools and resources
 */
export class ReportingMCPServer {
  private server: Server;
  private config: ServerConfig;
  private exitOnError: boolean;
  private serverVersion: string;
  private store: ReportStore;
  private engine: ReportingEngine;
  private toolRegistry: ToolRegistry;
  private resourceManager: ResourceManager;
  private errorHandler: ErrorHandler;

  constructor(exitOnError: boolean = true, overrides: ReportingServerOverrides = {}) {
    this.exitOnError = exitOnError;
    this.config = validateEnvironment();

    this.store =
      overrides.store ??
      new ReportStore(this.config.stateFile ? { snapshotFile: this.config.stateFile } : {});
    this.engine = new ReportingEngine({
      store: this.store,
      collaborators: overrides.collaborators ?? new HttpCollaboratorDirectory(),
      ...(overrides.clock ? { clock: overrides.clock } : {}),
    });

    this.serverVersion = this.readPackageVersion() ?? '0.0.0';

    this.server = new Server(
      {
        name: 'remittance-reporting-mcp',
        version: this.serverVersion,
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      },
    );

    this.errorHandler = createErrorHandler(responseFormatter);
    ErrorHandler.setFormatter(responseFormatter);

    this.toolRegistry = new ToolRegistry({
      withSecurityWrapper,
      errorHandler: this.errorHandler,
      responseFormatter,
    });

    this.resourceManager = new ResourceManager({
      engine: this.engine,
      eventLog: this.store.getEventLog(),
      responseFormatter,
    });

    this.setupToolRegistry();
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      return this.resourceManager.listResources();
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      return await this.resourceManager.readResource(request.params.uri);
    });

    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: this.toolRegistry.listTools(),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      return await this.toolRegistry.executeTool({
        name: request.params.name,
        principal: this.config.principal,
        arguments: request.params.arguments ?? {},
      });
    });
  }

  /**
   * Registers all tools with the registry to centralize handler execution
   */
  private setupToolRegistry(): void {
    const register = <TInput>(definition: ToolDefinition<TInput>): void => {
      this.toolRegistry.register(definition);
    };

    const adapt =
      <TInput>(handler: (engine: ReportingEngine, params: TInput) => Promise<CallToolResult>) =>
      async ({ input }: ToolExecutionPayload<TInput>): Promise<CallToolResult> =>
        handler(this.engine, input);

    // Handlers that check ownership also receive the invoking principal
    const adaptWithContext =
      <TInput>(
        handler: (
          engine: ReportingEngine,
          params: TInput,
          context: InvocationContext,
        ) => Promise<CallToolResult>,
      ) =>
      async ({ input, context }: ToolExecutionPayload<TInput>): Promise<CallToolResult> =>
        handler(this.engine, input, { principal: context.principal });

    const adaptNoInput =
      (handler: (engine: ReportingEngine) => Promise<CallToolResult>) =>
      async (): Promise<CallToolResult> =>
        handler(this.engine);

    const emptyObjectSchema = z.object({}).strict();
    const setOutputFormatSchema = z
      .object({
        default_minify: z.boolean().optional(),
        pretty_spaces: z.number().int().min(0).max(10).optional(),
      })
      .strict();
    const readOnly = { annotations: { readOnlyHint: true } };

    register({
      name: 'get_remittance_summary',
      description:
        'Split a remittance across Spending, Savings, Bills and Insurance using the configured split. Accepts period_start/period_end (unix seconds) or month (YYYY-MM).',
      inputSchema: GetRemittanceSummarySchema,
      handler: adapt(handleGetRemittanceSummary),
      defaultArgumentResolver: resolvePeriodFromMonth,
      metadata: readOnly,
    });

    register({
      name: 'get_savings_report',
      description: "Summarize progress across all of an owner's savings goals",
      inputSchema: GetSavingsReportSchema,
      handler: adapt(handleGetSavingsReport),
      defaultArgumentResolver: resolvePeriodFromMonth,
      metadata: readOnly,
    });

    register({
      name: 'get_bill_compliance_report',
      description: "Count paid, unpaid and overdue bills created inside the period for an owner",
      inputSchema: GetBillComplianceReportSchema,
      handler: adapt(handleGetBillComplianceReport),
      defaultArgumentResolver: resolvePeriodFromMonth,
      metadata: readOnly,
    });

    register({
      name: 'get_insurance_report',
      description: "Summarize an owner's active insurance coverage against annual premium",
      inputSchema: GetInsuranceReportSchema,
      handler: adapt(handleGetInsuranceReport),
      defaultArgumentResolver: resolvePeriodFromMonth,
      metadata: readOnly,
    });

    register({
      name: 'calculate_health_score',
      description: 'Score financial health 0-100 from savings progress, unpaid bills and insurance',
      inputSchema: CalculateHealthScoreSchema,
      handler: adapt(handleCalculateHealthScore),
      metadata: readOnly,
    });

    register({
      name: 'get_financial_health_report',
      description:
        'Build the composite report: health score, remittance summary, savings, bill compliance and insurance',
      inputSchema: GetFinancialHealthReportSchema,
      handler: adapt(handleGetFinancialHealthReport),
      defaultArgumentResolver: resolvePeriodFromMonth,
      metadata: readOnly,
    });

    register({
      name: 'get_trend_analysis',
      description: 'Compare a current amount with a previous one',
      inputSchema: GetTrendAnalysisSchema,
      handler: adapt(handleGetTrendAnalysis),
      metadata: readOnly,
    });

    register({
      name: 'store_report',
      description: 'Store a financial health report under (owner, period_key), replacing any earlier one',
      inputSchema: StoreReportSchema,
      handler: adaptWithContext(handleStoreReport),
    });

    register({
      name: 'get_stored_report',
      description: 'Read a stored report; answers found: false when nothing is stored',
      inputSchema: GetStoredReportSchema,
      handler: adapt(handleGetStoredReport),
      metadata: readOnly,
    });

    register({
      name: 'get_addresses',
      description: 'Show the configured collaborator addresses',
      inputSchema: emptyObjectSchema,
      handler: adaptNoInput(handleGetAddresses),
      metadata: readOnly,
    });

    register({
      name: 'get_admin',
      description: 'Show the admin identity recorded at initialization',
      inputSchema: emptyObjectSchema,
      handler: adaptNoInput(handleGetAdmin),
      metadata: readOnly,
    });

    register({
      name: 'initialize',
      description: 'Record the admin identity; allowed once',
      inputSchema: InitializeSchema,
      handler: adaptWithContext(handleInitialize),
    });

    register({
      name: 'configure_addresses',
      description: 'Replace the collaborator address record (admin only)',
      inputSchema: ConfigureAddressesSchema,
      handler: adaptWithContext(handleConfigureAddresses),
    });

    register({
      name: 'set_output_format',
      description: 'Configure default JSON output formatting (minify or pretty spaces)',
      inputSchema: setOutputFormatSchema,
      handler: async ({ input }) => {
        const options: { defaultMinify?: boolean; prettySpaces?: number } = {};
        if (typeof input.default_minify === 'boolean') {
          options.defaultMinify = input.default_minify;
        }
        if (typeof input.pretty_spaces === 'number') {
          options.prettySpaces = input.pretty_spaces;
        }
        responseFormatter.configure(options);
        return {
          content: [
            {
              type: 'text',
              text: responseFormatter.format({ success: true, options }),
            },
          ],
        };
      },
    });
  }

  async run(): Promise<void> {
    try {
      const transport = new StdioServerTransport();
      await this.server.connect(transport);

      console.error('Reporting MCP Server started successfully');
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.error(`Server startup failed: ${error.message}`);
        if (this.exitOnError) {
          process.exit(1);
        }
      }
      throw error;
    }
  }

  getServer(): Server {
    return this.server;
  }

  getEngine(): ReportingEngine {
    return this.engine;
  }

  getToolRegistry(): ToolRegistry {
    return this.toolRegistry;
  }

  getResourceManager(): ResourceManager {
    return this.resourceManager;
  }

  async handleListTools() {
    return { tools: this.toolRegistry.listTools() };
  }

  /**
   * Runs a tool as the configured principal, the same way a CallTool request does
   */
  async handleCallTool(name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
    return this.toolRegistry.executeTool({
      name,
      principal: this.config.principal,
      arguments: args,
    });
  }

  private readPackageVersion(): string | null {
    const candidates = [
      path.resolve(process.cwd(), 'package.json'),
      path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../package.json'),
    ];
    for (const candidate of candidates) {
      try {
        if (fs.existsSync(candidate)) {
          const pkg: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
          if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
            const { version } = pkg;
            if (typeof version === 'string') return version;
          }
        }
      } catch (error) {
        console.error(`Could not read version from ${candidate}:`, error);
      }
    }
    return null;
  }
}
