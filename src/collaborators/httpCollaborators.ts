/**
 * JSON-over-HTTP clients for the upstream domain services.
 *
 * Each configured address is the base URL of a service. Every response body is
 * validated with zod before it reaches the reporting engine; any transport
 * failure, non-2xx status or malformed payload becomes a CollaboratorError.
 */

import { z } from 'zod';
import { CollaboratorError, type CollaboratorName } from '../types/index.js';
import {
  billSchema,
  insurancePolicySchema,
  int128Schema,
  savingsGoalSchema,
  u32Schema,
} from '../tools/reporting/schemas.js';
import type {
  BillPaymentsClient,
  CollaboratorDirectory,
  InsuranceClient,
  RemittanceSplitClient,
  SavingsGoalsClient,
} from './types.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpCollaboratorOptions {
  fetch?: FetchLike;
  headers?: Record<string, string>;
}

const splitResponseSchema = z.object({ percentages: z.array(u32Schema) });
const splitAmountsResponseSchema = z.object({ amounts: z.array(int128Schema) });
const goalsResponseSchema = z.object({ goals: z.array(savingsGoalSchema) });
const goalCompletedResponseSchema = z.object({ completed: z.boolean() });
const billsResponseSchema = z.object({ bills: z.array(billSchema) });
const totalResponseSchema = z.object({ total: int128Schema });
const policiesResponseSchema = z.object({ policies: z.array(insurancePolicySchema) });

/**
 * Shared request plumbing for one upstream service
 */
class HttpServiceClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;

  constructor(
    private readonly collaborator: CollaboratorName,
    address: string,
    options: HttpCollaboratorOptions,
  ) {
    this.baseUrl = address.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = { accept: 'application/json', ...(options.headers ?? {}) };
  }

  async request<T>(
    operation: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: Record<string, unknown>,
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const init: RequestInit =
      body === undefined
        ? { method: 'GET', headers: this.headers }
        : {
            method: 'POST',
            headers: { ...this.headers, 'content-type': 'application/json' },
            body: JSON.stringify(body),
          };

    let response: Response;
    try {
      response = await this.fetchImpl(url, init);
    } catch (error) {
      throw new CollaboratorError(
        this.collaborator,
        operation,
        `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { originalError: error },
      );
    }

    if (!response.ok) {
      throw new CollaboratorError(
        this.collaborator,
        operation,
        `Request to ${url} returned ${response.status} ${response.statusText}`.trim(),
        { status: response.status },
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new CollaboratorError(this.collaborator, operation, `Response from ${url} is not JSON`, {
        status: response.status,
        originalError: error,
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ');
      throw new CollaboratorError(
        this.collaborator,
        operation,
        `Response from ${url} failed validation: ${issues}`,
        { status: response.status, originalError: parsed.error },
      );
    }
    return parsed.data;
  }
}

const segment = (value: string | number): string => encodeURIComponent(String(value));

export class HttpRemittanceSplitClient implements RemittanceSplitClient {
  private readonly http: HttpServiceClient;

  constructor(address: string, options: HttpCollaboratorOptions = {}) {
    this.http = new HttpServiceClient('remittance_split', address, options);
  }

  async getSplit(): Promise<number[]> {
    const { percentages } = await this.http.request('get_split', '/split', splitResponseSchema);
    return percentages;
  }

  async calculateSplit(totalAmount: bigint): Promise<bigint[]> {
    const { amounts } = await this.http.request(
      'calculate_split',
      '/split/calculate',
      splitAmountsResponseSchema,
      { total_amount: totalAmount.toString() },
    );
    return amounts;
  }
}

export class HttpSavingsGoalsClient implements SavingsGoalsClient {
  private readonly http: HttpServiceClient;

  constructor(address: string, options: HttpCollaboratorOptions = {}) {
    this.http = new HttpServiceClient('savings_goals', address, options);
  }

  async getAllGoals(owner: string) {
    const { goals } = await this.http.request(
      'get_all_goals',
      `/owners/${segment(owner)}/goals`,
      goalsResponseSchema,
    );
    return goals;
  }

  async isGoalCompleted(goalId: number): Promise<boolean> {
    const { completed } = await this.http.request(
      'is_goal_completed',
      `/goals/${segment(goalId)}/completed`,
      goalCompletedResponseSchema,
    );
    return completed;
  }
}

export class HttpBillPaymentsClient implements BillPaymentsClient {
  private readonly http: HttpServiceClient;

  constructor(address: string, options: HttpCollaboratorOptions = {}) {
    this.http = new HttpServiceClient('bill_payments', address, options);
  }

  async getUnpaidBills(owner: string) {
    const { bills } = await this.http.request(
      'get_unpaid_bills',
      `/owners/${segment(owner)}/bills/unpaid`,
      billsResponseSchema,
    );
    return bills;
  }

  async getTotalUnpaid(owner: string): Promise<bigint> {
    const { total } = await this.http.request(
      'get_total_unpaid',
      `/owners/${segment(owner)}/bills/unpaid/total`,
      totalResponseSchema,
    );
    return total;
  }

  async getAllBills() {
    const { bills } = await this.http.request('get_all_bills', '/bills', billsResponseSchema);
    return bills;
  }
}

export class HttpInsuranceClient implements InsuranceClient {
  private readonly http: HttpServiceClient;

  constructor(address: string, options: HttpCollaboratorOptions = {}) {
    this.http = new HttpServiceClient('insurance', address, options);
  }

  async getActivePolicies(owner: string) {
    const { policies } = await this.http.request(
      'get_active_policies',
      `/owners/${segment(owner)}/policies/active`,
      policiesResponseSchema,
    );
    return policies;
  }

  async getTotalMonthlyPremium(owner: string): Promise<bigint> {
    const { total } = await this.http.request(
      'get_total_monthly_premium',
      `/owners/${segment(owner)}/premium/monthly`,
      totalResponseSchema,
    );
    return total;
  }
}

/**
 * Directory that treats every address as an HTTP base URL
 */
export class HttpCollaboratorDirectory implements CollaboratorDirectory {
  constructor(private readonly options: HttpCollaboratorOptions = {}) {}

  remittanceSplit(address: string): RemittanceSplitClient {
    return new HttpRemittanceSplitClient(address, this.options);
  }

  savingsGoals(address: string): SavingsGoalsClient {
    return new HttpSavingsGoalsClient(address, this.options);
  }

  billPayments(address: string): BillPaymentsClient {
    return new HttpBillPaymentsClient(address, this.options);
  }

  insurance(address: string): InsuranceClient {
    return new HttpInsuranceClient(address, this.options);
  }
}
