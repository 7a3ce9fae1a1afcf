import { describe, it, expect, vi } from 'vitest';
import {
  HttpBillPaymentsClient,
  HttpCollaboratorDirectory,
  HttpInsuranceClient,
  HttpRemittanceSplitClient,
  HttpSavingsGoalsClient,
  type FetchLike,
} from '../httpCollaborators.js';
import { CollaboratorError } from '../../types/index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function fakeFetch(body: unknown, status = 200) {
  return vi.fn<FetchLike>(async () => jsonResponse(body, status));
}

describe('HTTP collaborators', () => {
  describe('HttpRemittanceSplitClient', () => {
    it('should read the split with a GET', async () => {
      const fetch = fakeFetch({ percentages: [50, 30, 15, 5] });
      const client = new HttpRemittanceSplitClient('http://split.test/', { fetch });

      await expect(client.getSplit()).resolves.toEqual([50, 30, 15, 5]);
      expect(fetch).toHaveBeenCalledWith('http://split.test/split', {
        method: 'GET',
        headers: { accept: 'application/json' },
      });
    });

    it('should POST the total as a decimal string and parse amounts', async () => {
      const fetch = fakeFetch({ amounts: ['500', 300, '150', '50'] });
      const client = new HttpRemittanceSplitClient('http://split.test', {
        fetch,
        headers: { authorization: 'Bearer test-secret' },
      });

      await expect(client.calculateSplit(1000n)).resolves.toEqual([500n, 300n, 150n, 50n]);
      expect(fetch).toHaveBeenCalledWith('http://split.test/split/calculate', {
        method: 'POST',
        headers: {
          accept: 'application/json',
          authorization: 'Bearer test-secret',
          'content-type': 'application/json',
        },
        body: '{"total_amount":"1000"}',
      });
    });
  });

  describe('HttpSavingsGoalsClient', () => {
    it('should encode the owner into the path and parse goals', async () => {
      const fetch = fakeFetch({
        goals: [
          {
            id: 1,
            owner: 'owner a',
            name: 'Trip',
            target_amount: '1000',
            current_amount: 250,
            target_date: '2000000000',
            locked: false,
          },
        ],
      });
      const client = new HttpSavingsGoalsClient('http://savings.test', { fetch });

      const goals = await client.getAllGoals('owner a');

      expect(goals).toEqual([
        {
          id: 1,
          owner: 'owner a',
          name: 'Trip',
          target_amount: 1000n,
          current_amount: 250n,
          target_date: 2_000_000_000n,
          locked: false,
        },
      ]);
      expect(fetch.mock.calls[0]?.[0]).toBe('http://savings.test/owners/owner%20a/goals');
    });

    it('should ask whether a goal is completed', async () => {
      const fetch = fakeFetch({ completed: true });
      const client = new HttpSavingsGoalsClient('http://savings.test', { fetch });

      await expect(client.isGoalCompleted(7)).resolves.toBe(true);
      expect(fetch.mock.calls[0]?.[0]).toBe('http://savings.test/goals/7/completed');
    });
  });

  describe('HttpBillPaymentsClient', () => {
    it('should default a missing paid_at to null', async () => {
      const fetch = fakeFetch({
        bills: [
          {
            id: 3,
            owner: 'owner-a',
            name: 'Rent',
            amount: '900',
            due_date: 1500,
            recurring: true,
            frequency_days: 30,
            paid: false,
            created_at: 1000,
          },
        ],
      });
      const client = new HttpBillPaymentsClient('http://bills.test', { fetch });

      const [bill] = await client.getAllBills();

      expect(bill?.paid_at).toBeNull();
      expect(bill?.amount).toBe(900n);
      expect(fetch.mock.calls[0]?.[0]).toBe('http://bills.test/bills');
    });

    it('should read the unpaid total', async () => {
      const fetch = fakeFetch({ total: '170141183460469231731687303715884105727' });
      const client = new HttpBillPaymentsClient('http://bills.test', { fetch });

      await expect(client.getTotalUnpaid('owner-a')).resolves.toBe(
        170141183460469231731687303715884105727n,
      );
      expect(fetch.mock.calls[0]?.[0]).toBe('http://bills.test/owners/owner-a/bills/unpaid/total');
    });
  });

  describe('HttpInsuranceClient', () => {
    it('should read the monthly premium', async () => {
      const fetch = fakeFetch({ total: 250 });
      const client = new HttpInsuranceClient('http://insurance.test', { fetch });

      await expect(client.getTotalMonthlyPremium('owner-a')).resolves.toBe(250n);
      expect(fetch.mock.calls[0]?.[0]).toBe(
        'http://insurance.test/owners/owner-a/premium/monthly',
      );
    });
  });

  describe('failures', () => {
    it('should turn a non-2xx status into a CollaboratorError', async () => {
      const fetch = vi.fn<FetchLike>(
        async () => new Response('down', { status: 503, statusText: 'Service Unavailable' }),
      );
      const client = new HttpInsuranceClient('http://insurance.test', { fetch });

      const error = await client.getActivePolicies('owner-a').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(CollaboratorError);
      expect(error).toMatchObject({
        collaborator: 'insurance',
        operation: 'get_active_policies',
        status: 503,
        message:
          'Request to http://insurance.test/owners/owner-a/policies/active returned 503 Service Unavailable',
      });
    });

    it('should wrap transport errors', async () => {
      const fetch = vi.fn<FetchLike>(async () => {
        throw new Error('connect ECONNREFUSED');
      });
      const client = new HttpRemittanceSplitClient('http://split.test', { fetch });

      await expect(client.getSplit()).rejects.toThrow(
        'Request to http://split.test/split failed: connect ECONNREFUSED',
      );
    });

    it('should reject bodies that are not JSON', async () => {
      const fetch = vi.fn<FetchLike>(async () => new Response('<html>', { status: 200 }));
      const client = new HttpRemittanceSplitClient('http://split.test', { fetch });

      await expect(client.getSplit()).rejects.toThrow('Response from http://split.test/split is not JSON');
    });

    it('should reject payloads that fail validation', async () => {
      const fetch = fakeFetch({ percentages: [50, -1] });
      const client = new HttpRemittanceSplitClient('http://split.test', { fetch });

      await expect(client.getSplit()).rejects.toThrow(
        'Response from http://split.test/split failed validation: percentages.1: Number must be greater than or equal to 0',
      );
    });
  });

  describe('HttpCollaboratorDirectory', () => {
    it('should hand out clients bound to each address', async () => {
      const fetch = fakeFetch({ total: 0 });
      const directory = new HttpCollaboratorDirectory({ fetch });

      await directory.billPayments('http://bills.test').getTotalUnpaid('x');
      await directory.insurance('http://insurance.test').getTotalMonthlyPremium('x');

      expect(fetch.mock.calls.map((call) => call[0])).toEqual([
        'http://bills.test/owners/x/bills/unpaid/total',
        'http://insurance.test/owners/x/premium/monthly',
      ]);
      expect(directory.remittanceSplit('http://split.test')).toBeInstanceOf(HttpRemittanceSplitClient);
      expect(directory.savingsGoals('http://savings.test')).toBeInstanceOf(HttpSavingsGoalsClient);
    });
  });
});
