/**
 * Unit tests for SecurityMiddleware class
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import {
  SecurityMiddleware,
  withSecurityWrapper,
  type SecurityContext,
} from '../securityMiddleware.js';
import { ErrorHandler } from '../errorHandler.js';
import { globalRequestLogger } from '../requestLogger.js';
import { parseResult } from '../../__tests__/testUtils.js';

describe('SecurityMiddleware', () => {
  const testSchema = z.object({
    owner: z.string().min(1),
    period_key: z.union([z.string(), z.number()]).optional(),
  });

  const okResult: CallToolResult = { content: [{ type: 'text', text: 'Success' }] };

  function contextFor(parameters: Record<string, unknown>): SecurityContext {
    return {
      principal: 'owner-a',
      toolName: 'reporting',
      operation: 'get_stored_report',
      parameters,
      startTime: Date.now(),
    };
  }

  beforeEach(() => {
    SecurityMiddleware.reset();
    ErrorHandler.setFormatter({ format: (value: unknown) => JSON.stringify(value) });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('withSecurity', () => {
    it('should execute operation successfully with valid input', async () => {
      const operation = vi.fn(async () => okResult);

      const result = await SecurityMiddleware.withSecurity(
        contextFor({ owner: 'owner-a', period_key: '7' }),
        testSchema,
        operation,
      );

      expect(operation).toHaveBeenCalledWith({ owner: 'owner-a', period_key: '7' });
      expect(result).toBe(okResult);
    });

    it('should validate input parameters', async () => {
      const operation = vi.fn(async () => okResult);

      const result = await SecurityMiddleware.withSecurity(
        contextFor({ owner: '' }),
        testSchema,
        operation,
      );

      expect(operation).not.toHaveBeenCalled();
      expect(result.isError).toBe(true);
      expect(parseResult(result)).toMatchObject({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid parameters for reporting',
          details: 'Validation failed: owner: String must contain at least 1 character(s)',
        },
      });
    });

    it('should label root-level issues', async () => {
      const result = await SecurityMiddleware.withSecurity(
        contextFor({ owner: 'owner-a' }),
        z.object({ owner: z.string() }).refine(() => false, 'Rejected'),
        vi.fn(async () => okResult),
      );

      expect(parseResult(result)).toMatchObject({
        error: { details: 'Validation failed: (root): Rejected' },
      });
    });

    it('should log successful requests with the principal', async () => {
      await SecurityMiddleware.withSecurity(
        contextFor({ owner: 'owner-a' }),
        testSchema,
        async () => okResult,
      );

      const [log] = globalRequestLogger.getRecentLogs(1);
      expect(log).toMatchObject({
        toolName: 'reporting',
        operation: 'get_stored_report',
        success: true,
        principal: 'owner-a',
      });
    });

    it('should log error results with their message', async () => {
      const failure = ErrorHandler.createValidationError('Owner mismatch');

      const result = await SecurityMiddleware.withSecurity(
        contextFor({ owner: 'owner-a' }),
        testSchema,
        async () => failure,
      );

      expect(result).toBe(failure);
      const [log] = globalRequestLogger.getRecentLogs(1);
      expect(log).toMatchObject({ success: false, error: 'Owner mismatch' });
    });

    it('should log and rethrow operation failures', async () => {
      await expect(
        SecurityMiddleware.withSecurity(contextFor({ owner: 'owner-a' }), testSchema, async () => {
          throw new Error('collaborator down');
        }),
      ).rejects.toThrow('collaborator down');

      const [log] = globalRequestLogger.getRecentLogs(1);
      expect(log).toMatchObject({ success: false, error: 'collaborator down' });
    });
  });

  describe('getSecurityStats', () => {
    it('should expose request statistics', async () => {
      await SecurityMiddleware.withSecurity(
        contextFor({ owner: 'owner-a' }),
        testSchema,
        async () => okResult,
      );

      const stats = SecurityMiddleware.getSecurityStats();
      expect(stats.requestStats).toMatchObject({
        totalRequests: 1,
        successfulRequests: 1,
        failedRequests: 0,
      });
    });

    it('should clear statistics on reset', async () => {
      await SecurityMiddleware.withSecurity(
        contextFor({ owner: 'owner-a' }),
        testSchema,
        async () => okResult,
      );

      SecurityMiddleware.reset();

      expect(SecurityMiddleware.getSecurityStats().requestStats).toMatchObject({ totalRequests: 0 });
    });
  });

  describe('withSecurityWrapper', () => {
    it('should build the context from its curried arguments', async () => {
      const handler = vi.fn(async () => okResult);

      const result = await withSecurityWrapper(
        'reporting',
        'get_admin',
        testSchema,
      )('admin-1')({ owner: 'admin-1' })(handler);

      expect(result).toBe(okResult);
      expect(handler).toHaveBeenCalledWith({ owner: 'admin-1' });
      expect(globalRequestLogger.getRecentLogs(1)[0]).toMatchObject({
        operation: 'get_admin',
        principal: 'admin-1',
      });
    });
  });
});
