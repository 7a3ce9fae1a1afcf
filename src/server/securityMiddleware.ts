/**
 * Security middleware that combines input validation and request logging
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { globalRequestLogger, type LogStats } from './requestLogger.js';
import { ErrorHandler } from './errorHandler.js';

/**
 * Security context for requests
 */
export interface SecurityContext {
  principal: string;
  toolName: string;
  operation: string;
  parameters: Record<string, unknown>;
  startTime: number;
}

export type InputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Thrown when tool arguments do not satisfy the tool's schema
 */
export class InputValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'InputValidationError';
  }
}

/**
 * Pull the error message back out of a formatted error result for the log
 */
function describeErrorResult(result: CallToolResult): string {
  const first = result.content[0];
  if (!first || first.type !== 'text') {
    return 'Tool returned an error result';
  }
  try {
    const parsed: unknown = JSON.parse(first.text);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
      const { error } = parsed;
      if (typeof error === 'object' && error !== null && 'message' in error) {
        return String(error.message);
      }
    }
  } catch {
    return first.text;
  }
  return first.text;
}

/**
 * Security middleware class that wraps tool operations
 */
export class SecurityMiddleware {
  /**
   * Validate the arguments, run the operation and log the outcome
   */
  static async withSecurity<T>(
    context: SecurityContext,
    schema: InputSchema<T>,
    operation: (validated: T) => Promise<CallToolResult>,
  ): Promise<CallToolResult> {
    const startTime = Date.now();

    try {
      const validatedParams = this.validateInput(schema, context.parameters);
      const result = await operation(validatedParams);
      const duration = Date.now() - startTime;

      if (result.isError) {
        globalRequestLogger.logError(
          context.toolName,
          context.operation,
          context.parameters,
          describeErrorResult(result),
          duration,
          context.principal,
        );
      } else {
        globalRequestLogger.logSuccess(
          context.toolName,
          context.operation,
          context.parameters,
          duration,
          context.principal,
        );
      }

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';

      globalRequestLogger.logError(
        context.toolName,
        context.operation,
        context.parameters,
        errorMessage,
        duration,
        context.principal,
      );

      if (error instanceof InputValidationError) {
        return ErrorHandler.createValidationError(
          'Invalid parameters for ' + context.toolName,
          error.message,
        );
      }

      throw error;
    }
  }

  /**
   * Validate input parameters using Zod schema
   */
  private static validateInput<T>(schema: InputSchema<T>, parameters: Record<string, unknown>): T {
    const result = schema.safeParse(parameters);
    if (result.success) {
      return result.data;
    }

    const issues = result.error.issues;
    const errorMessage =
      issues.length > 0
        ? issues
            .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join(', ')
        : result.error.message;
    throw new InputValidationError(`Validation failed: ${errorMessage}`, issues);
  }

  static getSecurityStats(): { requestStats: LogStats } {
    return {
      requestStats: globalRequestLogger.getStats(),
    };
  }

  /**
   * Reset security state (useful for testing)
   */
  static reset(): void {
    globalRequestLogger.clearLogs();
  }
}

/**
 * Convenience function to wrap tool handlers with security
 */
export function withSecurityWrapper<T>(toolName: string, operation: string, schema: InputSchema<T>) {
  return (principal: string) =>
    (params: Record<string, unknown>) =>
    (handler: (validated: T) => Promise<CallToolResult>): Promise<CallToolResult> => {
      const context: SecurityContext = {
        principal,
        toolName,
        operation,
        parameters: params,
        startTime: Date.now(),
      };

      return SecurityMiddleware.withSecurity(context, schema, handler);
    };
}
