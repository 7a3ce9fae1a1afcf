import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import {
  AlreadyInitializedError,
  ArithmeticOverflowError,
  AuthorizationError,
  CollaboratorError,
  ConfigurationError,
} from '../types/index.js';

/**
 * Response formatter contract for dependency injection in error handling
 */
interface ErrorResponseFormatter {
  format(value: unknown): string;
}

/**
 * Error codes surfaced in tool responses
 */
export enum ReportingErrorCode {
  CONFIGURATION_MISSING = 'CONFIGURATION_MISSING',
  UNAUTHORIZED = 'UNAUTHORIZED',
  ALREADY_INITIALIZED = 'ALREADY_INITIALIZED',
  COLLABORATOR_FAILURE = 'COLLABORATOR_FAILURE',
  ARITHMETIC_OVERFLOW = 'ARITHMETIC_OVERFLOW',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Standardized error response structure
 */
export interface ErrorResponse {
  error: {
    code: ReportingErrorCode;
    message: string;
    userMessage: string; // User-friendly message
    details?: string | Record<string, unknown>;
    suggestions?: string[]; // Actionable suggestions for the user
  };
}

export class ValidationError extends Error {
  public readonly details?: string | undefined;
  public readonly suggestions?: string[] | undefined;

  constructor(message: string, details?: string | undefined, suggestions?: string[] | undefined) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
    this.suggestions = suggestions;
  }
}

/**
 * Centralized error handling for all reporting tools
 */
export class ErrorHandler {
  private formatter: ErrorResponseFormatter;
  private static defaultInstance: ErrorHandler | undefined;

  constructor(formatter: ErrorResponseFormatter) {
    this.formatter = formatter;
  }

  private static createFallbackFormatter(): ErrorResponseFormatter {
    return {
      format: (value: unknown) => JSON.stringify(value, null, 2),
    };
  }

  private static getDefaultInstance(): ErrorHandler {
    if (!ErrorHandler.defaultInstance) {
      ErrorHandler.defaultInstance = new ErrorHandler(ErrorHandler.createFallbackFormatter());
    }
    return ErrorHandler.defaultInstance;
  }

  /**
   * Sets the formatter for the shared default instance
   */
  static setFormatter(formatter: ErrorResponseFormatter): void {
    ErrorHandler.defaultInstance = new ErrorHandler(formatter);
  }

  /**
   * Converts any thrown value into an MCP error result
   */
  handleError(error: unknown, context: string): CallToolResult {
    const errorResponse = this.createErrorResponse(error, context);

    let formattedText: string;
    try {
      formattedText = this.formatter.format(errorResponse);
    } catch {
      // Fallback to JSON.stringify if formatter fails
      formattedText = JSON.stringify(errorResponse, null, 2);
    }

    return {
      isError: true,
      content: [
        {
          type: 'text',
          text: formattedText,
        },
      ],
    };
  }

  static handleError(error: unknown, context: string): CallToolResult {
    return ErrorHandler.getDefaultInstance().handleError(error, context);
  }

  /**
   * Maps an error to its code and builds the standardized response
   */
  private createErrorResponse(error: unknown, context: string): ErrorResponse {
    if (error instanceof ValidationError) {
      const sanitizedDetails = error.details ? this.sanitizeErrorDetails(error.details) : undefined;
      const suggestions =
        error.suggestions && error.suggestions.length > 0
          ? error.suggestions
          : this.getErrorSuggestions(ReportingErrorCode.VALIDATION_ERROR);
      return {
        error: {
          code: ReportingErrorCode.VALIDATION_ERROR,
          message: error.message,
          userMessage: this.getUserFriendlyMessage(ReportingErrorCode.VALIDATION_ERROR, context),
          suggestions,
          ...(sanitizedDetails && { details: sanitizedDetails }),
        },
      };
    }

    if (error instanceof CollaboratorError) {
      const sanitizedDetails = this.sanitizeErrorDetails(error.message);
      return {
        error: {
          code: ReportingErrorCode.COLLABORATOR_FAILURE,
          message: `The ${error.collaborator} service failed during ${error.operation}`,
          userMessage: this.getUserFriendlyMessage(ReportingErrorCode.COLLABORATOR_FAILURE, context),
          suggestions: this.getErrorSuggestions(ReportingErrorCode.COLLABORATOR_FAILURE),
          ...(sanitizedDetails && {
            details: {
              collaborator: error.collaborator,
              operation: error.operation,
              reason: sanitizedDetails,
              ...(error.status !== undefined && { status: error.status }),
            },
          }),
        },
      };
    }

    const code = this.classify(error);
    if (code && error instanceof Error) {
      return {
        error: {
          code,
          message: error.message,
          userMessage: this.getUserFriendlyMessage(code, context),
          suggestions: this.getErrorSuggestions(code),
        },
      };
    }

    // Fallback for unknown errors
    const details = error instanceof Error ? this.sanitizeErrorDetails(error.message) : undefined;
    return {
      error: {
        code: ReportingErrorCode.UNKNOWN_ERROR,
        message: `An error occurred while ${context}`,
        userMessage: this.getUserFriendlyMessage(ReportingErrorCode.UNKNOWN_ERROR, context),
        suggestions: this.getErrorSuggestions(ReportingErrorCode.UNKNOWN_ERROR),
        ...(details && { details }),
      },
    };
  }

  private classify(error: unknown): ReportingErrorCode | null {
    if (error instanceof ConfigurationError) {
      return ReportingErrorCode.CONFIGURATION_MISSING;
    }
    if (error instanceof AuthorizationError) {
      return ReportingErrorCode.UNAUTHORIZED;
    }
    if (error instanceof AlreadyInitializedError) {
      return ReportingErrorCode.ALREADY_INITIALIZED;
    }
    if (error instanceof ArithmeticOverflowError) {
      return ReportingErrorCode.ARITHMETIC_OVERFLOW;
    }
    return null;
  }

  /**
   * Returns user-friendly error messages for end users
   */
  private getUserFriendlyMessage(code: ReportingErrorCode, context: string): string {
    switch (code) {
      case ReportingErrorCode.CONFIGURATION_MISSING:
        return 'The reporting service is not fully configured yet.';
      case ReportingErrorCode.UNAUTHORIZED:
        return 'You are not allowed to perform this operation for that identity.';
      case ReportingErrorCode.ALREADY_INITIALIZED:
        return 'The reporting service already has an administrator.';
      case ReportingErrorCode.COLLABORATOR_FAILURE:
        return 'One of the upstream financial services could not be reached or returned invalid data. No report was produced.';
      case ReportingErrorCode.ARITHMETIC_OVERFLOW:
        return 'The figures involved are too large to report accurately.';
      case ReportingErrorCode.VALIDATION_ERROR:
        return 'Some of the information provided is invalid. Please check your inputs and try again.';
      default:
        return this.getUserFriendlyGenericMessage(context);
    }
  }

  /**
   * Returns actionable suggestions based on error type
   */
  private getErrorSuggestions(code: ReportingErrorCode): string[] {
    switch (code) {
      case ReportingErrorCode.CONFIGURATION_MISSING:
        return [
          'Run the initialize tool to record an administrator',
          'Run configure_addresses as the administrator to register the upstream services',
        ];
      case ReportingErrorCode.UNAUTHORIZED:
        return [
          'Make sure the owner or caller matches the identity this server acts for',
          'Administrative changes can only be made by the recorded administrator',
        ];
      case ReportingErrorCode.ALREADY_INITIALIZED:
        return ['Use get_admin to see the current administrator'];
      case ReportingErrorCode.COLLABORATOR_FAILURE:
        return [
          'Check that the configured service addresses are reachable',
          'Use get_addresses to review the configured services',
          'Try the request again once the upstream service recovers',
        ];
      case ReportingErrorCode.ARITHMETIC_OVERFLOW:
        return ['Verify the upstream records for implausibly large amounts'];
      case ReportingErrorCode.VALIDATION_ERROR:
        return [
          'Double-check all required fields are filled out',
          'Pass amounts and timestamps as integers or integer strings',
          'Use YYYY-MM for month shorthands',
        ];
      default:
        return ['Try the operation again', 'Contact support if the issue persists'];
    }
  }

  private getUserFriendlyGenericMessage(context: string): string {
    if (context.includes('report')) {
      return 'There was a problem producing the report. Please try again.';
    }
    return 'Something went wrong. Please try again in a moment.';
  }

  /**
   * Sanitizes error details to prevent sensitive data leakage
   */
  private sanitizeErrorDetails(error: unknown): string | undefined {
    if (!error) return undefined;

    let details = '';
    if (error instanceof Error) {
      details = error.message;
    } else if (typeof error === 'string') {
      details = error;
    } else {
      details = 'Unknown error details';
    }

    return (
      details
        .replace(/token[s]?[:\s=]+([^\s,"']+)/gi, 'token=***')
        .replace(/\b(?:api[_-]?)?key[s]?[:\s=]+([^\s,"']+)/gi, 'key=***')
        .replace(/password[s]?[:\s=]+([^\s,"']+)/gi, 'password=***')
        .replace(/authorization[:\s=]+[^\r\n]+/gi, 'authorization=***')
        .replace(/\bBearer\s+[A-Za-z0-9._-]+/gi, 'Bearer ***')
    );
  }

  /**
   * Wraps async functions with error handling
   */
  async withErrorHandling<T>(
    operation: () => Promise<T>,
    context: string,
  ): Promise<T | CallToolResult> {
    try {
      return await operation();
    } catch (error) {
      return this.handleError(error, context);
    }
  }

  static async withErrorHandling<T>(
    operation: () => Promise<T>,
    context: string,
  ): Promise<T | CallToolResult> {
    return ErrorHandler.getDefaultInstance().withErrorHandling(operation, context);
  }

  /**
   * Creates a validation error result for invalid parameters
   */
  createValidationError(message: string, details?: string, suggestions?: string[]): CallToolResult {
    return this.handleError(
      new ValidationError(message, details, suggestions),
      'validating parameters',
    );
  }

  static createValidationError(
    message: string,
    details?: string,
    suggestions?: string[],
  ): CallToolResult {
    return ErrorHandler.getDefaultInstance().createValidationError(message, details, suggestions);
  }
}

/**
 * Create an ErrorHandler configured with the given response formatter.
 */
export function createErrorHandler(formatter: ErrorResponseFormatter): ErrorHandler {
  return new ErrorHandler(formatter);
}

/**
 * Utility function for wrapping tool operations with error handling
 */
export async function withToolErrorHandling<T>(
  operation: () => Promise<T>,
  toolName: string,
  operationName: string,
): Promise<T | CallToolResult> {
  return ErrorHandler.withErrorHandling(operation, `executing ${toolName} - ${operationName}`);
}
