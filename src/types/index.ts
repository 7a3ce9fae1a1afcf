/**
 * Shared types and error classes for the reporting MCP server
 */

/**
 * Server configuration resolved from the environment
 */
export interface ServerConfig {
  /** Identity the server acts for; every ownership check compares against it */
  principal: string;
  /** Optional JSON snapshot file backing the reporting state */
  stateFile?: string;
}

/**
 * Raised when required configuration is absent: environment variables at
 * startup, or the admin identity / collaborator addresses at request time.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the invoking principal is not the identity an operation requires
 */
export class AuthorizationError extends Error {
  public readonly required: string;
  public readonly principal: string;

  constructor(message: string, required: string, principal: string) {
    super(message);
    this.name = 'AuthorizationError';
    this.required = required;
    this.principal = principal;
  }
}

export class AlreadyInitializedError extends Error {
  constructor(message = 'Reporting engine is already initialized') {
    super(message);
    this.name = 'AlreadyInitializedError';
  }
}

export type CollaboratorName = 'remittance_split' | 'savings_goals' | 'bill_payments' | 'insurance';

/**
 * Raised when a call to an upstream domain service fails for any reason
 * (transport, non-2xx status, malformed payload).
 */
export class CollaboratorError extends Error {
  public readonly collaborator: CollaboratorName;
  public readonly operation: string;
  public readonly status?: number | undefined;
  public readonly originalError?: unknown;

  constructor(
    collaborator: CollaboratorName,
    operation: string,
    message: string,
    options: { status?: number | undefined; originalError?: unknown } = {},
  ) {
    super(message);
    this.name = 'CollaboratorError';
    this.collaborator = collaborator;
    this.operation = operation;
    this.status = options.status;
    this.originalError = options.originalError;
  }
}

/**
 * Raised instead of wrapping when an amount or percentage leaves its integer range
 */
export class ArithmeticOverflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArithmeticOverflowError';
  }
}

export {
  ErrorHandler,
  ReportingErrorCode,
  ValidationError,
  createErrorHandler,
  withToolErrorHandling,
} from '../server/errorHandler.js';
export type { ErrorResponse } from '../server/errorHandler.js';
