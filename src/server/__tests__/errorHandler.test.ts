import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ErrorHandler,
  ReportingErrorCode,
  ValidationError,
  createErrorHandler,
  withToolErrorHandling,
} from '../errorHandler.js';
import {
  AlreadyInitializedError,
  ArithmeticOverflowError,
  AuthorizationError,
  CollaboratorError,
  ConfigurationError,
} from '../../types/index.js';
import { parseResult, resultText } from '../../__tests__/testUtils.js';

describe('ErrorHandler', () => {
  afterEach(() => {
    ErrorHandler.setFormatter({ format: (value: unknown) => JSON.stringify(value, null, 2) });
  });

  describe('handleError', () => {
    it('marks every result as an error', () => {
      const result = ErrorHandler.handleError(new Error('boom'), 'testing');
      expect(result.isError).toBe(true);
      expect(result.content).toHaveLength(1);
    });

    it('maps a ValidationError with its details and suggestions', () => {
      const error = new ValidationError('Invalid input', 'owner: Required', ['Pass an owner']);
      const parsed = parseResult(ErrorHandler.handleError(error, 'validating'));

      expect(parsed).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid input',
          userMessage:
            'Some of the information provided is invalid. Please check your inputs and try again.',
          suggestions: ['Pass an owner'],
          details: 'owner: Required',
        },
      });
    });

    it('keeps field names that merely end in key', () => {
      const error = new ValidationError('Invalid input', 'period_key: Expected an integer');
      expect(parseResult(ErrorHandler.handleError(error, 'validating'))).toMatchObject({
        error: { details: 'period_key: Expected an integer' },
      });
    });

    it('maps a CollaboratorError with structured details', () => {
      const error = new CollaboratorError(
        'insurance',
        'get_active_policies',
        'Request to http://insurance.test/owners/a/policies/active returned 503 Service Unavailable',
        { status: 503 },
      );
      const parsed = parseResult(ErrorHandler.handleError(error, 'generating insurance report'));

      expect(parsed).toMatchObject({
        error: {
          code: 'COLLABORATOR_FAILURE',
          message: 'The insurance service failed during get_active_policies',
          details: {
            collaborator: 'insurance',
            operation: 'get_active_policies',
            reason:
              'Request to http://insurance.test/owners/a/policies/active returned 503 Service Unavailable',
            status: 503,
          },
        },
      });
    });

    it.each([
      [new ConfigurationError('Collaborator addresses are not configured'), 'CONFIGURATION_MISSING'],
      [new AuthorizationError('Not allowed', 'owner-a', 'owner-b'), 'UNAUTHORIZED'],
      [new AlreadyInitializedError(), 'ALREADY_INITIALIZED'],
      [new ArithmeticOverflowError('Annual premium overflowed'), 'ARITHMETIC_OVERFLOW'],
    ])('classifies %s', (error, code) => {
      const parsed = parseResult(ErrorHandler.handleError(error, 'testing'));
      expect(parsed).toMatchObject({ error: { code, message: error.message } });
    });

    it('falls back to UNKNOWN_ERROR with the context in the message', () => {
      const parsed = parseResult(
        ErrorHandler.handleError(new Error('unexpected'), 'generating savings report'),
      );

      expect(parsed).toMatchObject({
        error: {
          code: ReportingErrorCode.UNKNOWN_ERROR,
          message: 'An error occurred while generating savings report',
          userMessage: 'There was a problem producing the report. Please try again.',
          details: 'unexpected',
        },
      });
    });

    it('redacts credentials in details', () => {
      const parsed = parseResult(
        ErrorHandler.handleError(new Error('failed with Bearer test-secret'), 'testing'),
      );
      expect(parsed).toMatchObject({ error: { details: 'failed with Bearer ***' } });
    });

    it('falls back to JSON when the formatter throws', () => {
      const handler = createErrorHandler({
        format: () => {
          throw new Error('formatter broke');
        },
      });
      const result = handler.handleError(new AlreadyInitializedError(), 'initializing');

      expect(JSON.parse(resultText(result))).toMatchObject({
        error: { code: 'ALREADY_INITIALIZED' },
      });
    });

    it('uses the formatter given to setFormatter', () => {
      const format = vi.fn(() => 'formatted');
      ErrorHandler.setFormatter({ format });

      const result = ErrorHandler.handleError(new Error('x'), 'testing');

      expect(format).toHaveBeenCalledTimes(1);
      expect(resultText(result)).toBe('formatted');
    });
  });

  describe('createValidationError', () => {
    it('uses the default suggestions when none are given', () => {
      const parsed = parseResult(ErrorHandler.createValidationError('Bad month', 'month: Expected YYYY-MM'));

      expect(parsed).toMatchObject({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Bad month',
          details: 'month: Expected YYYY-MM',
          suggestions: [
            'Double-check all required fields are filled out',
            'Pass amounts and timestamps as integers or integer strings',
            'Use YYYY-MM for month shorthands',
          ],
        },
      });
    });
  });

  describe('tool helpers', () => {
    it('withToolErrorHandling passes results through', async () => {
      await expect(withToolErrorHandling(async () => 42, 'tool', 'op')).resolves.toBe(42);
    });

    it('withToolErrorHandling converts rejections', async () => {
      const result = await withToolErrorHandling(
        async () => {
          throw new ConfigurationError('Reporting engine is not initialized: no admin is recorded');
        },
        'configure_addresses',
        'configuring collaborator addresses',
      );

      expect(result).toMatchObject({ isError: true });
    });
  });
});
