/**
 * Unit tests for the error handling utilities
 */

import { ErrorCategory, ErrorHandler, ErrorSeverity, isMissingFile, toError } from '../../utils/error-handler.js';

describe('ErrorHandler', () => {
  beforeEach(() => {
    ErrorHandler.resetErrorStats();
  });

  test('should wrap a successful operation', async () => {
    const result = await ErrorHandler.wrapOperation(async () => 42, ErrorCategory.PROCESSING, 'compute');

    expect(result).toEqual({ success: true, data: 42 });
  });

  test('should wrap a failing operation into an error result', async () => {
    const result = await ErrorHandler.wrapOperation(
      async () => {
        throw new Error('disk full');
      },
      ErrorCategory.STORAGE,
      'save cache'
    );

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('Failed to save cache');
    expect(result.error.severity).toBe(ErrorSeverity.MEDIUM);
    expect(result.error.originalError?.message).toBe('disk full');
  });

  test('should retry until the operation succeeds', async () => {
    const operation = jest.fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    const result = await ErrorHandler.wrapOperationWithRetry(
      operation, ErrorCategory.NETWORK, 'fetch', undefined, { maxRetries: 3, baseDelayMs: 0 }
    );

    expect(result).toEqual({ success: true, data: 'ok' });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test('should stop early when the error is not retryable', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('forbidden'));

    const result = await ErrorHandler.wrapOperationWithRetry(
      operation, ErrorCategory.NETWORK, 'load', { url: 'u' },
      { maxRetries: 3, baseDelayMs: 0, shouldRetry: () => false }
    );

    expect(operation).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('Failed to load after 1 attempts');
    expect(result.error.context).toEqual({ url: 'u', attempts: 1 });
    expect(ErrorHandler.getErrorStats()).toEqual({ 'network:Failed to load after 1 attempts': 1 });
  });

  test('should normalize thrown values and detect missing files', () => {
    expect(toError('boom').message).toBe('boom');
    expect(isMissingFile(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
    expect(isMissingFile(new Error('other'))).toBe(false);
  });
});
