/**
 * Standardized error handling utilities for the quality graph API
 *
 * Provides consistent error logging, categorization, and retry patterns
 * across fetching, caching and rendering.
 */

/**
 * Error categories for better classification and handling
 */
export enum ErrorCategory {
  NETWORK = 'network',
  STORAGE = 'storage',
  VALIDATION = 'validation',
  RENDERING = 'rendering',
  CONFIGURATION = 'configuration',
  PROCESSING = 'processing'
}

/**
 * Error severity levels for prioritization
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  originalError?: Error;
  context?: Record<string, unknown>;
  timestamp: Date;
  recoveryHint?: string;
  /** Itemized problems, e.g. one line per failed validation */
  details?: string[];
}

/**
 * Error result for operations that can fail gracefully
 */
export interface ErrorResult<T = unknown> {
  success: false;
  error: ErrorInfo;
  partialData?: T;
}

/**
 * Success result for operations
 */
export interface SuccessResult<T = unknown> {
  success: true;
  data: T;
}

/**
 * Combined result type for fallible operations
 */
export type OperationResult<T = unknown> = SuccessResult<T> | ErrorResult<T>;

/**
 * Retry behaviour for wrapOperationWithRetry
 */
export interface RetryOptions {
  /** Total attempts, including the first */
  maxRetries?: number;
  /** Delay before the second attempt; doubles on every further attempt */
  baseDelayMs?: number;
  /** Return false to give up immediately on a given error */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Standard error handler with categorization and recovery hints
 */
export class ErrorHandler {
  private static errorCounts = new Map<string, number>();
  private static maxRetries = 3;
  private static baseDelayMs = 1000;

  /**
   * Handle an error with proper categorization and logging
   */
  static handle(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    recoveryHint?: string,
    details?: string[]
  ): ErrorInfo {
    const errorInfo: ErrorInfo = {
      category,
      severity,
      message,
      originalError,
      context,
      timestamp: new Date(),
      recoveryHint,
      details
    };

    this.logError(errorInfo);
    this.trackErrorFrequency(category, message);

    return errorInfo;
  }

  /**
   * Create a standardized error result
   */
  static createErrorResult<T>(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    partialData?: T,
    recoveryHint?: string,
    details?: string[]
  ): ErrorResult<T> {
    const error = this.handle(category, severity, message, originalError, context, recoveryHint, details);

    return {
      success: false,
      error,
      partialData
    };
  }

  /**
   * Create a standardized success result
   */
  static createSuccessResult<T>(data: T): SuccessResult<T> {
    return {
      success: true,
      data
    };
  }

  /**
   * Wrap an operation with error handling
   */
  static async wrapOperation<T>(
    operation: () => Promise<T>,
    category: ErrorCategory,
    operationName: string,
    context?: Record<string, unknown>
  ): Promise<OperationResult<T>> {
    try {
      const result = await operation();
      return this.createSuccessResult(result);
    } catch (error) {
      return this.createErrorResult<T>(
        category,
        ErrorSeverity.MEDIUM,
        `Failed to ${operationName}`,
        toError(error),
        context,
        undefined,
        `Check ${category} configuration and retry`
      );
    }
  }

  /**
   * Wrap an operation with retry logic and exponential backoff
   */
  static async wrapOperationWithRetry<T>(
    operation: () => Promise<T>,
    category: ErrorCategory,
    operationName: string,
    context?: Record<string, unknown>,
    options: RetryOptions = {}
  ): Promise<OperationResult<T>> {
    const maxRetries = options.maxRetries ?? this.maxRetries;
    const baseDelayMs = options.baseDelayMs ?? this.baseDelayMs;
    let lastError: Error | undefined;
    let attempts = 0;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      attempts = attempt;
      try {
        const result = await operation();

        if (attempt > 1) {
          console.log(`✅ ${operationName} succeeded on attempt ${attempt}/${maxRetries}`);
        }

        return this.createSuccessResult(result);
      } catch (error) {
        lastError = toError(error);

        if (options.shouldRetry && !options.shouldRetry(lastError)) {
          break;
        }

        if (attempt < maxRetries) {
          console.warn(`⚠️ ${operationName} failed (attempt ${attempt}/${maxRetries}), retrying...`);
          await this.sleep(Math.pow(2, attempt - 1) * baseDelayMs);
        }
      }
    }

    return this.createErrorResult<T>(
      category,
      ErrorSeverity.HIGH,
      `Failed to ${operationName} after ${attempts} attempts`,
      lastError,
      { ...context, attempts },
      undefined,
      `Check ${category} configuration, network connectivity, and rate limits`
    );
  }

  /**
   * Log error with appropriate formatting
   */
  private static logError(errorInfo: ErrorInfo): void {
    const emoji = this.getSeverityEmoji(errorInfo.severity);
    const timestamp = errorInfo.timestamp.toISOString();

    const logMessage = [
      `${emoji} [${errorInfo.category.toUpperCase()}] ${errorInfo.message}`,
      `   Severity: ${errorInfo.severity}`,
      `   Time: ${timestamp}`,
      errorInfo.context ? `   Context: ${JSON.stringify(errorInfo.context)}` : '',
      ...(errorInfo.details ?? []).map(detail => `   - ${detail}`),
      errorInfo.recoveryHint ? `   💡 Hint: ${errorInfo.recoveryHint}` : '',
      errorInfo.originalError ? `   Original: ${errorInfo.originalError.message}` : ''
    ].filter(Boolean).join('\n');

    if (errorInfo.severity === ErrorSeverity.CRITICAL || errorInfo.severity === ErrorSeverity.HIGH) {
      console.error(logMessage);
    } else if (errorInfo.severity === ErrorSeverity.MEDIUM) {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }
  }

  /**
   * Track error frequency for monitoring
   */
  private static trackErrorFrequency(category: ErrorCategory, message: string): void {
    const key = `${category}:${message}`;
    const currentCount = this.errorCounts.get(key) || 0;
    this.errorCounts.set(key, currentCount + 1);

    if (currentCount > 5) {
      console.warn(`🔔 Frequent error detected: ${key} (${currentCount + 1} times)`);
    }
  }

  private static getSeverityEmoji(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.CRITICAL: return '🚨';
      case ErrorSeverity.HIGH: return '❌';
      case ErrorSeverity.MEDIUM: return '⚠️';
      case ErrorSeverity.LOW: return 'ℹ️';
    }
  }

  private static sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Get error statistics for monitoring
   */
  static getErrorStats(): Record<string, number> {
    return Object.fromEntries(this.errorCounts.entries());
  }

  static resetErrorStats(): void {
    this.errorCounts.clear();
  }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * True for a filesystem error raised because the path does not exist
 */
export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
