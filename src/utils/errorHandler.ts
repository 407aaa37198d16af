/**
 * Centralized error handling utilities
 */

import { isAxiosError } from 'axios';

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  code: string;
  details?: ErrorDetails;

  constructor(message: string, code: string, details?: ErrorDetails) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
  }
}

export class DataError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'DATA_ERROR', details);
    this.name = 'DataError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class APIError extends AppError {
  statusCode?: number;

  constructor(message: string, statusCode?: number, details?: ErrorDetails) {
    super(message, 'API_ERROR', { statusCode, ...details });
    this.name = 'APIError';
    this.statusCode = statusCode;
  }
}

export type Severity = 'error' | 'warning';

export interface ErrorLogEntry {
  timestamp: Date;
  severity: Severity;
  error: AppError;
  context?: ErrorDetails;
}

export interface RetryOptions {
  maxRetries?: number;
  delay?: number;
  backoff?: number;
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Network failures, throttling and server errors; other 4xx responses will not
 * change on a second attempt.
 */
export function isTransientApiError(error: Error): boolean {
  if (!(error instanceof APIError)) return false;
  const status = error.statusCode;
  return status === undefined || status === 429 || status >= 500;
}

export class ErrorHandler {
  private entries: ErrorLogEntry[] = [];

  /**
   * Record and log an error. Returns the wrapped error so callers can rethrow it.
   */
  handleError(error: unknown, context?: ErrorDetails): AppError {
    const appError = this.wrapError(error);
    this.record('error', appError, context);

    console.error(`❌ [${appError.code}] ${appError.message}`, context ?? '');
    if (appError.details) {
      console.error('   Details:', appError.details);
    }
    return appError;
  }

  /**
   * Record a recoverable data problem; the game still gets a result.
   */
  handleWarning(message: string, context?: ErrorDetails): void {
    const warning = new DataError(message, context);
    this.record('warning', warning, context);
    console.warn(`⚠️ [${warning.code}] ${message}`, context ?? '');
  }

  /**
   * Classify what the stats client, the loaders and JSON parsing throw.
   */
  wrapError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (isAxiosError(error)) {
      const method = (error.config?.method ?? 'get').toUpperCase();
      const url = error.config?.url ?? 'request';
      return new APIError(`${method} ${url} failed: ${error.message}`, error.response?.status, {
        url,
        params: error.config?.params
      });
    }

    if (error instanceof SyntaxError) {
      return new DataError(`Malformed JSON: ${error.message}`);
    }

    if (error instanceof Error) {
      return new AppError(error.message, 'UNKNOWN_ERROR');
    }

    return new AppError(String(error), 'UNKNOWN_ERROR');
  }

  async withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const {
      maxRetries = 3,
      delay = 1000,
      backoff = 2,
      shouldRetry = isTransientApiError
    } = options;

    let lastError: Error | undefined;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error instanceof Error ? error : this.wrapError(error);

        if (!shouldRetry(lastError) || attempt === maxRetries - 1) {
          throw lastError;
        }

        const waitTime = delay * Math.pow(backoff, attempt);
        console.log(`  ↻ Retry ${attempt + 1}/${maxRetries - 1} in ${waitTime}ms: ${lastError.message}`);
        await new Promise(resolve => setTimeout(resolve, waitTime));
      }
    }

    throw lastError ?? new AppError('Retry loop exited without a result', 'UNKNOWN_ERROR');
  }

  getRecentErrors(limit: number = 10, severity?: Severity): ErrorLogEntry[] {
    const matching = severity ? this.entries.filter(entry => entry.severity === severity) : this.entries;
    return matching.slice(-limit);
  }

  private record(severity: Severity, error: AppError, context?: ErrorDetails): void {
    this.entries.push({ timestamp: new Date(), severity, error, context });
  }
}

export const errorHandler = new ErrorHandler();
