/**
 * DocFusion Error Handler
 *
 * Converts thrown values to user-facing messages, determines retryability,
 * and wraps async functions so that failures come back as values.
 */

import {
  DocFusionError,
  AdapterError,
  AuthenticationError,
  ConfigurationError,
  NotFoundError,
  RecognitionTimeoutError,
  UnsupportedInputError,
} from './docfusion-error.js';

export type WrapResult<T> = { data: T; error?: undefined } | { data?: undefined; error: DocFusionError };

export class ErrorHandler {
  /**
   * Convert any thrown value to a friendly user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof RecognitionTimeoutError) {
      const seconds = Math.ceil(err.timeoutMs / 1000);
      return `Recognition timed out after ${seconds}s.`;
    }
    if (err instanceof AuthenticationError) {
      return 'Authentication failed. Run `docfusion config set` to update credentials.';
    }
    if (err instanceof UnsupportedInputError || err instanceof NotFoundError) {
      return err.message;
    }
    if (err instanceof DocFusionError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  /**
   * Returns true if the error is transient and worth retrying by a caller.
   * The core itself never retries.
   */
  static isRetryable(err: unknown): boolean {
    if (err instanceof RecognitionTimeoutError) return true;
    if (err instanceof AdapterError) return true;
    if (err instanceof AuthenticationError) return false;
    if (err instanceof ConfigurationError) return false;
    if (err instanceof NotFoundError) return false;
    return false;
  }

  /**
   * Wrap an async function with structured error handling.
   * Never throws; failures are returned as { error }.
   */
  static async wrap<T>(
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<WrapResult<T>> {
    try {
      const data = await fn();
      return { data };
    } catch (err) {
      if (err instanceof DocFusionError) {
        return { error: err };
      }
      const wrapped = new DocFusionError(
        err instanceof Error ? err.message : String(err),
        'UNKNOWN_ERROR',
        context
      );
      return { error: wrapped };
    }
  }
}
