/**
 * Error formatting utilities
 *
 * Consistent error formatting for logs and for results handed to agents.
 */

import { CaptchaClientException } from '../exceptions/captcha-client.exception';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readMessageField(error: Record<string, unknown>): string | undefined {
  const candidate = error.message ?? error.error;
  if (candidate === undefined || candidate === null || candidate === '') {
    return undefined;
  }
  return String(candidate);
}

/**
 * Format an error into a human-readable string
 *
 * @example
 * ```typescript
 * try {
 *   await client.getBalance();
 * } catch (error) {
 *   logger.error(formatError(error));
 * }
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof CaptchaClientException) {
    return error.toString();
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (isRecord(error)) {
    const message = readMessageField(error);
    if (message) {
      return message;
    }

    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }

  return 'Unknown error';
}

/**
 * Format an error for structured logging
 *
 * @param context - Additional fields to include in the log entry
 */
export function formatErrorForLogging(
  error: unknown,
  context?: Record<string, unknown>,
): Record<string, unknown> {
  const baseLog: Record<string, unknown> = {
    ...context,
    timestamp: new Date().toISOString(),
  };

  if (error instanceof CaptchaClientException) {
    return {
      ...baseLog,
      error: {
        name: error.name,
        message: error.message,
        code: error.code,
        category: error.category,
        isRecoverable: error.isRecoverable,
        context: error.context,
        stack: error.stack,
      },
    };
  }

  if (error instanceof Error) {
    return {
      ...baseLog,
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
    };
  }

  if (typeof error === 'string') {
    return {
      ...baseLog,
      error: {
        message: error,
      },
    };
  }

  if (isRecord(error)) {
    return {
      ...baseLog,
      error: {
        ...error,
        message: readMessageField(error) ?? 'Unknown error',
      },
    };
  }

  return {
    ...baseLog,
    error: {
      message: 'Unknown error',
      raw: String(error),
    },
  };
}

/**
 * Extract error message from various error types
 *
 * @returns Error message string, or 'Unknown error' if extraction fails
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (isRecord(error)) {
    return readMessageField(error) ?? 'Unknown error';
  }

  return 'Unknown error';
}

/**
 * Extract a machine-readable error code
 */
export function extractErrorCode(error: unknown): string | undefined {
  if (error instanceof CaptchaClientException) {
    return error.code;
  }

  if (isRecord(error)) {
    const code = error.code ?? error.errorCode;
    return typeof code === 'string' ? code : undefined;
  }

  return undefined;
}

/**
 * Check if an error is recoverable (can be retried)
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof CaptchaClientException) {
    return error.isRecoverable;
  }

  return false;
}
