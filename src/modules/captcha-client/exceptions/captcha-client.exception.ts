/**
 * Error categories for captcha client exceptions
 */
export enum ErrorCategory {
  ACCESS_DENIED = 'ACCESS_DENIED',
  VALIDATION = 'VALIDATION',
  OVERLOAD = 'OVERLOAD',
  NETWORK = 'NETWORK',
  NOT_FOUND = 'NOT_FOUND',
  PROVIDER = 'PROVIDER',
  AVAILABILITY = 'AVAILABILITY',
}

/**
 * Base exception class for all captcha client errors.
 * Carries a machine-readable code, a category and a recovery flag so callers
 * can branch without matching on messages.
 */
export class CaptchaClientException extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Machine-readable error code (e.g. 'ACCESS_DENIED', 'SERVICE_OVERLOAD')
   * @param category - Error category indicating the type of error
   * @param isRecoverable - Whether the operation may succeed if retried
   * @param context - Additional context (captcha id, endpoint, wire error, ...)
   */
  constructor(
    message: string,
    public readonly code: string,
    public readonly category: ErrorCategory,
    public readonly isRecoverable: boolean = false,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    Object.setPrototypeOf(this, CaptchaClientException.prototype);
  }

  /**
   * Converts the exception to a JSON-serializable object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      isRecoverable: this.isRecoverable,
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    const parts = [
      `${this.name} [${this.code}]`,
      `Category: ${this.category}`,
      `Recoverable: ${this.isRecoverable}`,
      `Message: ${this.message}`,
    ];

    if (this.context && Object.keys(this.context).length > 0) {
      parts.push(`Context: ${JSON.stringify(this.context)}`);
    }

    return parts.join('\n');
  }
}
