import {
  CaptchaClientException,
  ErrorCategory,
} from './captcha-client.exception';

export interface ValidationErrorDetail {
  field?: string;
  message: string;
  code?: string;
}

/**
 * Exception thrown when a submission or configuration is invalid, either
 * locally (unknown image format, missing parameters) or because the provider
 * rejected the CAPTCHA. This is NOT a recoverable error.
 */
export class ValidationException extends CaptchaClientException {
  /**
   * @param message - Human-readable error message
   * @param validationErrors - Individual validation failures
   * @param context - Additional context information
   */
  constructor(
    message: string,
    public readonly validationErrors: ValidationErrorDetail[],
    context?: Record<string, unknown>,
  ) {
    super(message, 'VALIDATION_ERROR', ErrorCategory.VALIDATION, false, {
      validationErrors,
      ...context,
    });
    Object.setPrototypeOf(this, ValidationException.prototype);
  }

  /**
   * Creates a ValidationException from a single validation error.
   */
  static fromSingleError(
    message: string,
    field?: string,
    code?: string,
    context?: Record<string, unknown>,
  ): ValidationException {
    return new ValidationException(
      message,
      [{ field, message, code }],
      context,
    );
  }
}
