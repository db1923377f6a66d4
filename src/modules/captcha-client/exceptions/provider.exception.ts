import {
  CaptchaClientException,
  ErrorCategory,
} from './captcha-client.exception';

/**
 * Exception thrown when the provider answers with an error the client does
 * not recognise, or with a response it cannot parse.
 */
export class ProviderException extends CaptchaClientException {
  /**
   * @param message - Human-readable error message
   * @param apiResponse - Raw response from the provider (if available)
   * @param context - Additional context information
   */
  constructor(
    message: string,
    public readonly apiResponse?: unknown,
    context?: Record<string, unknown>,
  ) {
    super(message, 'PROVIDER_ERROR', ErrorCategory.PROVIDER, false, {
      apiResponse,
      ...context,
    });
    Object.setPrototypeOf(this, ProviderException.prototype);
  }
}
