import {
  CaptchaClientException,
  ErrorCategory,
} from './captcha-client.exception';

/**
 * Exception thrown when the provider cannot be reached, the connection drops
 * or a request times out. This is a recoverable error.
 */
export class NetworkException extends CaptchaClientException {
  /**
   * @param message - Human-readable error message
   * @param originalError - The underlying socket or HTTP error (if available)
   * @param context - Additional context information (host, port, url, timeout)
   */
  constructor(
    message: string,
    public readonly originalError?: Error,
    context?: Record<string, unknown>,
  ) {
    super(message, 'NETWORK_ERROR', ErrorCategory.NETWORK, true, {
      originalError: originalError
        ? {
            name: originalError.name,
            message: originalError.message,
            stack: originalError.stack,
          }
        : undefined,
      ...context,
    });
    Object.setPrototypeOf(this, NetworkException.prototype);
  }
}
