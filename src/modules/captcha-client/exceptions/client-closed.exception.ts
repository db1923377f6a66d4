import {
  CaptchaClientException,
  ErrorCategory,
} from './captcha-client.exception';

/**
 * Thrown by every operation invoked after `close()`.
 */
export class ClientClosedException extends CaptchaClientException {
  constructor(public readonly clientType: string, operation?: string) {
    super(
      operation
        ? `Cannot ${operation}: ${clientType} client is closed`
        : `${clientType} client is closed`,
      'CLIENT_CLOSED',
      ErrorCategory.AVAILABILITY,
      false,
      { clientType, operation },
    );
    Object.setPrototypeOf(this, ClientClosedException.prototype);
  }
}
