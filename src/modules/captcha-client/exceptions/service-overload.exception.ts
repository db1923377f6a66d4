import {
  CaptchaClientException,
  ErrorCategory,
} from './captcha-client.exception';

/**
 * The provider is temporarily unable to accept work. Recoverable.
 */
export class ServiceOverloadException extends CaptchaClientException {
  constructor(
    message = 'CAPTCHA was rejected due to service overload, try again later',
    context?: Record<string, unknown>,
  ) {
    super(message, 'SERVICE_OVERLOAD', ErrorCategory.OVERLOAD, true, context);
    Object.setPrototypeOf(this, ServiceOverloadException.prototype);
  }
}
