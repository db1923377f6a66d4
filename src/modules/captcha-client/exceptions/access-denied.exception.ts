import {
  CaptchaClientException,
  ErrorCategory,
} from './captcha-client.exception';

/**
 * Why the provider refused the request.
 */
export type AccessDeniedReason =
  | 'invalid-credentials'
  | 'banned'
  | 'insufficient-funds'
  | 'forbidden';

/**
 * Thrown when the provider rejects the credentials, the account is suspended
 * or the balance is too low. Retrying will not help.
 */
export class AccessDeniedException extends CaptchaClientException {
  constructor(
    message: string,
    public readonly reason: AccessDeniedReason,
    context?: Record<string, unknown>,
  ) {
    super(message, 'ACCESS_DENIED', ErrorCategory.ACCESS_DENIED, false, {
      reason,
      ...context,
    });
    Object.setPrototypeOf(this, AccessDeniedException.prototype);
  }
}
