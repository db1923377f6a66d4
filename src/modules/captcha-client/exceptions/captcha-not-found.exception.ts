import {
  CaptchaClientException,
  ErrorCategory,
} from './captcha-client.exception';

export class CaptchaNotFoundException extends CaptchaClientException {
  constructor(public readonly captchaId: number) {
    super(
      `CAPTCHA ${captchaId} was not found`,
      'CAPTCHA_NOT_FOUND',
      ErrorCategory.NOT_FOUND,
      false,
      { captchaId },
    );
    Object.setPrototypeOf(this, CaptchaNotFoundException.prototype);
  }
}
