/**
 * CAPTCHA type discriminators understood by the service. IMAGE is the
 * default and is never sent on the wire.
 */
export enum CaptchaType {
  IMAGE = 0,
  COORDINATES = 2,
  IMAGE_GROUP = 3,
  RECAPTCHA_V2 = 4,
  RECAPTCHA_V3 = 5,
  FUNCAPTCHA = 6,
  HCAPTCHA = 7,
  GEETEST_V3 = 8,
  GEETEST_V4 = 9,
  TEXT = 11,
  TURNSTILE = 12,
  AUDIO = 13,
  LEMIN = 14,
  CAPY = 15,
  AMAZON_WAF = 16,
  SIARA = 17,
  MTCAPTCHA = 18,
  CUTCAPTCHA = 19,
  FRIENDLY_CAPTCHA = 20,
  DATADOME = 21,
  TENCENT = 23,
  ATB = 24,
  RECAPTCHA_V2_ENTERPRISE = 25,
}

/**
 * Types solved from an uploaded picture.
 */
export const IMAGE_CAPTCHA_TYPES: ReadonlySet<CaptchaType> = new Set([
  CaptchaType.IMAGE,
  CaptchaType.COORDINATES,
  CaptchaType.IMAGE_GROUP,
]);

/**
 * Wire field carrying the JSON-encoded parameters of each token type.
 */
export const CAPTCHA_PARAMS_FIELDS: Readonly<
  Partial<Record<CaptchaType, string>>
> = {
  [CaptchaType.RECAPTCHA_V2]: 'token_params',
  [CaptchaType.RECAPTCHA_V3]: 'token_params',
  [CaptchaType.FUNCAPTCHA]: 'funcaptcha_params',
  [CaptchaType.HCAPTCHA]: 'hcaptcha_params',
  [CaptchaType.GEETEST_V3]: 'geetest_params',
  [CaptchaType.GEETEST_V4]: 'geetest_params',
  [CaptchaType.TURNSTILE]: 'turnstile_params',
  [CaptchaType.LEMIN]: 'lemin_params',
  [CaptchaType.CAPY]: 'capy_params',
  [CaptchaType.AMAZON_WAF]: 'waf_params',
  [CaptchaType.SIARA]: 'siara_params',
  [CaptchaType.MTCAPTCHA]: 'mtcaptcha_params',
  [CaptchaType.CUTCAPTCHA]: 'cutcaptcha_params',
  [CaptchaType.FRIENDLY_CAPTCHA]: 'friendly_params',
  [CaptchaType.DATADOME]: 'datadome_params',
  [CaptchaType.TENCENT]: 'tencent_params',
  [CaptchaType.ATB]: 'atb_params',
  [CaptchaType.RECAPTCHA_V2_ENTERPRISE]: 'token_enterprise_params',
};

/**
 * Parameters shared by the reCAPTCHA token types.
 */
export interface TokenCaptchaParams extends Record<string, unknown> {
  googlekey: string;
  pageurl: string;
  proxy?: string;
  proxytype?: 'HTTP';
  action?: string;
  min_score?: number;
}
