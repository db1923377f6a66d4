export {
  CaptchaClientException,
  ErrorCategory,
} from './captcha-client.exception';
export {
  AccessDeniedException,
  type AccessDeniedReason,
} from './access-denied.exception';
export {
  ValidationException,
  type ValidationErrorDetail,
} from './validation.exception';
export { ServiceOverloadException } from './service-overload.exception';
export { NetworkException } from './network.exception';
export { CaptchaNotFoundException } from './captcha-not-found.exception';
export { ProviderException } from './provider.exception';
export { ClientClosedException } from './client-closed.exception';
