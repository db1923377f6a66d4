/**
 * Captcha client public API
 */

export { CaptchaClientModule } from './captcha-client.module';

export { BaseCaptchaClient } from './clients/base-captcha-client';
export { SocketCaptchaClient } from './clients/socket-captcha-client';
export { HttpCaptchaClient } from './clients/http-captcha-client';
export {
  createCaptchaClient,
  type CaptchaClientDependencies,
} from './clients/captcha-client.factory';

export { SocketTransport } from './transports/socket.transport';
export { HttpTransport } from './transports/http.transport';

export { CaptchaClientConfigService } from './config/captcha-client-config.service';
export {
  API_VERSION,
  CAPTCHA_CLIENT,
  CAPTCHA_CLOCK,
  CaptchaTransportType,
  DEFAULT_CONFIG,
  type CaptchaClientConfig,
} from './config/constants';

export {
  CaptchaSolverService,
  SOLVER_DEFAULTS,
  type SolveOptions,
  type BatchSolveOptions,
} from './services/captcha-solver.service';
export { CaptchaResult, type CaptchaResultJson } from './services/captcha-result';

export * from './interfaces/captcha-client.interface';
export * from './interfaces/captcha-config.interface';
export * from './interfaces/captcha-type.interface';
export * from './exceptions';
export * from './utils';
