/**
 * Captcha Client Utilities
 */

export {
  retryWithBackoff,
  calculateBackoffDelay,
  type RetryOptions,
} from './retry.util';

export {
  formatError,
  formatErrorForLogging,
  extractErrorMessage,
  extractErrorCode,
  isRecoverableError,
} from './error-formatter.util';

export { sniffImageFormat, SNIFF_LENGTH, type ImageFormat } from './image-sniffer.util';

export { loadImage, readImageSource, type LoadedImage } from './image-loader.util';

export { systemClock, type Clock } from './clock.util';

export {
  parseAccountSnapshot,
  parseCaptchaRecord,
  parseJsonObject,
  isPlainObject,
} from './response-parser.util';
