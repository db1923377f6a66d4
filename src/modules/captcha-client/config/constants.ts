/**
 * Configuration constants for the captcha-client module
 */

export const API_VERSION = 'DBC/NodeJS v4.7.0';

export const HTTP_BASE_URL = 'http://api.dbcapi.me/api';
export const HTTP_RESPONSE_TYPE = 'application/json';

export const SOCKET_HOST = 'api.dbcapi.me';
export const SOCKET_PORTS: readonly number[] = [
  8123, 8124, 8125, 8126, 8127, 8128, 8129, 8130,
];
export const SOCKET_TERMINATOR = '\r\n';

export enum CaptchaTransportType {
  SOCKET = 'socket',
  HTTP = 'http',
}

/**
 * Default decode timeouts
 */
export interface TimeoutConfig {
  /**
   * Seconds to wait for image CAPTCHAs
   * @default 60
   */
  defaultTimeoutSeconds: number;

  /**
   * Seconds to wait for token CAPTCHAs (reCAPTCHA, hCaptcha, ...)
   * @default 120
   */
  defaultTokenTimeoutSeconds: number;
}

/**
 * Poll schedule used while waiting for a solution
 */
export interface PollingConfig {
  /**
   * Delay before each successive poll, in milliseconds
   * @default [1000, 1000, 2000, 3000, 2000, 2000, 3000, 2000, 2000]
   */
  intervalsMs: number[];

  /**
   * Delay once `intervalsMs` is exhausted
   * @default 3000
   */
  defaultIntervalMs: number;
}

/**
 * Retry configuration for transient failures while polling
 */
export interface RetryConfig {
  /**
   * Attempts per poll, including the first
   * @default 3
   */
  maxAttempts: number;

  /**
   * Initial backoff delay in milliseconds
   * @default 1000
   */
  backoffMs: number;

  /**
   * Maximum backoff delay in milliseconds
   * @default 10000
   */
  maxBackoffMs: number;
}

export interface HttpConfig {
  baseUrl: string;
  /**
   * @default 30000
   */
  requestTimeoutMs: number;
}

export interface SocketConfig {
  host: string;
  ports: number[];
  /**
   * @default 10000
   */
  connectTimeoutMs: number;
  /**
   * @default 30000
   */
  requestTimeoutMs: number;
  /**
   * Connection attempts per request before a NetworkException surfaces
   * @default 2
   */
  maxReconnectAttempts: number;
}

/**
 * Complete captcha client configuration
 */
export interface CaptchaClientConfig {
  transport: CaptchaTransportType;
  timeouts: TimeoutConfig;
  polling: PollingConfig;
  retry: RetryConfig;
  http: HttpConfig;
  socket: SocketConfig;
  /** Log every request and response at debug level */
  verbose: boolean;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: CaptchaClientConfig = {
  transport: CaptchaTransportType.SOCKET,
  timeouts: {
    defaultTimeoutSeconds: 60,
    defaultTokenTimeoutSeconds: 120,
  },
  polling: {
    intervalsMs: [1000, 1000, 2000, 3000, 2000, 2000, 3000, 2000, 2000],
    defaultIntervalMs: 3000,
  },
  retry: {
    maxAttempts: 3,
    backoffMs: 1000,
    maxBackoffMs: 10000,
  },
  http: {
    baseUrl: HTTP_BASE_URL,
    requestTimeoutMs: 30000,
  },
  socket: {
    host: SOCKET_HOST,
    ports: [...SOCKET_PORTS],
    connectTimeoutMs: 10000,
    requestTimeoutMs: 30000,
    maxReconnectAttempts: 2,
  },
  verbose: false,
};

/**
 * Environment variable keys for configuration
 */
export const CONFIG_ENV_KEYS = {
  USERNAME: 'DBC_USERNAME',
  PASSWORD: 'DBC_PASSWORD',
  AUTHTOKEN: 'DBC_AUTHTOKEN',
  TRANSPORT: 'DBC_TRANSPORT',
  HTTP_BASE_URL: 'DBC_HTTP_BASE_URL',
  SOCKET_HOST: 'DBC_SOCKET_HOST',
  SOCKET_PORTS: 'DBC_SOCKET_PORTS',
  TIMEOUT_SECONDS: 'DBC_TIMEOUT_SECONDS',
  TOKEN_TIMEOUT_SECONDS: 'DBC_TOKEN_TIMEOUT_SECONDS',
  POLL_INTERVALS_MS: 'DBC_POLL_INTERVALS_MS',
  POLL_DEFAULT_INTERVAL_MS: 'DBC_POLL_DEFAULT_INTERVAL_MS',
  RETRY_MAX_ATTEMPTS: 'DBC_RETRY_MAX_ATTEMPTS',
  RETRY_BACKOFF_MS: 'DBC_RETRY_BACKOFF_MS',
  RETRY_MAX_BACKOFF_MS: 'DBC_RETRY_MAX_BACKOFF_MS',
  REQUEST_TIMEOUT_MS: 'DBC_REQUEST_TIMEOUT_MS',
  MAX_RECONNECT_ATTEMPTS: 'DBC_MAX_RECONNECT_ATTEMPTS',
  VERBOSE: 'DBC_VERBOSE',
} as const;

/**
 * Injection token for the configured ICaptchaClient
 */
export const CAPTCHA_CLIENT = Symbol('CAPTCHA_CLIENT');

/**
 * Optional injection token for the Clock used by CaptchaSolverService
 */
export const CAPTCHA_CLOCK = Symbol('CAPTCHA_CLOCK');
