import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CaptchaClientConfig,
  CaptchaTransportType,
  CONFIG_ENV_KEYS,
  DEFAULT_CONFIG,
} from './constants';
import { CaptchaCredentials } from '../interfaces/captcha-client.interface';
import { ValidationException } from '../exceptions';

/**
 * Service for loading captcha-client configuration
 * Loads configuration from environment variables with fallback to defaults
 */
@Injectable()
export class CaptchaClientConfigService {
  private readonly config: CaptchaClientConfig;

  constructor(private readonly configService: ConfigService) {
    this.config = this.loadConfiguration();
  }

  /**
   * Get the complete configuration
   */
  getConfig(): CaptchaClientConfig {
    return this.config;
  }

  getTransport(): CaptchaTransportType {
    return this.config.transport;
  }

  /**
   * Credentials from the environment. An auth token wins over a
   * username/password pair.
   *
   * @throws ValidationException when neither form is configured
   */
  getCredentials(): CaptchaCredentials {
    const authtoken = this.getString(CONFIG_ENV_KEYS.AUTHTOKEN);
    if (authtoken) {
      return { authtoken };
    }

    const username = this.getString(CONFIG_ENV_KEYS.USERNAME);
    const password = this.getString(CONFIG_ENV_KEYS.PASSWORD);
    if (username && password) {
      return { username, password };
    }

    throw new ValidationException(
      `Set ${CONFIG_ENV_KEYS.AUTHTOKEN}, or ${CONFIG_ENV_KEYS.USERNAME} and ${CONFIG_ENV_KEYS.PASSWORD}`,
      [
        {
          field: CONFIG_ENV_KEYS.AUTHTOKEN,
          message: 'No credentials configured',
          code: 'MISSING_CREDENTIALS',
        },
      ],
    );
  }

  /**
   * Load configuration from environment variables with defaults
   */
  private loadConfiguration(): CaptchaClientConfig {
    const requestTimeoutMs = this.getNumber(CONFIG_ENV_KEYS.REQUEST_TIMEOUT_MS);

    return {
      transport:
        this.getString(CONFIG_ENV_KEYS.TRANSPORT) === CaptchaTransportType.HTTP
          ? CaptchaTransportType.HTTP
          : DEFAULT_CONFIG.transport,
      timeouts: {
        defaultTimeoutSeconds:
          this.getNumber(CONFIG_ENV_KEYS.TIMEOUT_SECONDS) ||
          DEFAULT_CONFIG.timeouts.defaultTimeoutSeconds,
        defaultTokenTimeoutSeconds:
          this.getNumber(CONFIG_ENV_KEYS.TOKEN_TIMEOUT_SECONDS) ||
          DEFAULT_CONFIG.timeouts.defaultTokenTimeoutSeconds,
      },
      polling: {
        intervalsMs:
          this.getNumberList(CONFIG_ENV_KEYS.POLL_INTERVALS_MS) ??
          [...DEFAULT_CONFIG.polling.intervalsMs],
        defaultIntervalMs:
          this.getNumber(CONFIG_ENV_KEYS.POLL_DEFAULT_INTERVAL_MS) ||
          DEFAULT_CONFIG.polling.defaultIntervalMs,
      },
      retry: {
        maxAttempts:
          this.getNumber(CONFIG_ENV_KEYS.RETRY_MAX_ATTEMPTS) ||
          DEFAULT_CONFIG.retry.maxAttempts,
        backoffMs:
          this.getNumber(CONFIG_ENV_KEYS.RETRY_BACKOFF_MS) ??
          DEFAULT_CONFIG.retry.backoffMs,
        maxBackoffMs:
          this.getNumber(CONFIG_ENV_KEYS.RETRY_MAX_BACKOFF_MS) ??
          DEFAULT_CONFIG.retry.maxBackoffMs,
      },
      http: {
        baseUrl:
          this.getString(CONFIG_ENV_KEYS.HTTP_BASE_URL) ||
          DEFAULT_CONFIG.http.baseUrl,
        requestTimeoutMs:
          requestTimeoutMs || DEFAULT_CONFIG.http.requestTimeoutMs,
      },
      socket: {
        host:
          this.getString(CONFIG_ENV_KEYS.SOCKET_HOST) ||
          DEFAULT_CONFIG.socket.host,
        ports:
          this.getNumberList(CONFIG_ENV_KEYS.SOCKET_PORTS) ??
          [...DEFAULT_CONFIG.socket.ports],
        connectTimeoutMs: DEFAULT_CONFIG.socket.connectTimeoutMs,
        requestTimeoutMs:
          requestTimeoutMs || DEFAULT_CONFIG.socket.requestTimeoutMs,
        maxReconnectAttempts:
          this.getNumber(CONFIG_ENV_KEYS.MAX_RECONNECT_ATTEMPTS) ||
          DEFAULT_CONFIG.socket.maxReconnectAttempts,
      },
      verbose:
        this.getBoolean(CONFIG_ENV_KEYS.VERBOSE) ?? DEFAULT_CONFIG.verbose,
    };
  }

  private getString(key: string): string | null {
    const value = this.configService.get<string | number | boolean>(key);
    if (value === undefined || value === null) {
      return null;
    }
    const text = String(value).trim();
    return text.length > 0 ? text : null;
  }

  /**
   * Helper method to get a number from environment variables
   */
  private getNumber(key: string): number | null {
    const value = this.getString(key);
    if (value === null) {
      return null;
    }
    const parsed = Number(value);
    return isNaN(parsed) ? null : parsed;
  }

  private getBoolean(key: string): boolean | null {
    const value = this.getString(key);
    if (value === null) {
      return null;
    }
    return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
  }

  /**
   * Comma-separated integers; null when unset or when any entry is invalid
   */
  private getNumberList(key: string): number[] | null {
    const value = this.getString(key);
    if (value === null) {
      return null;
    }
    const numbers = value.split(',').map((entry) => Number(entry.trim()));
    if (numbers.length === 0 || numbers.some((entry) => isNaN(entry))) {
      return null;
    }
    return numbers;
  }
}
