import { HttpService } from '@nestjs/axios';
import {
  HttpConfig,
  PollingConfig,
  RetryConfig,
  SocketConfig,
  TimeoutConfig,
} from '../config/constants';
import { Clock } from '../utils/clock.util';
import {
  CaptchaTransport,
  ConnectionTransport,
  HttpApiRequest,
  HttpApiResponse,
  SocketMessage,
} from './transport.interface';

/**
 * Options shared by every transport client. Missing values fall back to
 * DEFAULT_CONFIG.
 */
export interface CaptchaClientOptions {
  timeouts?: Partial<TimeoutConfig>;
  polling?: Partial<PollingConfig>;
  retry?: Partial<RetryConfig>;
  /**
   * Log every request and response (credentials redacted)
   */
  verbose?: boolean;
  clock?: Clock;
}

export interface SocketClientOptions extends CaptchaClientOptions {
  socket?: Partial<SocketConfig>;
  /**
   * Replaces the TCP transport; the caller then owns the login handshake
   */
  transport?: ConnectionTransport<SocketMessage, SocketMessage>;
}

export interface HttpClientOptions extends CaptchaClientOptions {
  http?: Partial<HttpConfig>;
  httpService?: HttpService;
  transport?: CaptchaTransport<HttpApiRequest, HttpApiResponse>;
}
