import { HttpService } from '@nestjs/axios';
import {
  CaptchaClientConfig,
  CaptchaTransportType,
} from '../config/constants';
import {
  CaptchaCredentials,
  ICaptchaClient,
} from '../interfaces/captcha-client.interface';
import { Clock } from '../utils/clock.util';
import { HttpCaptchaClient } from './http-captcha-client';
import { SocketCaptchaClient } from './socket-captcha-client';

export interface CaptchaClientDependencies {
  httpService?: HttpService;
  clock?: Clock;
}

/**
 * Builds the client selected by `config.transport`.
 */
export function createCaptchaClient(
  credentials: CaptchaCredentials,
  config: CaptchaClientConfig,
  dependencies: CaptchaClientDependencies = {},
): ICaptchaClient {
  const shared = {
    timeouts: config.timeouts,
    polling: config.polling,
    retry: config.retry,
    verbose: config.verbose,
    clock: dependencies.clock,
  };

  switch (config.transport) {
    case CaptchaTransportType.HTTP:
      return new HttpCaptchaClient(credentials, {
        ...shared,
        http: config.http,
        httpService: dependencies.httpService,
      });
    case CaptchaTransportType.SOCKET:
      return new SocketCaptchaClient(credentials, {
        ...shared,
        socket: config.socket,
      });
  }
}
