import {
  AccountSnapshot,
  CaptchaCredentials,
  CaptchaRecord,
} from '../interfaces/captcha-client.interface';
import { SocketClientOptions } from '../interfaces/captcha-config.interface';
import {
  ConnectionTransport,
  SocketMessage,
} from '../interfaces/transport.interface';
import {
  API_VERSION,
  CaptchaTransportType,
  DEFAULT_CONFIG,
} from '../config/constants';
import {
  AccessDeniedException,
  CaptchaClientException,
  CaptchaNotFoundException,
  ProviderException,
  ServiceOverloadException,
  ValidationException,
} from '../exceptions';
import {
  SocketExchange,
  SocketTransport,
} from '../transports/socket.transport';
import {
  parseAccountSnapshot,
  parseCaptchaRecord,
} from '../utils/response-parser.util';
import { BaseCaptchaClient, PreparedUpload } from './base-captcha-client';

type SocketCommand = 'login' | 'user' | 'upload' | 'captcha' | 'report';

/**
 * Maps the `error` field of a socket reply to an exception.
 */
export function toSocketError(
  response: SocketMessage,
): CaptchaClientException | null {
  const error = response.error;
  if (error === undefined || error === null || error === '') {
    return null;
  }

  const code = String(error);
  switch (code) {
    case 'not-logged-in':
    case 'invalid-credentials':
      return new AccessDeniedException(
        'Access denied, check your credentials',
        'invalid-credentials',
        { error: code },
      );
    case 'banned':
      return new AccessDeniedException(
        'Access denied, account is suspended',
        'banned',
        { error: code },
      );
    case 'insufficient-funds':
      return new AccessDeniedException(
        'CAPTCHA was rejected due to low balance',
        'insufficient-funds',
        { error: code },
      );
    case 'invalid-captcha':
      return ValidationException.fromSingleError(
        'CAPTCHA is not a valid image',
        'captcha',
        code,
      );
    case 'service-overload':
      return new ServiceOverloadException(undefined, { error: code });
    default:
      return new ProviderException(
        `API server error occurred: ${code}`,
        response,
      );
  }
}

/**
 * Client for the socket API: one persistent connection, logged in once per
 * connection, shared by every call on this instance.
 */
export class SocketCaptchaClient extends BaseCaptchaClient {
  readonly clientType = CaptchaTransportType.SOCKET;

  private readonly transport: ConnectionTransport<SocketMessage, SocketMessage>;

  constructor(
    credentials: CaptchaCredentials,
    options: SocketClientOptions = {},
  ) {
    super(credentials, options);
    this.transport =
      options.transport ??
      new SocketTransport(
        { ...DEFAULT_CONFIG.socket, ...options.socket },
        (exchange) => this.login(exchange),
      );
  }

  protected async fetchUser(): Promise<AccountSnapshot> {
    return parseAccountSnapshot(await this.call('user'));
  }

  protected async fetchCaptcha(captchaId: number): Promise<CaptchaRecord> {
    const record = parseCaptchaRecord(
      await this.call('captcha', { captcha: captchaId }),
    );
    if (!record) {
      throw new CaptchaNotFoundException(captchaId);
    }
    return record;
  }

  protected async submitUpload(upload: PreparedUpload): Promise<CaptchaRecord> {
    const data: SocketMessage = { ...upload.fields };
    if (upload.image) {
      data.captcha = upload.image.toString('base64');
    }
    if (upload.banner) {
      data.banner = upload.banner.toString('base64');
    }

    const response = await this.call('upload', data);
    const record = parseCaptchaRecord(response);
    if (!record) {
      throw new ProviderException('CAPTCHA upload returned no id', response);
    }
    return record;
  }

  protected async submitReport(captchaId: number): Promise<boolean> {
    const response = await this.call('report', { captcha: captchaId });
    return !response.is_correct;
  }

  protected async closeTransport(): Promise<void> {
    await this.transport.close();
  }

  private async call(
    cmd: Exclude<SocketCommand, 'login'>,
    data: SocketMessage = {},
  ): Promise<SocketMessage> {
    const request: SocketMessage = { ...data, cmd, version: API_VERSION };
    this.logWire('SEND', request);

    const response = await this.transport.send(request);
    this.logWire('RECV', response);

    const error = toSocketError(response);
    if (error) {
      if (error instanceof ProviderException) {
        // Unknown server errors leave the session in an unknown state
        await this.transport.reset();
      }
      throw error;
    }
    return response;
  }

  private async login(exchange: SocketExchange): Promise<void> {
    const request: SocketMessage = {
      ...this.getAuth(),
      cmd: 'login',
      version: API_VERSION,
    };
    this.logWire('SEND', request);

    const response = await exchange(request);
    this.logWire('RECV', response);

    const error = toSocketError(response);
    if (error) {
      throw error;
    }
    this.logger.debug('Logged in');
  }
}
