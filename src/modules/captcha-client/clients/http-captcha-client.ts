import { HttpService } from '@nestjs/axios';
import {
  AccountSnapshot,
  CaptchaCredentials,
  CaptchaRecord,
} from '../interfaces/captcha-client.interface';
import { HttpClientOptions } from '../interfaces/captcha-config.interface';
import {
  CaptchaTransport,
  HttpApiRequest,
  HttpApiResponse,
} from '../interfaces/transport.interface';
import { CaptchaTransportType, DEFAULT_CONFIG } from '../config/constants';
import {
  AccessDeniedException,
  CaptchaClientException,
  CaptchaNotFoundException,
  ProviderException,
  ServiceOverloadException,
  ValidationException,
} from '../exceptions';
import { HttpTransport } from '../transports/http.transport';
import {
  parseAccountSnapshot,
  parseCaptchaRecord,
  parseJsonObject,
} from '../utils/response-parser.util';
import { BaseCaptchaClient, PreparedUpload } from './base-captcha-client';

/**
 * Maps an HTTP status to an exception, or null for success.
 * @param captchaId - set for CAPTCHA lookups, where 404 means "not found"
 */
export function toHttpError(
  response: HttpApiResponse,
  captchaId?: number,
): CaptchaClientException | null {
  const { status } = response;

  if (status === 403) {
    return new AccessDeniedException(
      'Access denied, please check your credentials and/or balance',
      'forbidden',
      { status },
    );
  }
  if (status === 400 || status === 413) {
    return ValidationException.fromSingleError(
      "CAPTCHA was rejected by the service, check if it's a valid image",
      'captcha',
      'CAPTCHA_REJECTED',
      { status },
    );
  }
  if (status === 503) {
    return new ServiceOverloadException(undefined, { status });
  }
  if (status === 404 && captchaId !== undefined) {
    return new CaptchaNotFoundException(captchaId);
  }
  // Uploads answer 303 See Other with the new CAPTCHA in the body
  if (status === 303) {
    return null;
  }
  if (status < 200 || status >= 300) {
    return new ProviderException(
      `Invalid API response: HTTP ${status}`,
      response.body,
      { status },
    );
  }
  return null;
}

/**
 * Client for the HTTP API. Holds no connection state; credentials travel
 * with every authenticated request.
 */
export class HttpCaptchaClient extends BaseCaptchaClient {
  readonly clientType = CaptchaTransportType.HTTP;

  private readonly transport: CaptchaTransport<HttpApiRequest, HttpApiResponse>;

  constructor(credentials: CaptchaCredentials, options: HttpClientOptions = {}) {
    super(credentials, options);
    this.transport =
      options.transport ??
      new HttpTransport(
        { ...DEFAULT_CONFIG.http, ...options.http },
        options.httpService ?? new HttpService(),
      );
  }

  protected async fetchUser(): Promise<AccountSnapshot> {
    const response = await this.call({
      method: 'POST',
      path: 'user',
      fields: this.getAuth(),
    });
    return parseAccountSnapshot(response);
  }

  protected async fetchCaptcha(captchaId: number): Promise<CaptchaRecord> {
    const response = await this.call(
      { method: 'GET', path: `captcha/${captchaId}` },
      captchaId,
    );
    const record = parseCaptchaRecord(response);
    if (!record) {
      throw new CaptchaNotFoundException(captchaId);
    }
    return record;
  }

  protected async submitUpload(upload: PreparedUpload): Promise<CaptchaRecord> {
    const fields: Record<string, string> = { ...this.getAuth() };
    for (const [name, value] of Object.entries(upload.fields)) {
      fields[name] = String(value);
    }

    const files: Record<string, Buffer> = {};
    if (upload.image) {
      files.captchafile = upload.image;
    }
    if (upload.banner) {
      files.banner = upload.banner;
    }

    const response = await this.call({
      method: 'POST',
      path: 'captcha',
      fields,
      files,
    });
    const record = parseCaptchaRecord(response);
    if (!record) {
      throw new ProviderException('CAPTCHA upload returned no id', response);
    }
    return record;
  }

  protected async submitReport(captchaId: number): Promise<boolean> {
    const response = await this.call({
      method: 'POST',
      path: `captcha/${captchaId}/report`,
      fields: this.getAuth(),
    });
    return !response.is_correct;
  }

  protected async closeTransport(): Promise<void> {
    await this.transport.close();
  }

  private async call(
    request: HttpApiRequest,
    captchaId?: number,
  ): Promise<Record<string, unknown>> {
    this.logWire('SEND', {
      method: request.method,
      path: request.path,
      ...request.fields,
      files: Object.keys(request.files ?? {}),
    });

    const response = await this.transport.send(request);
    this.logWire('RECV', { status: response.status, body: response.body });

    const error = toHttpError(response, captchaId);
    if (error) {
      throw error;
    }
    return parseJsonObject(response.body);
  }
}
