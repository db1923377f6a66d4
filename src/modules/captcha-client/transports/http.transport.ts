import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { AxiosError, AxiosRequestConfig } from 'axios';
import FormData from 'form-data';
import { firstValueFrom } from 'rxjs';
import {
  API_VERSION,
  HttpConfig,
  HTTP_RESPONSE_TYPE,
} from '../config/constants';
import {
  CaptchaTransport,
  HttpApiRequest,
  HttpApiResponse,
} from '../interfaces/transport.interface';
import { NetworkException } from '../exceptions';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

interface EncodedBody {
  data: string | FormData;
  headers: Record<string, string>;
}

/**
 * Stateless transport for the HTTP API. Every status code is handed back to
 * the client for mapping; only failures to get a response at all become
 * NetworkExceptions here.
 */
export class HttpTransport
  implements CaptchaTransport<HttpApiRequest, HttpApiResponse>
{
  private readonly logger = new Logger(HttpTransport.name);

  constructor(
    private readonly config: HttpConfig,
    private readonly httpService: HttpService,
  ) {}

  async send(request: HttpApiRequest): Promise<HttpApiResponse> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/${request.path.replace(/^\/+/, '')}`;
    const body = request.method === 'POST' ? this.encodeBody(request) : null;
    const requestConfig: AxiosRequestConfig<string | FormData> = {
      method: request.method,
      url,
      data: body?.data,
      headers: {
        Accept: HTTP_RESPONSE_TYPE,
        'User-Agent': API_VERSION,
        ...body?.headers,
      },
      timeout: this.config.requestTimeoutMs,
      responseType: 'text',
      validateStatus: () => true,
      maxBodyLength: Infinity,
    };

    try {
      const response = await firstValueFrom(
        this.httpService.request<unknown>(requestConfig),
      );
      return {
        status: response.status,
        body:
          typeof response.data === 'string'
            ? response.data
            : JSON.stringify(response.data ?? ''),
      };
    } catch (error: unknown) {
      throw this.toNetworkException(error, request, url);
    }
  }

  async close(): Promise<void> {
    this.logger.debug('HTTP transport holds no connection to close');
  }

  /**
   * Multipart when files are attached, urlencoded otherwise.
   */
  private encodeBody(request: HttpApiRequest): EncodedBody {
    const fields = request.fields ?? {};
    const files = request.files ?? {};

    if (Object.keys(files).length > 0) {
      const form = new FormData();
      for (const [name, value] of Object.entries(fields)) {
        form.append(name, value);
      }
      for (const [name, data] of Object.entries(files)) {
        form.append(name, data, { filename: name });
      }
      return { data: form, headers: form.getHeaders() };
    }

    return {
      data: new URLSearchParams(fields).toString(),
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    };
  }

  private toNetworkException(
    error: unknown,
    request: HttpApiRequest,
    url: string,
  ): NetworkException {
    const cause = error instanceof Error ? error : new Error(String(error));
    const code = error instanceof AxiosError ? error.code : undefined;
    const context = { url, method: request.method, code };

    if (code !== undefined && TIMEOUT_CODES.has(code)) {
      return new NetworkException(
        `Request timeout after ${this.config.requestTimeoutMs}ms`,
        cause,
        context,
      );
    }

    return new NetworkException(
      `Network error during request: ${cause.message}`,
      cause,
      context,
    );
  }
}
