/**
 * A request/response channel to the service.
 */
export interface CaptchaTransport<TRequest, TResponse> {
  send(request: TRequest): Promise<TResponse>;
  close(): Promise<void>;
}

/**
 * Transport holding a connection that can be dropped and re-established.
 */
export interface ConnectionTransport<TRequest, TResponse>
  extends CaptchaTransport<TRequest, TResponse> {
  /** Drop the current connection; the next send reconnects. */
  reset(): Promise<void>;
}

/**
 * A JSON object exchanged over the socket API.
 */
export type SocketMessage = Record<string, unknown>;

export interface HttpApiRequest {
  method: 'GET' | 'POST';
  /** Path relative to the API base URL, e.g. `captcha/123/report` */
  path: string;
  fields?: Record<string, string>;
  files?: Record<string, Buffer>;
}

export interface HttpApiResponse {
  status: number;
  body: string;
}
