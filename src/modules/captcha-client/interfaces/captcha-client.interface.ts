import { Readable } from 'stream';
import { CaptchaType } from './captcha-type.interface';

export interface UsernamePasswordCredentials {
  username: string;
  password: string;
}

export interface AuthTokenCredentials {
  authtoken: string;
}

/**
 * Exactly one credential form per client.
 */
export type CaptchaCredentials =
  | UsernamePasswordCredentials
  | AuthTokenCredentials;

/**
 * Raw bytes, a readable stream, a file path, or a `base64:`-prefixed string.
 */
export type ImageSource = Buffer | Uint8Array | Readable | string;

export type CaptchaCorrectness = 'unknown' | 'correct' | 'incorrect';

export interface CaptchaRecord {
  /** Provider-assigned numeric id */
  id: number;
  /** Solution, or null while unsolved */
  text: string | null;
  correctness: CaptchaCorrectness;
  uploadedAt?: Date;
  solvedAt?: Date;
}

export interface AccountSnapshot {
  userId: number;
  /** Balance in US cents, as reported by the service */
  balance: number;
  /** Price per CAPTCHA in US cents */
  rate: number;
  isBanned: boolean;
}

export interface UploadOptions {
  type?: CaptchaType;
  /** Sent as JSON in the type's parameter field */
  params?: Record<string, unknown>;
  /** Image-group types */
  banner?: ImageSource;
  bannerText?: string;
  grid?: string;
  /** Audio type: base64 audio or raw bytes */
  audio?: string | Buffer;
  language?: string;
  /** Text type: the question */
  textcaptcha?: string;
}

export interface DecodeOptions extends UploadOptions {
  /**
   * Seconds to wait for a solution. Non-positive or missing means the
   * default for the CAPTCHA type.
   */
  timeoutSeconds?: number;
}

/**
 * Operations every transport client offers.
 */
export interface ICaptchaClient {
  readonly isClosed: boolean;

  /**
   * Upload a CAPTCHA and poll until it is solved or the timeout elapses.
   * @returns the solved record, or null on timeout or an incorrect solution
   */
  decode(
    captcha?: ImageSource,
    options?: DecodeOptions,
  ): Promise<CaptchaRecord | null>;

  upload(captcha?: ImageSource, options?: UploadOptions): Promise<CaptchaRecord>;

  getCaptcha(captchaId: number): Promise<CaptchaRecord>;

  getText(captchaId: number): Promise<string | null>;

  /**
   * Flag a solution as incorrect. Repeated reports of one id send a single
   * request.
   */
  report(captchaId: number): Promise<boolean>;

  getBalance(): Promise<number>;

  getUser(): Promise<AccountSnapshot>;

  close(): Promise<void>;
}
