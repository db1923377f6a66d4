import { Logger } from '@nestjs/common';
import {
  AccountSnapshot,
  CaptchaCredentials,
  CaptchaRecord,
  DecodeOptions,
  ICaptchaClient,
  ImageSource,
  UploadOptions,
} from '../interfaces/captcha-client.interface';
import { CaptchaClientOptions } from '../interfaces/captcha-config.interface';
import {
  CAPTCHA_PARAMS_FIELDS,
  CaptchaType,
  IMAGE_CAPTCHA_TYPES,
} from '../interfaces/captcha-type.interface';
import {
  CaptchaTransportType,
  DEFAULT_CONFIG,
  PollingConfig,
  RetryConfig,
  TimeoutConfig,
} from '../config/constants';
import {
  assertValid,
  clientOptionsSchema,
  credentialsSchema,
} from '../config/config-validation.schema';
import { ClientClosedException, ValidationException } from '../exceptions';
import { Clock, systemClock } from '../utils/clock.util';
import { loadImage } from '../utils/image-loader.util';
import { retryWithBackoff } from '../utils/retry.util';
import { formatError, isRecoverableError } from '../utils/error-formatter.util';

/**
 * Validated upload, ready to be put on the wire by a concrete client.
 */
export interface PreparedUpload {
  image?: Buffer;
  banner?: Buffer;
  fields: Record<string, string | number>;
}

const REDACTED_FIELDS = new Set(['password', 'authtoken']);
const MAX_LOGGED_VALUE_LENGTH = 128;

function redactForLog(payload: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (REDACTED_FIELDS.has(key)) {
      redacted[key] = '***';
    } else if (
      typeof value === 'string' &&
      value.length > MAX_LOGGED_VALUE_LENGTH
    ) {
      redacted[key] = `<${value.length} chars>`;
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

/**
 * Base class for the socket and HTTP clients.
 *
 * Owns everything that does not depend on the wire: credential handling,
 * upload validation, the decode polling loop, idempotent reports and the
 * closed state. Subclasses only translate operations into requests.
 */
export abstract class BaseCaptchaClient implements ICaptchaClient {
  protected readonly logger: Logger;
  protected readonly credentials: Readonly<CaptchaCredentials>;
  protected readonly timeouts: TimeoutConfig;
  protected readonly polling: PollingConfig;
  protected readonly retry: RetryConfig;
  protected readonly verbose: boolean;
  protected readonly clock: Clock;

  abstract readonly clientType: CaptchaTransportType;

  private closed = false;
  private readonly reportedIds = new Set<number>();
  private readonly pendingReports = new Map<number, Promise<boolean>>();

  constructor(
    credentials: CaptchaCredentials,
    options: CaptchaClientOptions = {},
  ) {
    this.logger = new Logger(this.constructor.name);

    assertValid(credentialsSchema, credentials, 'Invalid credentials');
    assertValid(clientOptionsSchema, options, 'Invalid client options');

    this.credentials = Object.freeze(
      'authtoken' in credentials
        ? { authtoken: credentials.authtoken }
        : { username: credentials.username, password: credentials.password },
    );
    this.timeouts = { ...DEFAULT_CONFIG.timeouts, ...options.timeouts };
    this.polling = { ...DEFAULT_CONFIG.polling, ...options.polling };
    this.retry = { ...DEFAULT_CONFIG.retry, ...options.retry };
    this.verbose = options.verbose ?? DEFAULT_CONFIG.verbose;
    this.clock = options.clock ?? systemClock;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async decode(
    captcha?: ImageSource,
    options: DecodeOptions = {},
  ): Promise<CaptchaRecord | null> {
    this.assertOpen('decode');

    const timeoutSeconds = this.resolveTimeoutSeconds(options);
    const deadline = this.clock.now() + timeoutSeconds * 1000;

    let record = await this.upload(captcha, options);
    let pollIndex = 0;

    while (record.text === null) {
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        break;
      }

      await this.clock.sleep(
        Math.min(this.getPollInterval(pollIndex++), remaining),
      );
      if (this.clock.now() >= deadline) {
        break;
      }

      const next = await this.poll(record.id, deadline);
      if (next === null) {
        break;
      }
      record = this.mergeRecord(record, next);
    }

    if (record.text === null) {
      this.logger.warn(
        `CAPTCHA ${record.id} was not solved within ${timeoutSeconds}s`,
      );
      return null;
    }

    if (record.correctness === 'incorrect') {
      this.logger.warn(`CAPTCHA ${record.id} was solved incorrectly`);
      return null;
    }

    return record;
  }

  async upload(
    captcha?: ImageSource,
    options: UploadOptions = {},
  ): Promise<CaptchaRecord> {
    this.assertOpen('upload');

    const prepared = await this.prepareUpload(captcha, options);
    const record = await this.submitUpload(prepared);
    const uploadedAt = new Date(this.clock.now());

    this.logger.debug(`Uploaded CAPTCHA ${record.id}`);

    return record.text === null
      ? { ...record, uploadedAt }
      : { ...record, uploadedAt, solvedAt: uploadedAt };
  }

  async getCaptcha(captchaId: number): Promise<CaptchaRecord> {
    this.assertOpen('getCaptcha');

    const record = await this.fetchCaptcha(captchaId);
    if (this.reportedIds.has(captchaId)) {
      return { ...record, correctness: 'incorrect' };
    }
    return record;
  }

  async getText(captchaId: number): Promise<string | null> {
    const record = await this.getCaptcha(captchaId);
    return record.text;
  }

  async report(captchaId: number): Promise<boolean> {
    this.assertOpen('report');

    if (this.reportedIds.has(captchaId)) {
      this.logger.debug(`CAPTCHA ${captchaId} was already reported`);
      return true;
    }

    const pending = this.pendingReports.get(captchaId);
    if (pending) {
      return pending;
    }

    const request = this.submitReport(captchaId)
      .then((accepted) => {
        if (accepted) {
          this.reportedIds.add(captchaId);
        }
        return accepted;
      })
      .finally(() => {
        this.pendingReports.delete(captchaId);
      });
    this.pendingReports.set(captchaId, request);

    return request;
  }

  async getBalance(): Promise<number> {
    const user = await this.getUser();
    return user.balance;
  }

  async getUser(): Promise<AccountSnapshot> {
    this.assertOpen('getUser');
    return this.fetchUser();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.pendingReports.clear();

    await this.closeTransport();
    this.logger.debug(`${this.clientType} client closed`);
  }

  protected abstract fetchUser(): Promise<AccountSnapshot>;

  /**
   * @throws CaptchaNotFoundException when the service has no such CAPTCHA
   */
  protected abstract fetchCaptcha(captchaId: number): Promise<CaptchaRecord>;

  protected abstract submitUpload(upload: PreparedUpload): Promise<CaptchaRecord>;

  /**
   * @returns whether the service accepted the report
   */
  protected abstract submitReport(captchaId: number): Promise<boolean>;

  protected abstract closeTransport(): Promise<void>;

  /**
   * Credential fields attached to authenticated requests. An auth token
   * takes precedence over username and password.
   */
  protected getAuth(): Record<string, string> {
    const credentials = this.credentials;
    if ('authtoken' in credentials) {
      return { authtoken: credentials.authtoken };
    }
    return { username: credentials.username, password: credentials.password };
  }

  protected logWire(
    direction: 'SEND' | 'RECV',
    payload: Record<string, unknown>,
  ): void {
    if (this.verbose) {
      this.logger.debug(`${direction} ${JSON.stringify(redactForLog(payload))}`);
    }
  }

  protected assertOpen(operation: string): void {
    if (this.closed) {
      throw new ClientClosedException(this.clientType, operation);
    }
  }

  private async prepareUpload(
    captcha: ImageSource | undefined,
    options: UploadOptions,
  ): Promise<PreparedUpload> {
    const type = options.type ?? CaptchaType.IMAGE;
    if (CaptchaType[type] === undefined) {
      throw ValidationException.fromSingleError(
        `Unsupported CAPTCHA type ${type}`,
        'type',
        'UNSUPPORTED_TYPE',
      );
    }

    const upload: PreparedUpload = { fields: {} };
    if (type !== CaptchaType.IMAGE) {
      upload.fields.type = type;
    }

    if (captcha !== undefined) {
      upload.image = (await loadImage(captcha)).data;
    } else if (IMAGE_CAPTCHA_TYPES.has(type)) {
      throw ValidationException.fromSingleError(
        `A CAPTCHA image is required for ${CaptchaType[type]} CAPTCHAs`,
        'captcha',
        'IMAGE_REQUIRED',
      );
    }

    if (type === CaptchaType.IMAGE_GROUP) {
      if (options.banner !== undefined) {
        upload.banner = (await loadImage(options.banner, 'banner')).data;
      }
      if (options.bannerText !== undefined) {
        upload.fields.banner_text = options.bannerText;
      }
      if (options.grid !== undefined) {
        upload.fields.grid = options.grid;
      }
    }

    const paramsField = CAPTCHA_PARAMS_FIELDS[type];
    if (paramsField !== undefined) {
      if (!options.params) {
        throw ValidationException.fromSingleError(
          `params are required for ${CaptchaType[type]} CAPTCHAs`,
          'params',
          'PARAMS_REQUIRED',
        );
      }
      upload.fields[paramsField] = JSON.stringify(options.params);
    }

    if (type === CaptchaType.AUDIO) {
      if (!options.audio || options.audio.length === 0) {
        throw ValidationException.fromSingleError(
          'audio is required for AUDIO CAPTCHAs',
          'audio',
          'AUDIO_REQUIRED',
        );
      }
      upload.fields.audio = Buffer.isBuffer(options.audio)
        ? options.audio.toString('base64')
        : options.audio;
      if (options.language !== undefined) {
        upload.fields.language = options.language;
      }
    }

    if (type === CaptchaType.TEXT) {
      if (!options.textcaptcha) {
        throw ValidationException.fromSingleError(
          'textcaptcha is required for TEXT CAPTCHAs',
          'textcaptcha',
          'TEXT_REQUIRED',
        );
      }
      upload.fields.textcaptcha = options.textcaptcha;
    }

    return upload;
  }

  private resolveTimeoutSeconds(options: DecodeOptions): number {
    if (options.timeoutSeconds !== undefined && options.timeoutSeconds > 0) {
      return options.timeoutSeconds;
    }
    return IMAGE_CAPTCHA_TYPES.has(options.type ?? CaptchaType.IMAGE)
      ? this.timeouts.defaultTimeoutSeconds
      : this.timeouts.defaultTokenTimeoutSeconds;
  }

  private getPollInterval(index: number): number {
    return this.polling.intervalsMs[index] ?? this.polling.defaultIntervalMs;
  }

  /**
   * Looks the CAPTCHA up, retrying transient failures until the decode
   * deadline. Resolves to null once the deadline has passed.
   */
  private poll(
    captchaId: number,
    deadline: number,
  ): Promise<CaptchaRecord | null> {
    const remaining = (): number => Math.max(0, deadline - this.clock.now());

    return retryWithBackoff(
      async () => (remaining() > 0 ? this.getCaptcha(captchaId) : null),
      {
        maxAttempts: this.retry.maxAttempts,
        backoffMs: this.retry.backoffMs,
        maxBackoffMs: this.retry.maxBackoffMs,
        shouldRetry: (error) => isRecoverableError(error) && remaining() > 0,
        sleep: (ms) => this.clock.sleep(Math.min(ms, remaining())),
        onRetry: (attempt, error, delay) => {
          this.logger.warn(
            `Polling CAPTCHA ${captchaId} failed (attempt ${attempt}/${this.retry.maxAttempts}), retrying in ${Math.min(delay, remaining())}ms: ${formatError(error)}`,
          );
        },
      },
    );
  }

  private mergeRecord(
    previous: CaptchaRecord,
    next: CaptchaRecord,
  ): CaptchaRecord {
    const merged: CaptchaRecord = { ...next };
    if (previous.uploadedAt) {
      merged.uploadedAt = previous.uploadedAt;
    }
    if (next.text !== null) {
      merged.solvedAt = previous.solvedAt ?? new Date(this.clock.now());
    }
    return merged;
  }
}
