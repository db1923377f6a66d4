import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { CAPTCHA_CLIENT, CAPTCHA_CLOCK } from '../config/constants';
import {
  AccountSnapshot,
  CaptchaRecord,
  DecodeOptions,
  ICaptchaClient,
  ImageSource,
} from '../interfaces/captcha-client.interface';
import {
  CaptchaClientException,
  ErrorCategory,
  ProviderException,
} from '../exceptions';
import { Clock, systemClock } from '../utils/clock.util';
import {
  extractErrorMessage,
  formatErrorForLogging,
} from '../utils/error-formatter.util';
import { retryWithBackoff } from '../utils/retry.util';
import { CaptchaResult } from './captcha-result';

export interface SolveOptions extends DecodeOptions {
  /**
   * Decode attempts, including the first
   * @default 1
   */
  maxRetries?: number;
}

export interface BatchSolveOptions extends SolveOptions {
  /** Stop after this many CAPTCHAs */
  maxPerBatch?: number;
  /**
   * Stop before a CAPTCHA when the balance is below this
   * @default 100
   */
  minBalanceCents?: number;
  /** Stop once this many cents have been spent since the batch started */
  budgetCents?: number;
}

export const SOLVER_DEFAULTS = {
  maxRetries: 1,
  backoffMs: 1000,
  maxBackoffMs: 10000,
  minBalanceCents: 100,
} as const;

/**
 * Categories a retry cannot fix
 */
const NON_RETRYABLE_CATEGORIES: ReadonlySet<ErrorCategory> = new Set([
  ErrorCategory.ACCESS_DENIED,
  ErrorCategory.VALIDATION,
  ErrorCategory.AVAILABILITY,
]);

function isRetryable(error: unknown): boolean {
  return !(
    error instanceof CaptchaClientException &&
    NON_RETRYABLE_CATEGORIES.has(error.category)
  );
}

const formatCents = (cents: number): string => `$${(cents / 100).toFixed(2)}`;

/**
 * Agent-facing wrapper around the configured client: standardized results
 * instead of exceptions, retries around whole decodes, balance tracking and
 * budgeted batches.
 */
@Injectable()
export class CaptchaSolverService {
  private readonly logger = new Logger(CaptchaSolverService.name);
  private readonly clock: Clock;

  constructor(
    @Inject(CAPTCHA_CLIENT) private readonly client: ICaptchaClient,
    @Optional() @Inject(CAPTCHA_CLOCK) clock?: Clock,
  ) {
    this.clock = clock ?? systemClock;
  }

  async solve(
    source: ImageSource | undefined,
    options: SolveOptions = {},
  ): Promise<CaptchaResult> {
    const { maxRetries = SOLVER_DEFAULTS.maxRetries, ...decodeOptions } =
      options;
    const startedAt = this.clock.now();
    const balanceBefore = await this.sampleBalance();

    try {
      const record = await retryWithBackoff(
        () => this.decodeOnce(source, decodeOptions),
        {
          maxAttempts: maxRetries,
          backoffMs: SOLVER_DEFAULTS.backoffMs,
          maxBackoffMs: SOLVER_DEFAULTS.maxBackoffMs,
          shouldRetry: isRetryable,
          sleep: (ms) => this.clock.sleep(ms),
          onRetry: (attempt, error, delay) =>
            this.logger.warn(
              `Solve attempt ${attempt}/${maxRetries} failed, retrying in ${delay}ms: ${extractErrorMessage(error)}`,
            ),
        },
      );

      const balanceAfter = await this.sampleBalance();
      const costCents =
        balanceBefore !== null && balanceAfter !== null
          ? balanceBefore - balanceAfter
          : null;
      const timeSeconds = this.elapsedSeconds(startedAt);

      this.logger.log(
        `CAPTCHA ${record.id} solved in ${timeSeconds.toFixed(1)}s` +
          (costCents !== null ? ` for ${formatCents(costCents)}` : ''),
      );

      return new CaptchaResult({
        success: true,
        text: record.text,
        captchaId: record.id,
        correctness: record.correctness,
        costCents,
        timeSeconds,
      });
    } catch (error: unknown) {
      this.logger.error(
        'Failed to solve CAPTCHA',
        JSON.stringify(formatErrorForLogging(error, { maxRetries })),
      );

      const message = extractErrorMessage(error);
      return new CaptchaResult({
        success: false,
        error: isRetryable(error)
          ? `Failed to solve CAPTCHA after ${Math.max(1, maxRetries)} attempt(s): ${message}`
          : message,
        errorCategory:
          error instanceof CaptchaClientException ? error.category : null,
        timeSeconds: this.elapsedSeconds(startedAt),
      });
    }
  }

  /**
   * Solve CAPTCHAs one after another until the list, the batch limit, the
   * balance floor or the budget runs out.
   */
  async solveBatch(
    sources: ImageSource[],
    options: BatchSolveOptions = {},
  ): Promise<CaptchaResult[]> {
    const {
      maxPerBatch,
      minBalanceCents = SOLVER_DEFAULTS.minBalanceCents,
      budgetCents,
      ...solveOptions
    } = options;
    const results: CaptchaResult[] = [];
    const initialBalance = await this.sampleBalance();

    this.logger.log(`Starting batch solve of ${sources.length} CAPTCHAs`);

    for (let index = 0; index < sources.length; index++) {
      if (maxPerBatch !== undefined && index >= maxPerBatch) {
        this.logger.log(`Reached batch limit (${maxPerBatch})`);
        break;
      }

      const balance = await this.sampleBalance();
      if (balance !== null && balance < minBalanceCents) {
        this.logger.warn(`Balance too low (${formatCents(balance)}), stopping`);
        break;
      }

      const spent =
        initialBalance !== null && balance !== null
          ? initialBalance - balance
          : null;
      if (budgetCents !== undefined && spent !== null && spent >= budgetCents) {
        this.logger.warn(
          `Budget of ${formatCents(budgetCents)} spent, stopping`,
        );
        break;
      }

      const result = await this.solve(sources[index], solveOptions);
      results.push(result);

      const solved = results.filter((entry) => entry.success).length;
      this.logger.log(
        `Progress: ${index + 1}/${sources.length} (${solved} solved)`,
      );
    }

    return results;
  }

  getBalance(): Promise<number> {
    return this.client.getBalance();
  }

  getUserInfo(): Promise<AccountSnapshot> {
    return this.client.getUser();
  }

  /**
   * Flag a solved CAPTCHA as incorrect so the provider refunds it
   */
  async report(captchaId: number): Promise<boolean> {
    const reported = await this.client.report(captchaId);
    if (reported) {
      this.logger.log(`Reported CAPTCHA ${captchaId} as incorrect`);
    } else {
      this.logger.warn(`Provider did not accept the report for CAPTCHA ${captchaId}`);
    }
    return reported;
  }

  private async decodeOnce(
    source: ImageSource | undefined,
    options: DecodeOptions,
  ): Promise<CaptchaRecord> {
    const record = await this.client.decode(source, options);
    if (!record || record.text === null) {
      throw new ProviderException(
        'CAPTCHA was not solved',
        undefined,
        { timeoutSeconds: options.timeoutSeconds },
      );
    }
    return record;
  }

  private async sampleBalance(): Promise<number | null> {
    try {
      return await this.client.getBalance();
    } catch (error: unknown) {
      this.logger.warn(`Could not read balance: ${extractErrorMessage(error)}`);
      return null;
    }
  }

  private elapsedSeconds(startedAt: number): number {
    return (this.clock.now() - startedAt) / 1000;
  }
}
