import { ErrorCategory } from '../exceptions';
import { CaptchaCorrectness } from '../interfaces/captcha-client.interface';

export interface CaptchaResultInit {
  success: boolean;
  text?: string | null;
  captchaId?: number | null;
  correctness?: CaptchaCorrectness | null;
  error?: string | null;
  errorCategory?: ErrorCategory | null;
  costCents?: number | null;
  timeSeconds?: number | null;
}

/**
 * Plain JSON shape handed to agents and tool-calling runtimes.
 */
export interface CaptchaResultJson {
  success: boolean;
  text: string | null;
  captchaId: number | null;
  isCorrect: boolean | null;
  correctness: CaptchaCorrectness | null;
  error: string | null;
  errorCategory: ErrorCategory | null;
  costCents: number | null;
  timeSeconds: number | null;
}

/**
 * Outcome of a single solve attempt. Failures never throw; they carry the
 * message and category instead.
 */
export class CaptchaResult {
  readonly success: boolean;
  readonly text: string | null;
  readonly captchaId: number | null;
  readonly correctness: CaptchaCorrectness | null;
  readonly error: string | null;
  readonly errorCategory: ErrorCategory | null;
  readonly costCents: number | null;
  readonly timeSeconds: number | null;

  constructor(init: CaptchaResultInit) {
    this.success = init.success;
    this.text = init.text ?? null;
    this.captchaId = init.captchaId ?? null;
    this.correctness = init.correctness ?? null;
    this.error = init.error ?? null;
    this.errorCategory = init.errorCategory ?? null;
    this.costCents = init.costCents ?? null;
    this.timeSeconds = init.timeSeconds ?? null;
  }

  /**
   * null while the provider has not judged the solution
   */
  get isCorrect(): boolean | null {
    if (this.correctness === 'correct') {
      return true;
    }
    if (this.correctness === 'incorrect') {
      return false;
    }
    return null;
  }

  toJSON(): CaptchaResultJson {
    return {
      success: this.success,
      text: this.text,
      captchaId: this.captchaId,
      isCorrect: this.isCorrect,
      correctness: this.correctness,
      error: this.error,
      errorCategory: this.errorCategory,
      costCents: this.costCents,
      timeSeconds: this.timeSeconds,
    };
  }
}
