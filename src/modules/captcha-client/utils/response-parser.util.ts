import {
  AccountSnapshot,
  CaptchaCorrectness,
  CaptchaRecord,
} from '../interfaces/captcha-client.interface';
import { ProviderException } from '../exceptions';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a JSON response body. An empty body reads as `{}`.
 */
export function parseJsonObject(body: string): Record<string, unknown> {
  if (body.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error: unknown) {
    throw new ProviderException('Invalid API response', body, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  if (!isPlainObject(parsed)) {
    throw new ProviderException('Invalid API response', body);
  }
  return parsed;
}

function readNumber(raw: Record<string, unknown>, key: string): number {
  const value = raw[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function readBoolean(raw: Record<string, unknown>, key: string): boolean {
  const value = raw[key];
  if (typeof value === 'string') {
    return value === 'true' || value === '1';
  }
  return Boolean(value);
}

/**
 * Token solutions for some types arrive as JSON objects; they are handed out
 * as their JSON text.
 */
function readText(raw: Record<string, unknown>): string | null {
  const value = raw.text;
  if (value === undefined || value === null || value === '') {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Maps a wire CAPTCHA (`{ captcha, text, is_correct }`) to a record.
 * Returns null when the service reports no such CAPTCHA (id 0 or missing).
 */
export function parseCaptchaRecord(
  raw: Record<string, unknown>,
): CaptchaRecord | null {
  const id = readNumber(raw, 'captcha');
  if (!id) {
    return null;
  }

  const text = readText(raw);
  let correctness: CaptchaCorrectness = 'unknown';
  if (text !== null) {
    correctness =
      raw.is_correct === undefined || readBoolean(raw, 'is_correct')
        ? 'correct'
        : 'incorrect';
  }

  return { id, text, correctness };
}

export function parseAccountSnapshot(
  raw: Record<string, unknown>,
): AccountSnapshot {
  return {
    userId: readNumber(raw, 'user'),
    balance: readNumber(raw, 'balance'),
    rate: readNumber(raw, 'rate'),
    isBanned: readBoolean(raw, 'is_banned'),
  };
}
