import {
  parseAccountSnapshot,
  parseCaptchaRecord,
  parseJsonObject,
} from './response-parser.util';
import { ProviderException } from '../exceptions';

describe('parseJsonObject', () => {
  it('should parse JSON objects', () => {
    expect(parseJsonObject('{"captcha":1,"text":null}')).toEqual({
      captcha: 1,
      text: null,
    });
  });

  it('should read an empty body as an empty object', () => {
    expect(parseJsonObject('  ')).toEqual({});
  });

  it('should reject malformed JSON', () => {
    expect(() => parseJsonObject('<html>')).toThrow(ProviderException);
    expect(() => parseJsonObject('<html>')).toThrow('Invalid API response');
  });

  it('should reject non-object JSON', () => {
    expect(() => parseJsonObject('[1,2]')).toThrow('Invalid API response');
    expect(() => parseJsonObject('"text"')).toThrow('Invalid API response');
  });
});

describe('parseCaptchaRecord', () => {
  it('should map an unsolved CAPTCHA', () => {
    expect(
      parseCaptchaRecord({ captcha: 42, text: '', is_correct: true }),
    ).toEqual({ id: 42, text: null, correctness: 'unknown' });
  });

  it('should map a solved CAPTCHA', () => {
    expect(
      parseCaptchaRecord({ captcha: 42, text: 'ab3x9', is_correct: true }),
    ).toEqual({ id: 42, text: 'ab3x9', correctness: 'correct' });
  });

  it('should map a solution flagged incorrect', () => {
    expect(
      parseCaptchaRecord({ captcha: '42', text: 'ab3x9', is_correct: false }),
    ).toEqual({ id: 42, text: 'ab3x9', correctness: 'incorrect' });
  });

  it('should serialize object solutions', () => {
    const record = parseCaptchaRecord({
      captcha: 7,
      text: { challenge: 'c', validate: 'v' },
      is_correct: true,
    });

    expect(record?.text).toBe('{"challenge":"c","validate":"v"}');
  });

  it('should return null when the CAPTCHA does not exist', () => {
    expect(parseCaptchaRecord({ captcha: 0 })).toBeNull();
    expect(parseCaptchaRecord({})).toBeNull();
  });
});

describe('parseAccountSnapshot', () => {
  it('should keep the balance as delivered', () => {
    expect(
      parseAccountSnapshot({
        user: 1001,
        balance: 1234.567,
        rate: 0.139,
        is_banned: false,
      }),
    ).toEqual({ userId: 1001, balance: 1234.567, rate: 0.139, isBanned: false });
  });

  it('should default missing fields', () => {
    expect(parseAccountSnapshot({ is_banned: 1 })).toEqual({
      userId: 0,
      balance: 0,
      rate: 0,
      isBanned: true,
    });
  });
});
