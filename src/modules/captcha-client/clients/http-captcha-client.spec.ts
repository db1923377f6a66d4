import { Logger } from '@nestjs/common';
import { HttpCaptchaClient, toHttpError } from './http-captcha-client';
import {
  HttpApiRequest,
  HttpApiResponse,
} from '../interfaces/transport.interface';
import { CaptchaType } from '../interfaces/captcha-type.interface';
import {
  AccessDeniedException,
  CaptchaNotFoundException,
  ClientClosedException,
  ProviderException,
  ServiceOverloadException,
  ValidationException,
} from '../exceptions';
import { FakeClock } from '../__tests__/helpers/fake-clock';
import {
  JPEG_BYTES,
  PNG_BYTES,
  TEST_CREDENTIALS,
} from '../__tests__/helpers/fixtures';

type Responder = (request: HttpApiRequest) => HttpApiResponse;

const json = (body: Record<string, unknown>, status = 200): HttpApiResponse => ({
  status,
  body: JSON.stringify(body),
});

describe('HttpCaptchaClient', () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  function createClient(
    responder: Responder,
    credentials: ConstructorParameters<typeof HttpCaptchaClient>[0] = TEST_CREDENTIALS,
    verbose = false,
  ) {
    const transport = {
      send: jest.fn(async (request: HttpApiRequest) => responder(request)),
      close: jest.fn(async () => undefined),
    };
    const client = new HttpCaptchaClient(credentials, {
      transport,
      clock,
      verbose,
    });
    return { client, transport };
  }

  describe('getUser', () => {
    it('should post credentials and parse the account', async () => {
      const { client, transport } = createClient(() =>
        json({ user: 1001, balance: 250, rate: 0.139, is_banned: false }),
      );

      await expect(client.getUser()).resolves.toEqual({
        userId: 1001,
        balance: 250,
        rate: 0.139,
        isBanned: false,
      });
      expect(transport.send).toHaveBeenCalledWith({
        method: 'POST',
        path: 'user',
        fields: { username: 'test-user', password: 'test-pass' },
      });
    });

    it('should send only the auth token when one is configured', async () => {
      const { client, transport } = createClient(
        () => json({ user: 1001, balance: 250 }),
        { authtoken: 'test-token' },
      );

      await expect(client.getBalance()).resolves.toBe(250);
      expect(transport.send).toHaveBeenCalledWith({
        method: 'POST',
        path: 'user',
        fields: { authtoken: 'test-token' },
      });
    });
  });

  describe('upload', () => {
    it('should post the image as a file with credentials', async () => {
      const { client, transport } = createClient(() =>
        json({ captcha: 77, text: '', is_correct: true }),
      );

      const record = await client.upload(JPEG_BYTES);

      expect(record.id).toBe(77);
      expect(record.text).toBeNull();
      expect(transport.send).toHaveBeenCalledWith({
        method: 'POST',
        path: 'captcha',
        fields: { username: 'test-user', password: 'test-pass' },
        files: { captchafile: JPEG_BYTES },
      });
    });

    it('should read the new CAPTCHA from a 303 See Other reply', async () => {
      const { client } = createClient(() => ({
        status: 303,
        body: '{"captcha":42,"text":"","is_correct":true}',
      }));

      await expect(client.upload(PNG_BYTES)).resolves.toEqual({
        id: 42,
        text: null,
        correctness: 'unknown',
        uploadedAt: new Date(0),
      });
    });

    it('should send type fields as strings', async () => {
      const { client, transport } = createClient(() => json({ captcha: 78 }));

      await client.upload(PNG_BYTES, {
        type: CaptchaType.IMAGE_GROUP,
        banner: PNG_BYTES,
        bannerText: 'Select all buses',
      });

      expect(transport.send).toHaveBeenCalledWith({
        method: 'POST',
        path: 'captcha',
        fields: {
          username: 'test-user',
          password: 'test-pass',
          type: '3',
          banner_text: 'Select all buses',
        },
        files: { captchafile: PNG_BYTES, banner: PNG_BYTES },
      });
    });

    it('should send token uploads without files', async () => {
      const { client, transport } = createClient(() => json({ captcha: 79 }));

      await client.upload(undefined, {
        type: CaptchaType.TURNSTILE,
        params: { sitekey: 'site-key', pageurl: 'https://example.test' },
      });

      expect(transport.send).toHaveBeenCalledWith({
        method: 'POST',
        path: 'captcha',
        fields: {
          username: 'test-user',
          password: 'test-pass',
          type: '12',
          turnstile_params:
            '{"sitekey":"site-key","pageurl":"https://example.test"}',
        },
        files: {},
      });
    });
  });

  describe('getCaptcha', () => {
    it('should look the CAPTCHA up without credentials', async () => {
      const { client, transport } = createClient(() =>
        json({ captcha: 5, text: 'qwerty', is_correct: true }),
      );

      await expect(client.getCaptcha(5)).resolves.toEqual({
        id: 5,
        text: 'qwerty',
        correctness: 'correct',
      });
      expect(transport.send).toHaveBeenCalledWith({
        method: 'GET',
        path: 'captcha/5',
      });
    });

    it('should map 404 to not found', async () => {
      const { client } = createClient(() => ({ status: 404, body: '' }));

      await expect(client.getCaptcha(5)).rejects.toBeInstanceOf(
        CaptchaNotFoundException,
      );
    });

    it('should map an empty record to not found', async () => {
      const { client } = createClient(() => json({ captcha: 0 }));

      await expect(client.getCaptcha(5)).rejects.toThrow(
        'CAPTCHA 5 was not found',
      );
    });

    it('should reject bodies that are not JSON', async () => {
      const { client } = createClient(() => ({
        status: 200,
        body: '<html>maintenance</html>',
      }));

      await expect(client.getCaptcha(5)).rejects.toBeInstanceOf(
        ProviderException,
      );
    });
  });

  describe('decode', () => {
    it('should poll the HTTP API until solved', async () => {
      const { client, transport } = createClient((request) =>
        request.method === 'POST'
          ? json({ captcha: 11, text: '' })
          : json({ captcha: 11, text: 'solved', is_correct: true }),
      );

      const record = await client.decode(PNG_BYTES, { timeoutSeconds: 30 });

      expect(record?.text).toBe('solved');
      expect(record?.solvedAt).toEqual(new Date(1000));
      expect(transport.send).toHaveBeenCalledTimes(2);
    });

    it('should decode after a 303 upload reply', async () => {
      const { client } = createClient((request) =>
        request.method === 'POST'
          ? { status: 303, body: '{"captcha":42,"text":"","is_correct":true}' }
          : json({ captcha: 42, text: 'ab3x9', is_correct: true }),
      );

      const record = await client.decode(PNG_BYTES, { timeoutSeconds: 30 });

      expect(record?.id).toBe(42);
      expect(record?.text).toBe('ab3x9');
    });

    it('should return null when a 503 outlasts the deadline', async () => {
      const lookups: number[] = [];
      const { client } = createClient((request) => {
        if (request.method === 'POST') {
          return json({ captcha: 11, text: '' });
        }
        lookups.push(clock.now());
        return { status: 503, body: '' };
      });

      await expect(
        client.decode(PNG_BYTES, { timeoutSeconds: 2 }),
      ).resolves.toBeNull();
      expect(lookups).toEqual([1000]);
      expect(clock.sleeps).toEqual([1000, 1000]);
    });
  });

  describe('report', () => {
    it('should post credentials to the report endpoint', async () => {
      const { client, transport } = createClient(() =>
        json({ captcha: 42, is_correct: false }),
      );

      await expect(client.report(42)).resolves.toBe(true);
      expect(transport.send).toHaveBeenCalledWith({
        method: 'POST',
        path: 'captcha/42/report',
        fields: { username: 'test-user', password: 'test-pass' },
      });
    });
  });

  describe('status mapping', () => {
    it.each([
      [403, AccessDeniedException],
      [400, ValidationException],
      [413, ValidationException],
      [503, ServiceOverloadException],
      [500, ProviderException],
      [404, ProviderException],
    ])('should map HTTP %i', (status, expected) => {
      expect(toHttpError({ status, body: '' })).toBeInstanceOf(expected);
    });

    it('should accept 2xx responses and the upload redirect', () => {
      expect(toHttpError({ status: 200, body: '{}' })).toBeNull();
      expect(toHttpError({ status: 303, body: '{}' })).toBeNull();
      expect(toHttpError({ status: 302, body: '' })).toBeInstanceOf(
        ProviderException,
      );
    });

    it('should surface access denied from the service', async () => {
      const { client } = createClient(() => ({ status: 403, body: '' }));

      await expect(client.getBalance()).rejects.toThrow(
        'Access denied, please check your credentials and/or balance',
      );
    });
  });

  describe('verbose logging', () => {
    it('should log requests with credentials redacted', async () => {
      const debug = jest
        .spyOn(Logger.prototype, 'debug')
        .mockImplementation(() => undefined);
      const { client } = createClient(
        () => json({ user: 1, balance: 5 }),
        TEST_CREDENTIALS,
        true,
      );

      await client.getUser();

      expect(debug).toHaveBeenCalledWith(
        'SEND {"method":"POST","path":"user","username":"test-user","password":"***","files":[]}',
      );
      expect(debug).toHaveBeenCalledWith(
        'RECV {"status":200,"body":"{\\"user\\":1,\\"balance\\":5}"}',
      );
      debug.mockRestore();
    });
  });

  describe('close', () => {
    it('should reject operations after close', async () => {
      const { client, transport } = createClient(() => json({}));

      await client.close();

      expect(transport.close).toHaveBeenCalledTimes(1);
      await expect(client.getCaptcha(1)).rejects.toBeInstanceOf(
        ClientClosedException,
      );
    });
  });
});
