import {
  CaptchaClientException,
  ErrorCategory,
} from './captcha-client.exception';

describe('CaptchaClientException', () => {
  describe('Constructor', () => {
    it('should create an exception with all required properties', () => {
      const exception = new CaptchaClientException(
        'Test error message',
        'TEST_ERROR',
        ErrorCategory.PROVIDER,
        false,
      );

      expect(exception.message).toBe('Test error message');
      expect(exception.code).toBe('TEST_ERROR');
      expect(exception.category).toBe(ErrorCategory.PROVIDER);
      expect(exception.isRecoverable).toBe(false);
      expect(exception.context).toBeUndefined();
    });

    it('should default isRecoverable to false', () => {
      const exception = new CaptchaClientException(
        'Test error',
        'TEST_ERROR',
        ErrorCategory.VALIDATION,
      );

      expect(exception.isRecoverable).toBe(false);
    });

    it('should set the name from the constructor', () => {
      const exception = new CaptchaClientException(
        'Test error',
        'TEST_ERROR',
        ErrorCategory.NETWORK,
      );

      expect(exception.name).toBe('CaptchaClientException');
      expect(exception).toBeInstanceOf(Error);
      expect(exception).toBeInstanceOf(CaptchaClientException);
    });
  });

  describe('toJSON', () => {
    it('should serialize all structured fields', () => {
      const exception = new CaptchaClientException(
        'Overloaded',
        'SERVICE_OVERLOAD',
        ErrorCategory.OVERLOAD,
        true,
        { captchaId: 42 },
      );

      const json = exception.toJSON();

      expect(json).toMatchObject({
        name: 'CaptchaClientException',
        message: 'Overloaded',
        code: 'SERVICE_OVERLOAD',
        category: 'OVERLOAD',
        isRecoverable: true,
        context: { captchaId: 42 },
      });
      expect(json.stack).toBeDefined();
    });
  });

  describe('toString', () => {
    it('should include code, category and context', () => {
      const exception = new CaptchaClientException(
        'Lookup failed',
        'CAPTCHA_NOT_FOUND',
        ErrorCategory.NOT_FOUND,
        false,
        { captchaId: 7 },
      );

      expect(exception.toString()).toBe(
        [
          'CaptchaClientException [CAPTCHA_NOT_FOUND]',
          'Category: NOT_FOUND',
          'Recoverable: false',
          'Message: Lookup failed',
          'Context: {"captchaId":7}',
        ].join('\n'),
      );
    });

    it('should omit an empty context', () => {
      const exception = new CaptchaClientException(
        'Closed',
        'CLIENT_CLOSED',
        ErrorCategory.AVAILABILITY,
        false,
        {},
      );

      expect(exception.toString()).not.toContain('Context:');
    });
  });
});
