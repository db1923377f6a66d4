import {
  CaptchaClientException,
  ErrorCategory,
} from './captcha-client.exception';
import { NetworkException } from './network.exception';

describe('NetworkException', () => {
  it('should create an exception without original error', () => {
    const exception = new NetworkException('Connection refused');

    expect(exception.message).toBe('Connection refused');
    expect(exception.originalError).toBeUndefined();
    expect(exception.code).toBe('NETWORK_ERROR');
    expect(exception.category).toBe(ErrorCategory.NETWORK);
    expect(exception.isRecoverable).toBe(true);
    expect(exception.context?.originalError).toBeUndefined();
  });

  it('should include original error details in context', () => {
    const originalError = new Error('ECONNRESET');
    originalError.name = 'SocketError';
    const exception = new NetworkException('Connection lost', originalError, {
      host: 'localhost',
      port: 8123,
    });

    expect(exception.originalError).toBe(originalError);
    expect(exception.context).toMatchObject({
      originalError: { name: 'SocketError', message: 'ECONNRESET' },
      host: 'localhost',
      port: 8123,
    });
  });

  it('should keep the prototype chain', () => {
    const exception = new NetworkException('Timed out');

    expect(exception).toBeInstanceOf(NetworkException);
    expect(exception).toBeInstanceOf(CaptchaClientException);
    expect(exception.name).toBe('NetworkException');
  });
});
