import { Logger } from '@nestjs/common';
import {
  reportBootstrapFailure,
  resolveCliTransport,
  runBalanceCommand,
} from './balance.command';
import { CaptchaTransportType } from '../modules/captcha-client/config/constants';
import { CaptchaSolverService } from '../modules/captcha-client/services/captcha-solver.service';
import { ICaptchaClient } from '../modules/captcha-client/interfaces/captcha-client.interface';
import {
  AccessDeniedException,
  ValidationException,
} from '../modules/captcha-client/exceptions';

describe('runBalanceCommand', () => {
  let client: jest.Mocked<ICaptchaClient>;
  let solver: CaptchaSolverService;
  let lines: string[];

  beforeEach(() => {
    client = {
      isClosed: false,
      decode: jest.fn(),
      upload: jest.fn(),
      getCaptcha: jest.fn(),
      getText: jest.fn(),
      report: jest.fn(),
      getBalance: jest.fn(),
      getUser: jest.fn(),
      close: jest.fn(),
    };
    solver = new CaptchaSolverService(client);
    lines = [];
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should print the balance and succeed', async () => {
    client.getBalance.mockResolvedValue(1234.5);

    const code = await runBalanceCommand(
      solver,
      CaptchaTransportType.SOCKET,
      (line) => lines.push(line),
    );

    expect(code).toBe(0);
    expect(lines).toEqual(['socket 1234.5']);
  });

  it('should report failures with exit code 1', async () => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    client.getBalance.mockRejectedValue(
      new AccessDeniedException('Access denied', 'invalid-credentials'),
    );

    const code = await runBalanceCommand(
      solver,
      CaptchaTransportType.HTTP,
      (line) => lines.push(line),
    );

    expect(code).toBe(1);
    expect(lines).toEqual(['HTTP FAILED']);
  });
});

describe('resolveCliTransport', () => {
  it('should default to the socket transport', () => {
    expect(resolveCliTransport({})).toBe(CaptchaTransportType.SOCKET);
    expect(resolveCliTransport({ DBC_TRANSPORT: 'smtp' })).toBe(
      CaptchaTransportType.SOCKET,
    );
  });

  it('should pick HTTP when configured', () => {
    expect(resolveCliTransport({ DBC_TRANSPORT: ' HTTP ' })).toBe(
      CaptchaTransportType.HTTP,
    );
  });
});

describe('reportBootstrapFailure', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should print the failure line instead of a stack trace', () => {
    const error = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    const lines: string[] = [];

    const code = reportBootstrapFailure(
      ValidationException.fromSingleError(
        'Set DBC_AUTHTOKEN, or DBC_USERNAME and DBC_PASSWORD',
        'credentials',
        'CREDENTIALS_MISSING',
      ),
      CaptchaTransportType.SOCKET,
      (line) => lines.push(line),
    );

    expect(code).toBe(1);
    expect(lines).toEqual(['SOCKET FAILED']);
    expect(error).toHaveBeenCalledWith(
      'Failed to start the CAPTCHA client',
      expect.stringContaining('Set DBC_AUTHTOKEN, or DBC_USERNAME and DBC_PASSWORD'),
    );
  });
});
