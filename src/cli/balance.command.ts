import { Logger } from '@nestjs/common';
import { CaptchaTransportType } from '../modules/captcha-client/config/constants';
import { CaptchaSolverService } from '../modules/captcha-client/services/captcha-solver.service';
import { formatError } from '../modules/captcha-client/utils/error-formatter.util';

export type OutputWriter = (line: string) => void;

const logger = new Logger('BalanceCommand');

/**
 * Prints the account balance in US cents.
 *
 * @returns the process exit code
 */
export async function runBalanceCommand(
  solver: CaptchaSolverService,
  transport: CaptchaTransportType,
  write: OutputWriter,
): Promise<number> {
  try {
    const balance = await solver.getBalance();
    write(`${transport} ${balance}`);
    return 0;
  } catch (error: unknown) {
    logger.error(`Failed to fetch balance over ${transport}`, formatError(error));
    write(`${transport.toUpperCase()} FAILED`);
    return 1;
  }
}

/**
 * Transport named on the failure line when the application could not start,
 * before the validated config is available.
 */
export function resolveCliTransport(
  env: NodeJS.ProcessEnv,
): CaptchaTransportType {
  return env.DBC_TRANSPORT?.trim().toLowerCase() === CaptchaTransportType.HTTP
    ? CaptchaTransportType.HTTP
    : CaptchaTransportType.SOCKET;
}

/**
 * Reports a failed bootstrap (missing credentials, invalid environment) the
 * same way as a failed balance lookup.
 *
 * @returns the process exit code
 */
export function reportBootstrapFailure(
  error: unknown,
  transport: CaptchaTransportType,
  write: OutputWriter,
): number {
  logger.error('Failed to start the CAPTCHA client', formatError(error));
  write(`${transport.toUpperCase()} FAILED`);
  return 1;
}
