#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { WinstonLoggerService } from './common/services/winston-logger.service';
import {
  OutputWriter,
  reportBootstrapFailure,
  resolveCliTransport,
  runBalanceCommand,
} from './cli/balance.command';
import { CaptchaClientConfigService } from './modules/captcha-client/config/captcha-client-config.service';
import { CaptchaSolverService } from './modules/captcha-client/services/captcha-solver.service';

const writeLine: OutputWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

async function bootstrap(): Promise<void> {
  let app: INestApplicationContext;
  try {
    app = await NestFactory.createApplicationContext(AppModule, {
      bufferLogs: true,
      abortOnError: false,
    });
  } catch (error: unknown) {
    process.exitCode = reportBootstrapFailure(
      error,
      resolveCliTransport(process.env),
      writeLine,
    );
    return;
  }

  const logger = app.get(WinstonLoggerService);
  app.useLogger(logger);

  try {
    process.exitCode = await runBalanceCommand(
      app.get(CaptchaSolverService),
      app.get(CaptchaClientConfigService).getTransport(),
      writeLine,
    );
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
});
