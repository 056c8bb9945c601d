#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import {
  ExitCode,
  PingResultFormatter,
} from './application/services/ping-result-formatter.service';
import { PingWorkersUseCase } from './application/use-cases/ping-workers.use-case';
import { describeErrorChain } from './common/error-assertions';
import brokerConfig, { BrokerConfigType } from './infrastructure/config/broker.config';
import { WinstonLoggerAdapter } from './infrastructure/logging/winston-logger.adapter';

async function bootstrap(): Promise<ExitCode> {
  const app = await NestFactory.createApplicationContext(AppModule.forRoot(), {
    bufferLogs: true,
  });
  app.useLogger(app.get(WinstonLoggerAdapter));

  const config = app.get<BrokerConfigType>(brokerConfig.KEY);
  const pingWorkers = app.get(PingWorkersUseCase);
  const formatter = app.get(PingResultFormatter);

  const controller = new AbortController();
  const abort = (): void => controller.abort();
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    const report = await pingWorkers.execute({ signal: controller.signal });
    const output = formatter.format(report, config.outputFormat);
    process.stdout.write(`${output.text}\n`);
    return output.exitCode;
  } catch (error) {
    process.stderr.write(`Error: ${describeErrorChain(error)}\n`);
    return ExitCode.FAILURE;
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
    await app.close();
  }
}

bootstrap().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Error: ${describeErrorChain(error)}\n`);
    process.exitCode = ExitCode.FAILURE;
  },
);
