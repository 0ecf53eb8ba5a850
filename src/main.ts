import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { Logger as PinoLogger } from 'nestjs-pino';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { loadCrashReportingConfig } from './common/config/crash-reporting.config';
import { reportStartupFailure } from './modules/crash-reporting/startup-failure.reporter';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ ignoreTrailingSlash: true }),
    { bufferLogs: true, abortOnError: false },
  );

  // Replace default NestJS logger with nestjs-pino
  app.useLogger(app.get(PinoLogger));
  app.enableShutdownHooks();

  configureApp(app);

  const host = process.env.HOST || '0.0.0.0';
  const port = process.env.PORT || 8080;

  await app.listen(port, host);

  const logger = new Logger('Bootstrap');
  logger.log(`Server listening on ${host}:${port}`);
}

async function main(): Promise<void> {
  try {
    await bootstrap();
  } catch (error) {
    // Config is read straight from the environment: the DI container may
    // never have been built.
    await reportStartupFailure(error, loadCrashReportingConfig(process.env));
    process.exit(1);
  }
}

void main();
