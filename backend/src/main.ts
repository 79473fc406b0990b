import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { Logger, type LogLevel } from '@nestjs/common';
import { AppModule } from './app.module.js';
import { ApiExceptionFilter } from './common/api-exception.filter.js';
import type { AppConfig } from './config/index.js';

function resolveLogLevels(nodeEnv: string | undefined): LogLevel[] {
  if (nodeEnv === 'production') {
    return ['error', 'warn'];
  }
  if (nodeEnv === 'test') {
    return ['error'];
  }
  return ['log', 'error', 'warn', 'debug'];
}

async function bootstrap() {
  // rawBody keeps the exact bytes the sync webhook signature is computed over
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: resolveLogLevels(process.env.NODE_ENV),
    rawBody: true,
  });

  // large documents arrive base64-encoded
  app.useBodyParser('json', { limit: '50mb' });
  app.useBodyParser('urlencoded', { extended: true, limit: '50mb' });
  app.useGlobalFilters(new ApiExceptionFilter());
  app.enableShutdownHooks();

  const appConfig = app.get(ConfigService).get<AppConfig['app']>('app');
  if (!appConfig) {
    throw new Error('App configuration is missing');
  }
  const { port, nodeEnv } = appConfig;

  try {
    await app.listen(port);
    Logger.log(
      `HTTP server listening on port ${port} (env: ${nodeEnv})`,
      'Bootstrap',
    );
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      error.code === 'EADDRINUSE'
    ) {
      Logger.error(
        `Port ${port} is already in use. Please stop other instances or change the port.`,
        'Bootstrap',
      );
      process.exit(1);
    }
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Bootstrap failed: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
    'Bootstrap',
  );
  process.exit(1);
});
