import type { LoggerService, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module.js';
import { AllExceptionsFilter } from './filters/http-exception.filter.js';
import { getBodyLimit } from './config/webhook.config.js';

export interface CreateAppOptions {
  logger: LoggerService | LogLevel[] | false;
  httpsOptions?: { cert: Buffer; key: Buffer };
}

/** Builds the webhook application without listening. */
export async function createApp(options: CreateAppOptions): Promise<NestExpressApplication> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: options.logger,
    httpsOptions: options.httpsOptions,
    bodyParser: false,
  });
  app.useBodyParser('json', { limit: getBodyLimit() });
  app.useGlobalFilters(new AllExceptionsFilter());
  return app;
}
