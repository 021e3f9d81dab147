import 'reflect-metadata';
import { readFileSync } from 'fs';
import { Logger } from '@nestjs/common';
import { createApp } from './app.factory.js';
import { getHost, getLogLevels, getPort, getTlsFiles } from './config/webhook.config.js';

async function bootstrap(): Promise<void> {
  const tls = getTlsFiles();
  const app = await createApp({
    logger: getLogLevels(),
    httpsOptions:
      tls === undefined
        ? undefined
        : { cert: readFileSync(tls.certFile), key: readFileSync(tls.keyFile) },
  });
  app.enableShutdownHooks();

  const port = getPort();
  const host = getHost();
  await app.listen(port, host);

  const logger = new Logger('Bootstrap');
  logger.log(`Tenant conversion webhook listening on ${tls ? 'https' : 'http'}://${host}:${String(port)}`);
  logger.log('Endpoints: POST /convert, GET /health');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exit(1);
});
