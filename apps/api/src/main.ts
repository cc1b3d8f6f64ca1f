/**
 * Decrypto API
 * Main entry point
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('Decrypto API');
  const app = await NestFactory.create(AppModule);

  configureApp(app);
  app.enableShutdownHooks();

  // listen() initializes every module first, so the first superuser exists before the port opens
  const port = app.get(ConfigService).getOrThrow<number>('port');
  await app.listen(port);

  logger.log(`Decrypto API listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(
    'Failed to start Decrypto API',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
