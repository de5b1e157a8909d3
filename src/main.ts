import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { loadConfig, loadEnvironment } from './config/app.config';
import { createValidationPipe } from './common/pipes/validation.pipe';

async function bootstrap(): Promise<void> {
  loadEnvironment();
  const config = loadConfig();

  const app = await NestFactory.create(AppModule, { logger: config.LOG_LEVELS });
  app.useGlobalPipes(createValidationPipe());
  app.enableShutdownHooks();

  await app.listen(config.PORT, config.HOST);
  Logger.log(`Trade lifecycle API listening on ${config.HOST}:${config.PORT}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.stack ?? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
