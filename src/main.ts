import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { describeError } from './common/errors';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  configureApp(app);

  const port = Number(app.get(ConfigService).get<string>('PORT') ?? 8082);
  await app.listen(port);
  logger.log(`Listening on port ${port}`);
}

process.on('uncaughtException', (err: unknown) => {
  logger.error(`Uncaught exception: ${describeError(err)}`);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error(`Unhandled rejection: ${describeError(reason)}`);
});

bootstrap().catch((err: unknown) => {
  logger.error(`Failed to start: ${describeError(err)}`);
  process.exit(1);
});
