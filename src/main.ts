import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

function logLevelsFrom(level: string | undefined): LogLevel[] {
  const normalized = (level ?? 'info').toLowerCase();
  const threshold = normalized === 'info' ? 'log' : normalized;
  const index = LOG_LEVELS.findIndex((candidate) => candidate === threshold);
  return LOG_LEVELS.slice(0, index === -1 ? LOG_LEVELS.indexOf('log') + 1 : index + 1);
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: logLevelsFrom(process.env.LOG_LEVEL),
  });
  app.enableShutdownHooks();
  configureApp(app);

  const port = app.get(ConfigService).get<number>('port', 8081);
  await app.listen(port);
  Logger.log(`Warehouse API listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start server', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
