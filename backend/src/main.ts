import 'reflect-metadata';

import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app/app.module';
import { AllExceptionsFilter } from './common/filters/http-exception.filter';
import { isRecoverableDatabaseError } from './database/database.service';
import { LoggingService } from './logging/logging.service';

process.on('uncaughtException', (error) => {
  if (isRecoverableDatabaseError(error)) {
    // DatabaseService rebuilds the pool on the next query.
    return;
  }

  Logger.error('Uncaught exception', error.stack);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  if (isRecoverableDatabaseError(reason)) {
    return;
  }

  Logger.error('Unhandled promise rejection', reason instanceof Error ? reason.stack : reason);
  process.exit(1);
});

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(LoggingService));

  const allowedOrigins = ['http://localhost:3000', 'http://localhost:8501'];
  const frontendUrl = process.env.FRONTEND_URL;
  if (frontendUrl) {
    allowedOrigins.push(frontendUrl);
  }

  app.enableCors({ origin: allowedOrigins });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalFilters(new AllExceptionsFilter());
  app.enableShutdownHooks();

  const globalPrefix = 'api';
  app.setGlobalPrefix(globalPrefix);
  const port = process.env.PORT || 8080;
  await app.listen(port);
  Logger.log(`Application is running on: http://localhost:${port}/${globalPrefix}`);
}

bootstrap().catch((error: Error) => {
  Logger.error('Failed to start application', error.stack);
  process.exit(1);
});
