import 'reflect-metadata';
import { NestFactory, BaseExceptionFilter } from '@nestjs/core';
import { ArgumentsHost, Logger, HttpException, HttpStatus } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response } from 'express';
import { AppModule } from './app.module';
import { createLogger } from './config/logger.config';
import { initSentry, captureException, flushSentry } from './config/sentry.config';
import { getErrorMessage, getErrorStack } from './common/utils/errors';

/**
 * Global exception filter that prevents stack traces from leaking in production.
 */
class GlobalExceptionFilter extends BaseExceptionFilter {
  private readonly filterLogger = new Logger('GlobalExceptionFilter');

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    if (exception instanceof HttpException) {
      super.catch(exception, host);
      return;
    }

    this.filterLogger.error(
      `Unhandled exception: ${getErrorMessage(exception)}`,
      getErrorStack(exception),
    );

    captureException(exception, {
      context: 'GlobalExceptionFilter',
      url: request.originalUrl,
      method: request.method,
    });

    const status = HttpStatus.INTERNAL_SERVER_ERROR;
    response.status(status).json({
      statusCode: status,
      message: 'Internal server error',
    });
  }
}

async function bootstrap() {
  // Initialize Sentry before anything else
  initSentry();

  const app = await NestFactory.create(AppModule, {
    logger: createLogger(),
  });

  const appLogger = new Logger('Bootstrap');
  const configService = app.get(ConfigService);

  appLogger.log('Starting parts request bot...');
  appLogger.log(`Environment: ${configService.get<string>('nodeEnv')}`);
  appLogger.log(`Telegram mode: ${configService.get<string>('telegram.mode')}`);

  app.setGlobalPrefix('api');

  const httpAdapter = app.getHttpAdapter();
  app.useGlobalFilters(new GlobalExceptionFilter(httpAdapter));

  // Enable graceful shutdown hooks (handles SIGTERM/SIGINT automatically)
  app.enableShutdownHooks();

  // Flush Sentry events on shutdown
  process.on('beforeExit', () => {
    flushSentry().catch((error) => appLogger.warn(`Sentry flush failed: ${getErrorMessage(error)}`));
  });

  const port = configService.getOrThrow<number>('port');
  await app.listen(port, '0.0.0.0');
  appLogger.log(`Parts request bot listening on port ${port}`);
}

void bootstrap().catch((error) => {
  const logger = new Logger('Bootstrap');
  logger.error(`Failed to start application: ${getErrorMessage(error)}`, getErrorStack(error));
  captureException(error);
  return flushSentry().finally(() => process.exit(1));
});
