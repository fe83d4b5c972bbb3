import * as Sentry from '@sentry/node';
import { Logger } from '@nestjs/common';

const logger = new Logger('Sentry');

/**
 * Initializes Sentry only when SENTRY_DSN is provided; a no-op otherwise.
 */
export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN;

  if (!dsn) {
    logger.warn('SENTRY_DSN not configured, error monitoring disabled');
    return;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV || 'development',
    release: process.env.APP_VERSION || 'parts-request-bot@unknown',
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.2 : 1.0,
    // Contacts and VINs stay out of error reports
    sendDefaultPii: false,
    ignoreErrors: ['ECONNRESET', 'EPIPE'],
    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers['x-telegram-bot-api-secret-token'];
      }
      return event;
    },
  });

  logger.log('Sentry initialized successfully');
}

export function captureException(
  error: unknown,
  context?: Record<string, unknown>,
): void {
  if (!context) {
    Sentry.captureException(error);
    return;
  }

  Sentry.withScope((scope) => {
    for (const [key, value] of Object.entries(context)) {
      scope.setExtra(key, value);
    }
    Sentry.captureException(error);
  });
}

export async function flushSentry(timeout = 2000): Promise<void> {
  if (process.env.SENTRY_DSN) {
    await Sentry.close(timeout);
  }
}
