import { WinstonModule, utilities as nestWinstonModuleUtilities } from 'nest-winston';
import * as winston from 'winston';
import 'winston-daily-rotate-file';

const isProduction = process.env.NODE_ENV === 'production';

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

/**
 * Development: colored, human-readable console output (NestJS style).
 * Production: JSON on the console plus daily rotated JSON files, errors
 * duplicated into their own file so store/notifier failures are easy to find.
 */
function createConsoleTransport(): winston.transport {
  return new winston.transports.Console({
    format: isProduction
      ? jsonFormat
      : winston.format.combine(
          winston.format.timestamp(),
          winston.format.ms(),
          nestWinstonModuleUtilities.format.nestLike('PartsBot', {
            colors: true,
            prettyPrint: true,
          }),
        ),
  });
}

function createRotatingFileTransport(
  suffix: string,
  maxFiles: string,
  level?: string,
): winston.transport {
  return new winston.transports.DailyRotateFile({
    filename: `logs/parts-bot${suffix}-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '20m',
    maxFiles,
    level,
    format: jsonFormat,
  });
}

export const createLogger = () => {
  const transports: winston.transport[] = [createConsoleTransport()];

  if (isProduction) {
    transports.push(
      createRotatingFileTransport('', '14d'),
      createRotatingFileTransport('-error', '30d', 'error'),
    );
  }

  return WinstonModule.createLogger({
    level: isProduction ? 'info' : 'debug',
    transports,
  });
};
