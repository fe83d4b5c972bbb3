import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { v4 as uuidv4 } from 'uuid';
import { getErrorMessage, getErrorStack } from '../utils/errors';

/**
 * Structured JSON logging of HTTP requests (webhook calls, probes).
 * Bodies are never logged: updates carry contacts and VINs.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    // Generate or use existing request ID for log correlation
    const requestId = request.header('x-request-id') || uuidv4().slice(0, 8);
    response.setHeader('X-Request-ID', requestId);

    const { method, originalUrl: url, ip } = request;
    const now = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(
            JSON.stringify({
              requestId,
              method,
              url,
              statusCode: response.statusCode,
              duration: Date.now() - now,
              ip,
            }),
          );
        },
        error: (error: unknown) => {
          const statusCode = error instanceof HttpException ? error.getStatus() : 500;
          const entry = JSON.stringify({
            requestId,
            method,
            url,
            statusCode,
            duration: Date.now() - now,
            ip,
            error: getErrorMessage(error),
            stack: statusCode >= 500 ? getErrorStack(error) : undefined,
          });

          if (statusCode >= 500) {
            this.logger.error(entry);
          } else {
            this.logger.warn(entry);
          }
        },
      }),
    );
  }
}
