import { CallHandler, ExecutionContext, HttpException, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';
import { sanitizeObject } from '../logger/log-sanitizer';

interface LogContext {
  message: string;
  method: string;
  url: string;
  statusCode: number;
  duration: number;
  userAgent?: string;
  ip?: string;
  body?: unknown;
  error?: { name: string; message: string };
}

const SLOW_REQUEST_MS = 1000;

/**
 * Logs one structured entry per HTTP request once it completes.
 * The trace ID is attached by the logger's format from the request context.
 */
@Injectable()
export class StructuredLoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const startTime = Date.now();

    const build = (statusCode: number, error?: unknown): LogContext => {
      const duration = Date.now() - startTime;
      const entry: LogContext = {
        message: `${request.method} ${request.url} ${statusCode} ${duration}ms`,
        method: request.method,
        url: request.url,
        statusCode,
        duration,
        userAgent: request.headers['user-agent'],
        ip: request.ip || request.socket?.remoteAddress,
      };

      const body: unknown = request.body;
      if (request.method !== 'GET' && body && typeof body === 'object' && Object.keys(body).length > 0) {
        entry.body = sanitizeObject(body);
      }

      if (error !== undefined) {
        entry.error =
          error instanceof Error ? { name: error.name, message: error.message } : { name: 'Error', message: String(error) };
      }
      return entry;
    };

    return next.handle().pipe(
      tap({
        next: () => this.logRequest(build(response.statusCode)),
        error: (error: unknown) => {
          const status = error instanceof HttpException ? error.getStatus() : 500;
          this.logRequest(build(status, error));
        },
      }),
    );
  }

  private logRequest(entry: LogContext): void {
    if (entry.statusCode >= 500) {
      this.logger.error(entry);
    } else if (entry.error) {
      this.logger.warn(entry);
    } else if (entry.duration > SLOW_REQUEST_MS) {
      this.logger.warn(entry);
    } else {
      this.logger.log(entry);
    }
  }
}
