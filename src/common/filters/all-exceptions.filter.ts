import type { ArgumentsHost } from '@nestjs/common';
import { Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { getTraceId } from '../logger/request-context';

export interface ErrorResponse {
  statusCode: number;
  code?: string;
  message: string;
  error: string;
  timestamp: string;
  path: string;
  traceId?: string;
}

/**
 * Renders every error as an {@link ErrorResponse}. Exchange exceptions carry
 * their `code` through; anything that is not an HttpException becomes a 500.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number;
    let message: string;
    let error: string;
    let code: string | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'object') {
        message = this.flattenMessage(readField(exceptionResponse, 'message')) ?? exception.message;
        error = stringField(exceptionResponse, 'error') ?? exception.name;
        code = stringField(exceptionResponse, 'code');
      } else {
        message = exceptionResponse;
        error = exception.name;
      }

      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.warn(`${request.method} ${request.url} failed with ${status}: ${message}`);
      }
    } else if (exception instanceof Error) {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = process.env.NODE_ENV === 'production' ? 'Internal server error' : exception.message;
      error = 'InternalServerError';
      this.logger.error(`Unexpected error: ${exception.message}`, exception.stack);
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = 'Unknown error occurred';
      error = 'InternalServerError';
      this.logger.error(`Unexpected non-error thrown: ${String(exception)}`);
    }

    const traceId = getTraceId();
    const body: ErrorResponse = {
      statusCode: status,
      ...(code ? { code } : {}),
      message,
      error,
      timestamp: new Date().toISOString(),
      path: request.url,
      ...(traceId ? { traceId } : {}),
    };

    response.status(status).json(body);
  }

  private flattenMessage(value: unknown): string | undefined {
    if (typeof value === 'string') {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map(String).join(', ');
    }
    return undefined;
  }
}

function readField(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

function stringField(source: object, key: string): string | undefined {
  const value = readField(source, key);
  return typeof value === 'string' ? value : undefined;
}
