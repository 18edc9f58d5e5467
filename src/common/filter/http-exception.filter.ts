import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';

export interface ErrorResponseBody {
  readonly statusCode: number;
  readonly message: string | string[];
  readonly code?: string;
  readonly path?: string;
}

function extractMessage(exception: HttpException): string | string[] {
  const res = exception.getResponse();
  if (typeof res === 'string') return res;
  if (typeof res === 'object' && res !== null && 'message' in res) {
    const { message } = res;
    if (typeof message === 'string') return message;
    if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) return message;
  }
  return exception.message;
}

/**
 * Global filter that normalizes all non-database exceptions
 * into a consistent error response body.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const path: string = request?.url ?? '';

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body: ErrorResponseBody = {
        statusCode: status,
        message: extractMessage(exception),
        path,
      };
      response.status(status).json(body);
      return;
    }

    this.logger.error(
      `Unhandled error on ${path}`,
      exception instanceof Error ? exception.stack : String(exception),
    );

    const body: ErrorResponseBody = {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      code: 'INTERNAL_ERROR',
      path,
    };
    response.status(body.statusCode).json(body);
  }
}
