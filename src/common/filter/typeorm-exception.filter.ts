import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import type { Request, Response } from 'express';
import { EntityNotFoundError, QueryFailedError } from 'typeorm';
import { ErrorResponseBody } from './http-exception.filter';

const CONFLICT_STATUS = HttpStatus.CONFLICT;
const BAD_REQUEST_STATUS = HttpStatus.BAD_REQUEST;
const NOT_FOUND_STATUS = HttpStatus.NOT_FOUND;

// SQLite codes first, then their PostgreSQL SQLSTATE equivalents
const UNIQUE_VIOLATION_CODES = ['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY', '23505'];
const FOREIGN_KEY_VIOLATION_CODES = ['SQLITE_CONSTRAINT_FOREIGNKEY', '23503'];
const NOT_NULL_VIOLATION_CODES = ['SQLITE_CONSTRAINT_NOTNULL', '23502'];

export function driverErrorCode(error: QueryFailedError): string | undefined {
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    const { code } = driverError;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

@Catch(QueryFailedError, EntityNotFoundError)
export class TypeOrmExceptionFilter implements ExceptionFilter {
  catch(exception: QueryFailedError | EntityNotFoundError, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const path: string = request?.url ?? '';

    if (exception instanceof EntityNotFoundError) {
      const body: ErrorResponseBody = {
        statusCode: NOT_FOUND_STATUS,
        message: 'Record not found',
        code: 'NOT_FOUND',
        path,
      };
      response.status(body.statusCode).json(body);
      return;
    }

    const body = this.buildQueryFailedBody(exception, path);
    response.status(body.statusCode).json(body);
  }

  private buildQueryFailedBody(error: QueryFailedError, path: string): ErrorResponseBody {
    const code = driverErrorCode(error);

    if (code && UNIQUE_VIOLATION_CODES.includes(code)) {
      return {
        statusCode: CONFLICT_STATUS,
        message: 'Unique constraint violation',
        code,
        path,
      };
    }
    if (code && FOREIGN_KEY_VIOLATION_CODES.includes(code)) {
      return {
        statusCode: CONFLICT_STATUS,
        message: 'Foreign key constraint failed',
        code,
        path,
      };
    }
    if (code && NOT_NULL_VIOLATION_CODES.includes(code)) {
      return {
        statusCode: BAD_REQUEST_STATUS,
        message: 'Missing required value',
        code,
        path,
      };
    }
    return {
      statusCode: BAD_REQUEST_STATUS,
      message: 'Database request error',
      code: code ?? 'QUERY_FAILED',
      path,
    };
  }
}
