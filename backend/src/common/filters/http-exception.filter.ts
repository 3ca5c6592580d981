import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

import { DuplicateError, ParkingError } from '../errors/parking.errors';

const PARKING_ERROR_STATUS: Record<ParkingError['kind'], HttpStatus> = {
  validation: HttpStatus.BAD_REQUEST,
  duplicate: HttpStatus.CONFLICT,
  not_found: HttpStatus.NOT_FOUND,
  backend_unavailable: HttpStatus.SERVICE_UNAVAILABLE,
};

export interface ErrorResponseBody {
  statusCode: number;
  timestamp: string;
  path: string;
  message: string;
  error?: string;
  field?: string;
}

export function describeException(exception: unknown): {
  status: number;
  message: string;
  error?: string;
  field?: string;
} {
  // Domain errors carry their own status mapping
  if (exception instanceof ParkingError) {
    return {
      status: PARKING_ERROR_STATUS[exception.kind],
      message: exception.message,
      error: exception.name,
      ...(exception instanceof DuplicateError ? { field: exception.field } : {}),
    };
  }

  if (exception instanceof HttpException) {
    // ValidationPipe responses carry an array of messages
    const exceptionResponse = exception.getResponse();
    if (typeof exceptionResponse === 'string') {
      return { status: exception.getStatus(), message: exceptionResponse };
    }

    const body: Record<string, unknown> = { ...exceptionResponse };
    const message = Array.isArray(body.message)
      ? body.message.join(', ')
      : typeof body.message === 'string'
        ? body.message
        : exception.message;
    const error = typeof body.error === 'string' ? body.error : undefined;
    return { status: exception.getStatus(), message, error };
  }

  // Anything else is unexpected; keep its details in the logs only
  return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Internal server error' };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, message, error, field } = describeException(exception);

    // Server errors with stack, client errors as warnings
    const logMessage = `${request.method} ${request.url} - ${status} - ${message}`;
    if (status >= 500) {
      this.logger.error(logMessage, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(logMessage);
    }

    const body: ErrorResponseBody = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      message,
      ...(error && { error }),
      ...(field && { field }),
    };
    response.status(status).json(body);
  }
}
