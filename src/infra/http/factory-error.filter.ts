import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ErrorCode, ErrorCodes } from '../errors/error-codes';
import { FactoryError } from '../errors/factory-errors';
import { ApiErrorBody, apiFailure } from './api-response.dto';

const STATUS_BY_CODE: Record<ErrorCode, HttpStatus> = {
  INVALID_REQUEST: HttpStatus.BAD_REQUEST,
  INVALID_INPUT: HttpStatus.BAD_REQUEST,
  RESOURCE_EXHAUSTED: HttpStatus.SERVICE_UNAVAILABLE,
  NO_PORT_AVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  BUILD_FAILED: HttpStatus.BAD_GATEWAY,
  LAUNCH_FAILED: HttpStatus.BAD_GATEWAY,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  GONE: HttpStatus.GONE,
  INTERNAL_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
};

/** HTTP status for a domain error code. */
export function httpStatusFor(code: ErrorCode): HttpStatus {
  return STATUS_BY_CODE[code];
}

/** 4xx status carried by a middleware error such as body-parser's, otherwise null. */
export function clientErrorStatus(exception: unknown): number | null {
  if (typeof exception !== 'object' || exception === null) return null;
  const status =
    'status' in exception ? exception.status : 'statusCode' in exception ? exception.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Global exception filter.
 * Domain errors keep their code; Nest HttpExceptions and body-parser errors keep
 * their status (413 is INVALID_INPUT); anything else becomes 500 INTERNAL_ERROR
 * and is logged with its stack.
 */
@Catch()
export class FactoryErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(FactoryErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.toErrorBody(exception);
    response.status(status).json(apiFailure(body));
  }

  private toErrorBody(exception: unknown): { status: number; body: ApiErrorBody } {
    if (exception instanceof FactoryError) {
      return {
        status: httpStatusFor(exception.code),
        body: {
          code: exception.code,
          message: exception.message,
          retryable: exception.retryable,
          details: exception.details,
        },
      };
    }
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const res = exception.getResponse();
      const message =
        typeof res === 'object' && res !== null && 'message' in res
          ? res.message
          : exception.message;
      return {
        status,
        body: {
          code:
            status === HttpStatus.NOT_FOUND
              ? ErrorCodes.NOT_FOUND
              : status < HttpStatus.INTERNAL_SERVER_ERROR
                ? ErrorCodes.INVALID_REQUEST
                : ErrorCodes.INTERNAL_ERROR,
          message: Array.isArray(message) ? message.join('; ') : String(message),
          retryable: false,
        },
      };
    }
    const clientStatus = clientErrorStatus(exception);
    if (clientStatus !== null) {
      return {
        status: clientStatus,
        body: {
          code: clientStatus === HttpStatus.PAYLOAD_TOO_LARGE ? ErrorCodes.INVALID_INPUT : ErrorCodes.INVALID_REQUEST,
          message: exception instanceof Error ? exception.message : 'Bad request',
          retryable: false,
        },
      };
    }
    this.logger.error(
      'Unhandled error',
      exception instanceof Error ? exception.stack : String(exception),
    );
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'Internal server error',
        retryable: false,
      },
    };
  }
}
