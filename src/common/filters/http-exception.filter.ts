import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { BaseException } from '../exceptions/base.exception';

type ErrorDetails = Record<string, unknown>;

export interface ErrorResponse {
  statusCode: number;
  errorCode: string;
  message: string;
  details?: ErrorDetails;
  timestamp: string;
  path: string;
  traceId?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Global exception filter that catches all exceptions and formats consistent error responses
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const traceId = this.extractTraceId(request);

    let status: number;
    let errorCode: string;
    let message: string;
    let details: ErrorDetails | undefined;

    if (exception instanceof BaseException) {
      // Custom exception with structured format
      status = exception.getStatus();
      errorCode = exception.errorCode;
      message = exception.message;
      details = exception.context;
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      errorCode = this.mapStatusToErrorCode(status);

      if (isRecord(exceptionResponse)) {
        message = this.messageOf(exceptionResponse.message) ?? exception.message;
        if (typeof exceptionResponse.errorCode === 'string') {
          errorCode = exceptionResponse.errorCode;
        }
        if (Array.isArray(exceptionResponse.message)) {
          details = { errors: exceptionResponse.message };
        }
      } else {
        message = String(exceptionResponse) || exception.message;
      }
    } else if (exception instanceof Error) {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      errorCode = 'INTERNAL_SERVER_ERROR';
      message = exception.message || 'An internal server error occurred';
      details = this.sanitizeError(exception);
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      errorCode = 'UNKNOWN_ERROR';
      message = 'An unknown error occurred';
      details = { original_error: String(exception) };
    }

    const summary = `${errorCode}: ${message} | Path: ${request.method} ${request.path} | TraceId: ${traceId ?? 'none'}`;
    if (status >= 500) {
      this.logger.error(
        summary,
        process.env.NODE_ENV === 'development' && exception instanceof Error
          ? exception.stack
          : undefined,
      );
    } else {
      this.logger.warn(summary);
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      errorCode,
      message,
      ...(details && Object.keys(details).length > 0 ? { details } : {}),
      timestamp: new Date().toISOString(),
      path: request.url,
      ...(traceId ? { traceId } : {}),
    };

    response.status(status).json(errorResponse);
  }

  private extractTraceId(request: Request): string | undefined {
    const header = request.headers['x-trace-id'];
    return Array.isArray(header) ? header[0] : header;
  }

  private messageOf(value: unknown): string | undefined {
    if (typeof value === 'string') {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map(String).join(', ');
    }
    return undefined;
  }

  private mapStatusToErrorCode(status: number): string {
    const mapping: Record<number, string> = {
      [HttpStatus.BAD_REQUEST]: 'BAD_REQUEST',
      [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
      [HttpStatus.METHOD_NOT_ALLOWED]: 'METHOD_NOT_ALLOWED',
      [HttpStatus.PAYLOAD_TOO_LARGE]: 'PAYLOAD_TOO_LARGE',
      [HttpStatus.UNPROCESSABLE_ENTITY]: 'UNPROCESSABLE_ENTITY',
      [HttpStatus.TOO_MANY_REQUESTS]: 'RATE_LIMIT_EXCEEDED',
      [HttpStatus.INTERNAL_SERVER_ERROR]: 'INTERNAL_SERVER_ERROR',
      [HttpStatus.SERVICE_UNAVAILABLE]: 'SERVICE_UNAVAILABLE',
    };

    return mapping[status] ?? 'UNKNOWN_ERROR';
  }

  /**
   * Sanitize error for production (remove stack traces)
   */
  private sanitizeError(error: Error): ErrorDetails {
    return {
      name: error.name,
      message: error.message,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }
}
