import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { randomUUID } from 'crypto';
import {
  DomainError,
  NotFoundError,
  RateLimitExceededError,
  ServiceUnavailableError,
  ValidationError,
} from './domain.errors';

export const API_SOURCE = 'weather-integration-api';

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    reason?: string;
    details?: unknown;
  };
  metadata: {
    timestamp: string;
    source: string;
    requestId: string;
  };
}

interface RenderedError {
  status: number;
  body: ApiErrorBody['error'];
}

const STATUS_CODES: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'VALIDATION_ERROR',
  [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
  [HttpStatus.METHOD_NOT_ALLOWED]: 'METHOD_NOT_ALLOWED',
  [HttpStatus.TOO_MANY_REQUESTS]: 'RATE_LIMIT_EXCEEDED',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'SERVICE_UNAVAILABLE',
};

/**
 * Renders every error leaving a controller as a uniform JSON envelope.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const requestId = randomUUID();
    const { status, body } = this.render(exception, requestId);

    response.setHeader('X-Request-ID', requestId);
    response.setHeader('X-Error-Code', body.code);
    response.setHeader('Cache-Control', 'no-store');
    if (exception instanceof RateLimitExceededError) {
      response.setHeader(
        'Retry-After',
        String(Math.max(1, Math.ceil(exception.retryAfterMs / 1000))),
      );
    }

    const payload: ApiErrorBody = {
      error: body,
      metadata: {
        timestamp: new Date().toISOString(),
        source: API_SOURCE,
        requestId,
      },
    };
    response.status(status).json(payload);
  }

  private render(exception: unknown, requestId: string): RenderedError {
    if (exception instanceof DomainError) {
      return this.renderDomainError(exception);
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return {
        status,
        body: {
          code: STATUS_CODES[status] ?? (status >= 500 ? 'INTERNAL_ERROR' : 'HTTP_ERROR'),
          message: exception.message,
        },
      };
    }

    this.logger.error(
      `Unhandled error for request ${requestId}`,
      exception instanceof Error ? exception.stack : String(exception),
    );
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    };
  }

  private renderDomainError(error: DomainError): RenderedError {
    if (error instanceof ValidationError) {
      return {
        status: HttpStatus.BAD_REQUEST,
        body: { code: error.code, message: error.message, reason: error.reason },
      };
    }
    if (error instanceof NotFoundError) {
      return {
        status: HttpStatus.NOT_FOUND,
        body: { code: error.code, message: error.message },
      };
    }
    if (error instanceof RateLimitExceededError) {
      return {
        status: HttpStatus.TOO_MANY_REQUESTS,
        body: {
          code: error.code,
          message: error.message,
          reason: error.layer,
          details: { retryAfterMs: error.retryAfterMs },
        },
      };
    }
    if (error instanceof ServiceUnavailableError) {
      this.logger.warn(`Service unavailable: ${error.message}`);
      return {
        status: HttpStatus.SERVICE_UNAVAILABLE,
        body: { code: error.code, message: error.message },
      };
    }
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { code: error.code, message: error.message },
    };
  }
}
