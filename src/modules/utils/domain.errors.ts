import { ValidationReason } from '../geo/validation-result';
import type { RateLimitLayer } from '../rate-limit/rate-limit.interface';

/**
 * Base class for errors that carry a stable, client-facing code.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    readonly reason: ValidationReason,
    message: string,
  ) {
    super(message);
  }
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';
}

export class RateLimitExceededError extends DomainError {
  readonly code = 'RATE_LIMIT_EXCEEDED';

  constructor(
    message: string,
    readonly layer: RateLimitLayer | 'upstream',
    readonly retryAfterMs: number,
  ) {
    super(message);
  }
}

export class ServiceUnavailableError extends DomainError {
  readonly code = 'SERVICE_UNAVAILABLE';
}
