import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Request, Response } from 'express';
import { RateLimitExceededError } from '../utils/domain.errors';
import { LayeredRateLimiter } from './layered-rate-limiter';
import { RateLimitLayer } from './rate-limit.interface';

const LAYER_MESSAGES: Record<RateLimitLayer, string> = {
  global: 'Rate limit exceeded. Please try again later.',
  client: 'Rate limit exceeded. Please try again later.',
  burst: 'Burst protection triggered. Please slow down.',
};

/**
 * Applies the layered global / per-client / burst limits to a route.
 * Clients are keyed by remote address.
 */
@Injectable()
export class RateLimitGuard implements CanActivate {
  constructor(private readonly rateLimiter: LayeredRateLimiter) {}

  canActivate(context: ExecutionContext): boolean {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const clientKey = request.ip ?? request.socket.remoteAddress ?? 'unknown';
    const decision = this.rateLimiter.tryAcquire(clientKey);

    if (!decision.allowed) {
      throw new RateLimitExceededError(
        LAYER_MESSAGES[decision.layer],
        decision.layer,
        decision.retryAfterMs,
      );
    }

    response.setHeader('X-RateLimit-Remaining', String(decision.remaining));
    return true;
  }
}
