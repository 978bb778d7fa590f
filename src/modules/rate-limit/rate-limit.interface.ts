export const UPSTREAM_RATE_LIMITER = Symbol('UPSTREAM_RATE_LIMITER');

export interface RateLimitStats {
  maxRequests: number;
  remainingRequests: number;
  consumedRequests: number;
  rejectedRequests: number;
  /** Epoch milliseconds at which the bucket will be full again. */
  resetTime: number;
  algorithm: 'TOKEN_BUCKET';
}

export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
}

/**
 * Layers of the HTTP-facing limiter, in evaluation order.
 */
export type RateLimitLayer = 'global' | 'client' | 'burst';

export interface LayeredRateLimitConfig {
  global: RateLimitConfig;
  client: RateLimitConfig;
  burst: RateLimitConfig;
  /** Upper bound on the number of clients tracked at once. */
  maxTrackedClients: number;
}

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; layer: RateLimitLayer; retryAfterMs: number };
