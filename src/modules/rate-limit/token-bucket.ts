import { Logger } from '@nestjs/common';
import { Clock, systemClock } from '../utils/clock';
import { RateLimitConfig, RateLimitStats } from './rate-limit.interface';

/**
 * Token bucket holding up to `maxRequests` tokens, refilled continuously so
 * that an empty bucket is full again after `windowMs`.
 *
 * Every method refills before acting and runs to completion without
 * yielding, which makes refill-then-consume atomic with respect to other
 * callers on the event loop. The bucket starts full and is not persisted.
 */
export class TokenBucket {
  private readonly logger = new Logger(TokenBucket.name);
  private readonly capacity: number;
  private readonly refillRatePerMs: number;
  private tokens: number;
  private lastRefillTime: number;
  private consumedRequests = 0;
  private rejectedRequests = 0;

  constructor(
    config: RateLimitConfig,
    private readonly clock: Clock = systemClock,
  ) {
    if (!Number.isInteger(config.maxRequests) || config.maxRequests < 1) {
      throw new Error(
        `Rate limit capacity must be a positive integer, got ${config.maxRequests}`,
      );
    }
    if (config.windowMs <= 0) {
      throw new Error(`Rate limit window must be positive, got ${config.windowMs}`);
    }
    this.capacity = config.maxRequests;
    this.refillRatePerMs = config.maxRequests / config.windowMs;
    this.tokens = config.maxRequests;
    this.lastRefillTime = clock();
  }

  /**
   * Take one token if available.
   */
  tryConsume(): boolean {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      this.consumedRequests++;
      return true;
    }

    this.rejectedRequests++;
    this.logger.debug('Token bucket empty. Request rejected');
    return false;
  }

  /**
   * Whether a token is available, without taking it.
   */
  canConsume(): boolean {
    this.refill();
    return this.tokens >= 1;
  }

  remaining(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  /**
   * Milliseconds until the bucket is full again. Zero when already full.
   */
  timeUntilReset(): number {
    this.refill();
    return Math.ceil((this.capacity - this.tokens) / this.refillRatePerMs);
  }

  /**
   * Milliseconds until at least one token is available.
   */
  timeUntilNextToken(): number {
    this.refill();
    if (this.tokens >= 1) {
      return 0;
    }
    return Math.ceil((1 - this.tokens) / this.refillRatePerMs);
  }

  stats(): RateLimitStats {
    const untilReset = this.timeUntilReset();
    return {
      maxRequests: this.capacity,
      remainingRequests: Math.floor(this.tokens),
      consumedRequests: this.consumedRequests,
      rejectedRequests: this.rejectedRequests,
      resetTime: this.lastRefillTime + untilReset,
      algorithm: 'TOKEN_BUCKET',
    };
  }

  private refill(): void {
    const now = this.clock();
    const elapsed = now - this.lastRefillTime;

    if (elapsed > 0) {
      this.tokens = Math.min(
        this.capacity,
        this.tokens + elapsed * this.refillRatePerMs,
      );
      this.lastRefillTime = now;
    }
  }
}
