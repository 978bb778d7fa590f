import { Logger } from '@nestjs/common';
import { Clock, systemClock } from '../utils/clock';
import { TtlCache } from '../utils/ttl-cache';
import {
  LayeredRateLimitConfig,
  RateLimitDecision,
  RateLimitLayer,
  RateLimitStats,
} from './rate-limit.interface';
import { TokenBucket } from './token-bucket';

/**
 * Three independent token buckets checked in order: one global bucket,
 * then an hourly and a burst bucket per client. A request must fit in all
 * three; only then is a token taken from each, so a request refused by a
 * later layer costs nothing in the earlier ones.
 */
export class LayeredRateLimiter {
  private readonly logger = new Logger(LayeredRateLimiter.name);
  private readonly globalBucket: TokenBucket;
  private readonly clientBuckets: TtlCache<TokenBucket>;
  private readonly burstBuckets: TtlCache<TokenBucket>;

  constructor(
    private readonly config: LayeredRateLimitConfig,
    private readonly clock: Clock = systemClock,
  ) {
    this.globalBucket = new TokenBucket(config.global, clock);
    // a bucket idle for a whole window is full again, the same as a new one
    this.clientBuckets = new TtlCache<TokenBucket>(
      {
        namespace: 'rate-limit-client',
        ttlMs: config.client.windowMs,
        maxSize: config.maxTrackedClients,
      },
      clock,
    );
    this.burstBuckets = new TtlCache<TokenBucket>(
      {
        namespace: 'rate-limit-burst',
        ttlMs: config.burst.windowMs,
        maxSize: config.maxTrackedClients,
      },
      clock,
    );
  }

  tryAcquire(clientKey: string): RateLimitDecision {
    const layers: Array<[RateLimitLayer, TokenBucket]> = [
      ['global', this.globalBucket],
      ['client', this.bucketFor(this.clientBuckets, clientKey, 'client')],
      ['burst', this.bucketFor(this.burstBuckets, clientKey, 'burst')],
    ];

    for (const [layer, bucket] of layers) {
      if (!bucket.canConsume()) {
        this.logger.warn(`Rate limit layer '${layer}' rejected client ${clientKey}`);
        return {
          allowed: false,
          layer,
          retryAfterMs: bucket.timeUntilNextToken(),
        };
      }
    }

    for (const [, bucket] of layers) {
      bucket.tryConsume();
    }

    return { allowed: true, remaining: layers[1][1].remaining() };
  }

  globalStats(): RateLimitStats {
    return this.globalBucket.stats();
  }

  trackedClients(): number {
    return this.clientBuckets.size();
  }

  private bucketFor(
    buckets: TtlCache<TokenBucket>,
    clientKey: string,
    layer: 'client' | 'burst',
  ): TokenBucket {
    const bucket =
      buckets.get(clientKey) ?? new TokenBucket(this.config[layer], this.clock);
    // re-putting restarts the TTL, so it measures idle time
    buckets.put(clientKey, bucket);
    return bucket;
  }
}
