import { ConfigService } from '@nestjs/config';
import { getNumber, MINUTE_MS } from '../utils/config.helpers';
import { LayeredRateLimitConfig, RateLimitConfig } from './rate-limit.interface';

const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Quota of the upstream weather provider, shared by every request.
 */
export function loadUpstreamRateLimitConfig(
  configService: ConfigService,
): RateLimitConfig {
  return {
    maxRequests: getNumber(configService, 'UPSTREAM_RATE_LIMIT_MAX_REQUESTS', 1000),
    windowMs:
      getNumber(configService, 'UPSTREAM_RATE_LIMIT_WINDOW_MINUTES', 24 * 60) *
      MINUTE_MS,
  };
}

export function loadLayeredRateLimitConfig(
  configService: ConfigService,
): LayeredRateLimitConfig {
  return {
    global: {
      maxRequests: getNumber(configService, 'RATE_LIMIT_GLOBAL_DAILY', 9000),
      windowMs: DAY_MS,
    },
    client: {
      maxRequests: getNumber(configService, 'RATE_LIMIT_PER_CLIENT_HOURLY', 100),
      windowMs: HOUR_MS,
    },
    burst: {
      maxRequests: getNumber(configService, 'RATE_LIMIT_BURST', 20),
      windowMs:
        getNumber(configService, 'RATE_LIMIT_BURST_WINDOW_MINUTES', 5) * MINUTE_MS,
    },
    maxTrackedClients: getNumber(configService, 'RATE_LIMIT_MAX_TRACKED_CLIENTS', 10000),
  };
}
