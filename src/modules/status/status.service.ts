import { Inject, Injectable, Logger } from '@nestjs/common';
import { readFileSync } from 'fs';
import { join } from 'path';
import { CacheStats } from '../utils/cache.interface';
import { LayeredRateLimiter } from '../rate-limit/layered-rate-limiter';
import { RateLimitStats, UPSTREAM_RATE_LIMITER } from '../rate-limit/rate-limit.interface';
import { TokenBucket } from '../rate-limit/token-bucket';
import {
  FORECAST_CACHE,
  ForecastCache,
  LOCATION_CACHE,
  LocationCache,
  WEATHER_CACHE,
  WeatherCache,
} from '../weather/weather-cache.interface';

export interface ApiStatus {
  status: string;
  version: string;
  timestamp: string;
}

export interface CacheStatus {
  weather: CacheStats;
  forecast: CacheStats;
  location: CacheStats;
}

export interface RateLimitStatus {
  upstream: RateLimitStats;
  global: RateLimitStats;
  trackedClients: number;
}

function readVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(join(process.cwd(), 'package.json'), 'utf8'),
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return 'unknown';
}

@Injectable()
export class StatusService {
  private readonly logger = new Logger(StatusService.name);
  private readonly version: string;

  constructor(
    @Inject(WEATHER_CACHE) private readonly weatherCache: WeatherCache,
    @Inject(FORECAST_CACHE) private readonly forecastCache: ForecastCache,
    @Inject(LOCATION_CACHE) private readonly locationCache: LocationCache,
    @Inject(UPSTREAM_RATE_LIMITER) private readonly upstreamLimiter: TokenBucket,
    private readonly rateLimiter: LayeredRateLimiter,
  ) {
    try {
      this.version = readVersion();
    } catch (error) {
      this.logger.warn(
        `Could not read package.json: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.version = 'unknown';
    }
  }

  getStatus(): ApiStatus {
    return {
      status: 'OK',
      version: this.version,
      timestamp: new Date().toISOString(),
    };
  }

  getCacheStats(): CacheStatus {
    return {
      weather: this.weatherCache.getStats(),
      forecast: this.forecastCache.getStats(),
      location: this.locationCache.getStats(),
    };
  }

  getRateLimitStats(): RateLimitStatus {
    return {
      upstream: this.upstreamLimiter.stats(),
      global: this.rateLimiter.globalStats(),
      trackedClients: this.rateLimiter.trackedClients(),
    };
  }
}
