import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { CacheProvider } from '../utils/cache.interface';
import { WEATHER_CONFIG, WeatherConfig } from './weather.config';
import {
  FORECAST_CACHE,
  ForecastCache,
  LOCATION_CACHE,
  LocationCache,
  WEATHER_CACHE,
  WeatherCache,
} from './weather-cache.interface';

const SWEEP_INTERVAL_NAME = 'weather-cache-sweep';

/**
 * Periodically drops expired entries so idle keys do not hold memory until
 * they are next read or evicted.
 */
@Injectable()
export class CacheMaintenanceService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CacheMaintenanceService.name);
  private readonly caches: Array<CacheProvider<unknown>>;

  constructor(
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(WEATHER_CONFIG) private readonly config: WeatherConfig,
    @Inject(WEATHER_CACHE) weatherCache: WeatherCache,
    @Inject(FORECAST_CACHE) forecastCache: ForecastCache,
    @Inject(LOCATION_CACHE) locationCache: LocationCache,
  ) {
    this.caches = [weatherCache, forecastCache, locationCache];
  }

  onModuleInit(): void {
    const intervalMs = this.config.cache.sweepIntervalMs;
    const interval = setInterval(() => this.sweep(), intervalMs);
    interval.unref();
    this.schedulerRegistry.addInterval(SWEEP_INTERVAL_NAME, interval);
    this.logger.log(`Cache sweep scheduled every ${intervalMs / 1000}s`);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', SWEEP_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(SWEEP_INTERVAL_NAME);
    }
  }

  sweep(): number {
    let removed = 0;
    for (const cache of this.caches) {
      removed += cache.sweepExpired();
    }
    if (removed > 0) {
      this.logger.debug(`Swept ${removed} expired cache entries`);
    }
    return removed;
  }
}
