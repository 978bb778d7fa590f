import { Logger, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { Clock, CLOCK } from '../utils/clock';
import { TtlCache } from '../utils/ttl-cache';
import { UtilsModule } from '../utils/utils.module';
import { CacheMaintenanceService } from './cache-maintenance.service';
import { OpenWeatherMapProvider } from './open-weather-map.provider';
import {
  FORECAST_CACHE,
  LOCATION_CACHE,
  WEATHER_CACHE,
} from './weather-cache.interface';
import { WEATHER_PROVIDER } from './weather-provider.interface';
import { WeatherRequestValidationService } from './weather-request-validation.service';
import { WeatherSummaryService } from './weather-summary.service';
import {
  loadWeatherConfig,
  WEATHER_CONFIG,
  WeatherCacheSettings,
  WeatherConfig,
} from './weather.config';
import { WeatherController } from './weather.controller';
import { WeatherRepository } from './weather.repository';

function cacheProvider(
  token: symbol,
  namespace: string,
  ttlOf: (settings: WeatherCacheSettings) => number,
): Provider {
  return {
    provide: token,
    inject: [WEATHER_CONFIG, CLOCK],
    useFactory: (config: WeatherConfig, clock: Clock) =>
      new TtlCache(
        { namespace, ttlMs: ttlOf(config.cache), maxSize: config.cache.maxSize },
        clock,
      ),
  };
}

@Module({
  imports: [ConfigModule, UtilsModule, RateLimitModule],
  controllers: [WeatherController],
  providers: [
    {
      provide: WEATHER_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): WeatherConfig => {
        const config = loadWeatherConfig(configService);
        new Logger('WeatherModule').log(
          `Cache TTLs: weather ${config.cache.weatherTtlMs / 60000}min, forecast ${config.cache.forecastTtlMs / 60000}min, location ${config.cache.locationTtlMs / 60000}min`,
        );
        return config;
      },
    },
    { provide: WEATHER_PROVIDER, useClass: OpenWeatherMapProvider },
    cacheProvider(WEATHER_CACHE, 'weather', (cache) => cache.weatherTtlMs),
    cacheProvider(FORECAST_CACHE, 'forecast', (cache) => cache.forecastTtlMs),
    cacheProvider(LOCATION_CACHE, 'location', (cache) => cache.locationTtlMs),
    WeatherRepository,
    WeatherRequestValidationService,
    WeatherSummaryService,
    CacheMaintenanceService,
  ],
  exports: [
    WEATHER_CONFIG,
    WEATHER_CACHE,
    FORECAST_CACHE,
    LOCATION_CACHE,
    WeatherSummaryService,
  ],
})
export class WeatherModule {}
