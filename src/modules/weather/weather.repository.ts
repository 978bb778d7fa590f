import { Inject, Injectable, Logger } from '@nestjs/common';
import { Coordinates } from '../geo/coordinates';
import { ServiceUnavailableError } from '../utils/domain.errors';
import { Location, WeatherData, WeatherForecast } from './weather.dto';
import {
  FORECAST_CACHE,
  ForecastCache,
  forecastCacheKey,
  LOCATION_CACHE,
  LocationCache,
  locationCacheKey,
  WEATHER_CACHE,
  WeatherCache,
  weatherCacheKey,
} from './weather-cache.interface';
import {
  WEATHER_PROVIDER,
  WeatherProvider,
  WeatherResult,
} from './weather-provider.interface';

/**
 * Cache-aside access to weather data. Only successful lookups are cached;
 * an unknown location reads as `null` and every other upstream failure is a
 * {@link ServiceUnavailableError}.
 */
@Injectable()
export class WeatherRepository {
  private readonly logger = new Logger(WeatherRepository.name);

  constructor(
    @Inject(WEATHER_PROVIDER) private readonly provider: WeatherProvider,
    @Inject(WEATHER_CACHE) private readonly weatherCache: WeatherCache,
    @Inject(FORECAST_CACHE) private readonly forecastCache: ForecastCache,
    @Inject(LOCATION_CACHE) private readonly locationCache: LocationCache,
  ) {}

  getCurrentWeather(location: Location): Promise<WeatherData | null> {
    return this.weatherCache.getOrLoad(weatherCacheKey(location.id), () =>
      this.load('current weather', location.id, () =>
        this.provider.getCurrentWeather(location.latitude, location.longitude),
      ),
    );
  }

  getForecast(location: Location, days: number): Promise<WeatherForecast | null> {
    return this.forecastCache.getOrLoad(
      forecastCacheKey(location.id, days),
      async () => {
        const forecast = await this.load('forecast', location.id, () =>
          this.provider.getForecast(location.latitude, location.longitude, days),
        );
        if (forecast && forecast.forecasts.length === 0) {
          this.logger.warn(`Provider returned an empty forecast for ${location.id}`);
          return null;
        }
        return forecast;
      },
    );
  }

  async getLocationById(locationId: string): Promise<Location | null> {
    const parsed = Coordinates.parse(locationId);
    if (!parsed.ok) {
      this.logger.warn(
        `Invalid location id '${locationId}': ${parsed.failure.message}`,
      );
      return null;
    }

    const { latitude, longitude } = parsed.value;
    return this.locationCache.getOrLoad(locationCacheKey(locationId), () =>
      this.load('location', locationId, () =>
        this.provider.getLocationDetails(latitude, longitude),
      ),
    );
  }

  /**
   * Resolve each id independently. Ids that fail or are unknown are skipped.
   */
  async getLocationsByIds(locationIds: string[]): Promise<Location[]> {
    const locations: Location[] = [];

    for (const locationId of locationIds) {
      try {
        const location = await this.getLocationById(locationId);
        if (location) {
          locations.push(location);
        }
      } catch (error) {
        this.logger.warn(
          `Skipping location ${locationId}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    return locations;
  }

  private async load<T>(
    what: string,
    locationId: string,
    fetch: () => Promise<WeatherResult<T>>,
  ): Promise<T | null> {
    let result: WeatherResult<T>;
    try {
      result = await fetch();
    } catch (error) {
      this.logger.error(
        `Unexpected error loading ${what} for ${locationId}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new ServiceUnavailableError(
        'Weather service temporarily unavailable',
        { cause: error },
      );
    }

    if (result.ok) {
      this.logger.debug(`Loaded ${what} for ${locationId} from ${this.provider.getProviderName()}`);
      return result.data;
    }

    if (result.error.kind === 'LOCATION_NOT_FOUND') {
      this.logger.debug(`No ${what} found for ${locationId}`);
      return null;
    }

    this.logger.warn(
      `Failed to load ${what} for ${locationId}: ${result.error.kind} ${result.error.message}`,
    );
    throw new ServiceUnavailableError(
      `Weather service unavailable: ${result.error.message}`,
    );
  }
}
