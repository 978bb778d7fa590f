import { Inject, Injectable, Logger } from '@nestjs/common';
import { Coordinates } from '../geo/coordinates';
import { Temperature, TemperatureUnit } from '../geo/temperature';
import { TimezoneApproximator } from '../geo/timezone-approximator';
import { UPSTREAM_RATE_LIMITER } from '../rate-limit/rate-limit.interface';
import { TokenBucket } from '../rate-limit/token-bucket';
import { Clock, CLOCK } from '../utils/clock';
import {
  DomainError,
  RateLimitExceededError,
  ServiceUnavailableError,
  ValidationError,
} from '../utils/domain.errors';
import { ValidationResult } from '../geo/validation-result';
import {
  DailyForecast,
  LocationSummary,
  LocationWeatherDetails,
  WeatherForecast,
} from './weather.dto';
import { WeatherRepository } from './weather.repository';
import { WeatherRequestValidationService } from './weather-request-validation.service';
import { WEATHER_CONFIG, WeatherConfig } from './weather.config';

/**
 * Progress of one location through a summary request.
 */
type LocationState =
  | 'PENDING'
  | 'LOCATION_RESOLVED'
  | 'FORECAST_RESOLVED'
  | 'INCLUDED'
  | 'EXCLUDED'
  | 'FAILED';

const UPSTREAM_LIMIT_MESSAGE = 'Rate limit exceeded. Please try again later.';

@Injectable()
export class WeatherSummaryService {
  private readonly logger = new Logger(WeatherSummaryService.name);
  private readonly forecastDays: number;

  constructor(
    private readonly repository: WeatherRepository,
    private readonly validationService: WeatherRequestValidationService,
    @Inject(UPSTREAM_RATE_LIMITER) private readonly upstreamLimiter: TokenBucket,
    @Inject(WEATHER_CONFIG) config: WeatherConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.forecastDays = config.defaultForecastDays;
  }

  /**
   * Validate raw query values, then summarize the favorites.
   */
  async summaryForFavorites(
    locations?: string,
    temperature?: string,
    unit?: string,
  ): Promise<LocationSummary[]> {
    const request = unwrap(
      this.validationService.validateWeatherSummaryRequest(locations, temperature, unit),
    );
    return this.getWeatherSummaryForFavorites(request.coordinates, request.threshold);
  }

  /**
   * Locations whose maximum temperature tomorrow is strictly above
   * `threshold`, in input order. Locations that fail are logged and left out;
   * running out of upstream quota aborts the whole batch.
   */
  async getWeatherSummaryForFavorites(
    coordinates: Coordinates[],
    threshold: Temperature,
    unit: TemperatureUnit = threshold.unit,
  ): Promise<LocationSummary[]> {
    this.logger.log(
      `Getting weather summary for ${coordinates.length} locations with temp > ${threshold.format()}`,
    );

    const summaries: LocationSummary[] = [];

    for (const location of coordinates) {
      this.consumeUpstreamToken();

      try {
        const summary = await this.summarizeLocation(location, threshold, unit);
        if (summary) {
          summaries.push(summary);
        }
      } catch (error) {
        this.transition(location, 'FAILED', errorMessage(error));
      }
    }

    return summaries;
  }

  async locationDetails(location?: string): Promise<LocationWeatherDetails | null> {
    const coordinates = unwrap(this.validationService.validateLocationWeatherRequest(location));
    return this.getLocationWeatherDetails(coordinates);
  }

  /**
   * Location and multi-day forecast, or `null` when the location is unknown.
   */
  async getLocationWeatherDetails(
    coordinates: Coordinates,
  ): Promise<LocationWeatherDetails | null> {
    this.logger.log(`Getting weather details for location: ${coordinates}`);
    this.consumeUpstreamToken();

    try {
      const location = await this.repository.getLocationById(coordinates.toString());
      if (!location) {
        return null;
      }
      const forecast = await this.repository.getForecast(location, this.forecastDays);
      if (!forecast) {
        return null;
      }
      return { location, forecast };
    } catch (error) {
      this.logger.error(
        `Error getting weather details for location ${coordinates}: ${errorMessage(error)}`,
      );
      if (error instanceof DomainError) {
        throw error;
      }
      throw new ServiceUnavailableError(
        'Unable to fetch weather data. Please try again later.',
        { cause: error },
      );
    }
  }

  getRemainingRequests(): number {
    return this.upstreamLimiter.remaining();
  }

  private async summarizeLocation(
    coordinates: Coordinates,
    threshold: Temperature,
    unit: TemperatureUnit,
  ): Promise<LocationSummary | null> {
    this.transition(coordinates, 'PENDING');

    const location = await this.repository.getLocationById(coordinates.toString());
    if (!location) {
      this.transition(coordinates, 'FAILED', 'location not found');
      return null;
    }
    this.transition(coordinates, 'LOCATION_RESOLVED');

    const forecast = await this.repository.getForecast(location, this.forecastDays);
    if (!forecast) {
      this.transition(coordinates, 'FAILED', 'no forecast available');
      return null;
    }
    this.transition(coordinates, 'FORECAST_RESOLVED');

    const tomorrow = this.pickTomorrow(coordinates, forecast);
    if (!tomorrow) {
      this.transition(coordinates, 'FAILED', 'no forecast available');
      return null;
    }

    const maxTemperature = Temperature.celsius(tomorrow.temperatureMax);
    if (!maxTemperature.ok) {
      this.transition(coordinates, 'FAILED', maxTemperature.failure.message);
      return null;
    }

    if (!maxTemperature.value.isAbove(threshold)) {
      this.transition(coordinates, 'EXCLUDED', `${maxTemperature.value.format()} on ${tomorrow.date}`);
      return null;
    }

    this.transition(coordinates, 'INCLUDED', `${maxTemperature.value.format()} on ${tomorrow.date}`);
    return {
      locationId: coordinates.toString(),
      locationName: location.name,
      country: location.country,
      tomorrowMaxTemperature: maxTemperature.value.toUnit(unit),
      temperatureUnit: unit,
      weatherDescription: tomorrow.description,
    };
  }

  /**
   * The forecast for the local calendar day after today. When no entry has
   * that date, the second entry is used, or the first if there is only one.
   */
  private pickTomorrow(
    coordinates: Coordinates,
    forecast: WeatherForecast,
  ): DailyForecast | undefined {
    const tomorrow = TimezoneApproximator.tomorrow(coordinates, new Date(this.clock()));
    const match = forecast.forecasts.find((day) => day.date === tomorrow);
    if (match) {
      return match;
    }

    const fallback = forecast.forecasts[1] ?? forecast.forecasts[0];
    if (fallback) {
      this.logger.warn(
        `No forecast dated ${tomorrow} for ${coordinates}; using ${fallback.date} instead`,
      );
    }
    return fallback;
  }

  private consumeUpstreamToken(): void {
    if (!this.upstreamLimiter.tryConsume()) {
      this.logger.warn('Upstream rate limit exhausted');
      throw new RateLimitExceededError(
        UPSTREAM_LIMIT_MESSAGE,
        'upstream',
        this.upstreamLimiter.timeUntilNextToken(),
      );
    }
  }

  private transition(coordinates: Coordinates, state: LocationState, detail?: string): void {
    const message = `${coordinates} -> ${state}${detail ? ` (${detail})` : ''}`;
    if (state === 'FAILED') {
      this.logger.warn(message);
    } else {
      this.logger.debug(message);
    }
  }
}

function unwrap<T>(result: ValidationResult<T>): T {
  if (!result.ok) {
    throw new ValidationError(result.failure.reason, result.failure.message);
  }
  return result.value;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
