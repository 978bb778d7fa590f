import { Inject, Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import {
  DailyForecast,
  Location,
  locationFromCoordinates,
  WeatherData,
  WeatherForecast,
} from './weather.dto';
import {
  failure,
  success,
  WeatherProvider,
  WeatherProviderErrorKind,
  WeatherResult,
} from './weather-provider.interface';
import { WEATHER_CONFIG, WeatherConfig } from './weather.config';
import {
  OwmCurrentResponse,
  OwmForecastItem,
  OwmForecastResponse,
  OwmGeocodingEntry,
} from './open-weather-map.types';

const SECONDS_PER_DAY = 86400;
const SLOTS_PER_DAY = 8;
const UNKNOWN_DESCRIPTION = 'Unknown';

@Injectable()
export class OpenWeatherMapProvider implements WeatherProvider {
  private readonly logger = new Logger(OpenWeatherMapProvider.name);
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(@Inject(WEATHER_CONFIG) config: WeatherConfig) {
    this.baseUrl = config.openWeatherMap.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.openWeatherMap.apiKey;
    this.timeoutMs = config.openWeatherMap.timeoutMs;

    if (!this.apiKey) {
      this.logger.warn(
        'OPENWEATHERMAP_API_KEY is not set; upstream calls will be rejected',
      );
    }
  }

  getProviderName(): string {
    return 'OpenWeatherMap';
  }

  async getCurrentWeather(
    latitude: number,
    longitude: number,
  ): Promise<WeatherResult<WeatherData>> {
    const result = await this.request<OwmCurrentResponse>(
      '/data/2.5/weather',
      { lat: latitude, lon: longitude, units: 'metric' },
      `current weather for (${latitude}, ${longitude})`,
    );
    if (!result.ok) return result;

    const data = result.data;
    return success({
      location: this.locationFor(latitude, longitude, data.name, data.sys.country),
      timestamp: new Date(data.dt * 1000).toISOString(),
      temperature: data.main.temp,
      description: data.weather[0]?.description ?? UNKNOWN_DESCRIPTION,
      humidity: data.main.humidity,
      windSpeed: data.wind.speed,
      pressure: data.main.pressure,
    });
  }

  async getForecast(
    latitude: number,
    longitude: number,
    days: number,
  ): Promise<WeatherResult<WeatherForecast>> {
    const result = await this.request<OwmForecastResponse>(
      '/data/2.5/forecast',
      { lat: latitude, lon: longitude, cnt: days * SLOTS_PER_DAY, units: 'metric' },
      `${days}-day forecast for (${latitude}, ${longitude})`,
    );
    if (!result.ok) return result;

    const { city, list } = result.data;
    return success({
      location: this.locationFor(latitude, longitude, city.name, city.country),
      forecasts: groupByDay(list),
    });
  }

  async getLocationDetails(
    latitude: number,
    longitude: number,
  ): Promise<WeatherResult<Location>> {
    const result = await this.request<OwmGeocodingEntry[]>(
      '/geo/1.0/reverse',
      { lat: latitude, lon: longitude, limit: 1 },
      `location details for (${latitude}, ${longitude})`,
    );
    if (!result.ok) return result;

    const [place] = result.data;
    if (!place) {
      return failure('LOCATION_NOT_FOUND', 'Location not found');
    }
    return success(this.locationFor(latitude, longitude, place.name, place.country));
  }

  private async request<T>(
    path: string,
    params: Record<string, string | number>,
    description: string,
  ): Promise<WeatherResult<T>> {
    this.logger.debug(`Fetching ${description}`);

    try {
      const response = await axios.get<T>(`${this.baseUrl}${path}`, {
        params: { ...params, appid: this.apiKey },
        timeout: this.timeoutMs,
      });
      return success(response.data);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        const status = error.response.status;
        const kind = statusToErrorKind(status);
        this.logger.warn(`OpenWeatherMap returned HTTP ${status} for ${description}`);
        return failure(kind, ERROR_MESSAGES[kind] ?? `HTTP ${status}`);
      }

      const message = error instanceof Error ? error.message : String(error);
      if (axios.isAxiosError(error) && error.code === 'ECONNABORTED') {
        this.logger.warn(`OpenWeatherMap timeout for ${description}`);
      } else {
        this.logger.error(`Error fetching ${description}: ${message}`);
      }
      return failure('NETWORK_ERROR', message || 'Network error');
    }
  }

  // ids follow the requested coordinates so they match repository cache keys
  private locationFor(
    latitude: number,
    longitude: number,
    name?: string,
    country?: string,
  ): Location {
    return locationFromCoordinates({ latitude, longitude }, name, country);
  }
}

const ERROR_MESSAGES: Partial<Record<WeatherProviderErrorKind, string>> = {
  INVALID_API_KEY: 'Invalid API key',
  LOCATION_NOT_FOUND: 'Location not found',
  RATE_LIMIT_EXCEEDED: 'Rate limit exceeded',
};

function statusToErrorKind(status: number): WeatherProviderErrorKind {
  switch (status) {
    case 401:
      return 'INVALID_API_KEY';
    case 404:
      return 'LOCATION_NOT_FOUND';
    case 429:
      return 'RATE_LIMIT_EXCEEDED';
    default:
      return 'UNKNOWN_ERROR';
  }
}

/**
 * Collapse the 3-hour forecast slots into one entry per UTC day.
 */
export function groupByDay(slots: OwmForecastItem[]): DailyForecast[] {
  const days = new Map<number, OwmForecastItem[]>();
  for (const slot of slots) {
    const day = Math.floor(slot.dt / SECONDS_PER_DAY);
    const bucket = days.get(day);
    if (bucket) {
      bucket.push(slot);
    } else {
      days.set(day, [slot]);
    }
  }

  return [...days.entries()]
    .sort(([a], [b]) => a - b)
    .map(([day, daySlots]) => ({
      date: new Date(day * SECONDS_PER_DAY * 1000).toISOString().split('T')[0],
      temperatureMin: Math.min(...daySlots.map((s) => s.main.temp_min)),
      temperatureMax: Math.max(...daySlots.map((s) => s.main.temp_max)),
      description: mostFrequent(
        daySlots.map((s) => s.weather[0]?.description ?? UNKNOWN_DESCRIPTION),
      ),
      humidity: Math.trunc(average(daySlots.map((s) => s.main.humidity))),
      windSpeed: average(daySlots.map((s) => s.wind.speed)),
      pressure: daySlots[0].main.pressure,
    }));
}

function average(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Ties go to the value seen first. */
function mostFrequent(values: string[]): string {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best = UNKNOWN_DESCRIPTION;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}
