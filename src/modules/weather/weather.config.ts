import { ConfigService } from '@nestjs/config';
import { getNumber, getOptionalNumber, MINUTE_MS } from '../utils/config.helpers';

export const WEATHER_CONFIG = Symbol('WEATHER_CONFIG');

export interface OpenWeatherMapConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface WeatherCacheSettings {
  weatherTtlMs: number;
  forecastTtlMs: number;
  locationTtlMs: number;
  maxSize: number;
  sweepIntervalMs: number;
}

export interface WeatherConfig {
  openWeatherMap: OpenWeatherMapConfig;
  cache: WeatherCacheSettings;
  defaultForecastDays: number;
  maxLocationsPerRequest: number;
  /** No ceiling when undefined */
  temperatureCeilingCelsius?: number;
}

export function loadWeatherConfig(configService: ConfigService): WeatherConfig {
  return {
    openWeatherMap: {
      apiKey: configService.get<string>('OPENWEATHERMAP_API_KEY', ''),
      baseUrl: configService.get<string>(
        'OPENWEATHERMAP_BASE_URL',
        'https://api.openweathermap.org',
      ),
      timeoutMs: getNumber(configService, 'OPENWEATHERMAP_TIMEOUT_MS', 5000),
    },
    cache: {
      weatherTtlMs: getNumber(configService, 'CACHE_WEATHER_TTL_MINUTES', 15) * MINUTE_MS,
      forecastTtlMs: getNumber(configService, 'CACHE_FORECAST_TTL_MINUTES', 60) * MINUTE_MS,
      locationTtlMs: getNumber(configService, 'CACHE_LOCATION_TTL_MINUTES', 1440) * MINUTE_MS,
      maxSize: getNumber(configService, 'CACHE_MAX_SIZE', 1000),
      sweepIntervalMs: getNumber(configService, 'CACHE_SWEEP_INTERVAL_MS', 5 * MINUTE_MS),
    },
    defaultForecastDays: getNumber(configService, 'DEFAULT_FORECAST_DAYS', 5),
    maxLocationsPerRequest: getNumber(configService, 'MAX_LOCATIONS_PER_REQUEST', 50),
    temperatureCeilingCelsius: getOptionalNumber(
      configService,
      'TEMPERATURE_CEILING_CELSIUS',
    ),
  };
}
