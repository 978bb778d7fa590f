import { Location, WeatherData, WeatherForecast } from './weather.dto';

export const WEATHER_PROVIDER = Symbol('WEATHER_PROVIDER');

export type WeatherProviderErrorKind =
  | 'NETWORK_ERROR'
  | 'RATE_LIMIT_EXCEEDED'
  | 'INVALID_API_KEY'
  | 'LOCATION_NOT_FOUND'
  | 'UNKNOWN_ERROR';

export interface WeatherProviderError {
  kind: WeatherProviderErrorKind;
  message: string;
}

/**
 * Outcome of an upstream call. Expected failures are values, not exceptions.
 */
export type WeatherResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: WeatherProviderError };

export function success<T>(data: T): WeatherResult<T> {
  return { ok: true, data };
}

export function failure<T>(
  kind: WeatherProviderErrorKind,
  message: string,
): WeatherResult<T> {
  return { ok: false, error: { kind, message } };
}

export interface WeatherProvider {
  getCurrentWeather(latitude: number, longitude: number): Promise<WeatherResult<WeatherData>>;
  getForecast(
    latitude: number,
    longitude: number,
    days: number,
  ): Promise<WeatherResult<WeatherForecast>>;
  getLocationDetails(latitude: number, longitude: number): Promise<WeatherResult<Location>>;
  getProviderName(): string;
}
