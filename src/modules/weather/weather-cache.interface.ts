import { CacheProvider } from '../utils/cache.interface';
import { Location, WeatherData, WeatherForecast } from './weather.dto';

export const WEATHER_CACHE = Symbol('WEATHER_CACHE');
export const FORECAST_CACHE = Symbol('FORECAST_CACHE');
export const LOCATION_CACHE = Symbol('LOCATION_CACHE');

export type WeatherCache = CacheProvider<WeatherData>;
export type ForecastCache = CacheProvider<WeatherForecast>;
export type LocationCache = CacheProvider<Location>;

export function weatherCacheKey(locationId: string): string {
  return `weather_${locationId}`;
}

export function forecastCacheKey(locationId: string, days: number): string {
  return `forecast_${locationId}_${days}d`;
}

export function locationCacheKey(locationId: string): string {
  return `location_${locationId}`;
}
