import { TemperatureUnit } from '../geo/temperature';

export interface Location {
  /** `"lat,lon"` of the coordinates the location was looked up with */
  id: string;
  name: string;
  country: string;
  latitude: number;
  longitude: number;
}

/**
 * Current conditions. Temperatures are degrees Celsius.
 */
export interface WeatherData {
  location: Location;
  timestamp: string;
  temperature: number;
  description: string;
  humidity: number;
  windSpeed: number;
  pressure: number;
}

export interface DailyForecast {
  /** YYYY-MM-DD, UTC */
  date: string;
  temperatureMin: number;
  temperatureMax: number;
  description: string;
  humidity: number;
  windSpeed: number;
  pressure: number;
}

export interface WeatherForecast {
  location: Location;
  /** ascending by date */
  forecasts: DailyForecast[];
}

export interface LocationSummary {
  locationId: string;
  locationName: string;
  country: string;
  tomorrowMaxTemperature: number;
  temperatureUnit: TemperatureUnit;
  weatherDescription: string;
}

export interface LocationWeatherDetails {
  location: Location;
  forecast: WeatherForecast;
}

export const UNKNOWN_COUNTRY = 'Unknown';

/**
 * Build a location keyed by its coordinates. Blank names fall back to the id.
 */
export function locationFromCoordinates(
  coordinates: { latitude: number; longitude: number },
  name?: string,
  country?: string,
): Location {
  const id = `${coordinates.latitude},${coordinates.longitude}`;
  return {
    id,
    name: name?.trim() || id,
    country: country?.trim() || UNKNOWN_COUNTRY,
    latitude: coordinates.latitude,
    longitude: coordinates.longitude,
  };
}
