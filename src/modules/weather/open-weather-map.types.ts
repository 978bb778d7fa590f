/**
 * Subsets of the OpenWeatherMap payloads that the provider reads.
 */

export interface OwmCoord {
  lat: number;
  lon: number;
}

export interface OwmWeatherCondition {
  id: number;
  main: string;
  description: string;
}

export interface OwmMain {
  temp: number;
  temp_min: number;
  temp_max: number;
  pressure: number;
  humidity: number;
}

export interface OwmWind {
  speed: number;
  deg?: number;
}

export interface OwmCurrentResponse {
  coord: OwmCoord;
  weather: OwmWeatherCondition[];
  main: OwmMain;
  wind: OwmWind;
  dt: number;
  name: string;
  sys: { country?: string };
}

export interface OwmForecastItem {
  dt: number;
  main: OwmMain;
  weather: OwmWeatherCondition[];
  wind: OwmWind;
}

export interface OwmForecastResponse {
  list: OwmForecastItem[];
  city: {
    name: string;
    country: string;
    coord: OwmCoord;
  };
}

export interface OwmGeocodingEntry {
  name: string;
  lat: number;
  lon: number;
  country: string;
  state?: string;
}
