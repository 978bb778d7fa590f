import { DailyForecast, Location, LocationSummary } from './weather.dto';

export interface ResponseMetadata {
  timestamp: string;
  source: string;
  /** upstream requests left in the current window */
  rateLimitRemaining: number;
}

export interface WeatherSummaryResponse {
  locations: LocationSummary[];
  metadata: ResponseMetadata;
}

export interface LocationWeatherResponse {
  location: Location;
  forecast: DailyForecast[];
  metadata: ResponseMetadata;
}
