import { Controller, Get, Param, Query, UseGuards } from '@nestjs/common';
import { RateLimitGuard } from '../rate-limit/rate-limit.guard';
import { API_SOURCE } from '../utils/api-exception.filter';
import { NotFoundError } from '../utils/domain.errors';
import { WeatherSummaryQueryDto } from './weather-query.dto';
import {
  LocationWeatherResponse,
  ResponseMetadata,
  WeatherSummaryResponse,
} from './weather-response.dto';
import { WeatherSummaryService } from './weather-summary.service';

@Controller('api/v1/weather')
@UseGuards(RateLimitGuard)
export class WeatherController {
  constructor(private readonly summaryService: WeatherSummaryService) {}

  /**
   * Favorite locations whose maximum temperature tomorrow is above a threshold:
   * /api/v1/weather/summary?locations=lat,lon,...&temperature=20&unit=celsius
   */
  @Get('summary')
  async getSummary(
    @Query() query: WeatherSummaryQueryDto,
  ): Promise<WeatherSummaryResponse> {
    const locations = await this.summaryService.summaryForFavorites(
      query.locations,
      query.temperature,
      query.unit,
    );
    return { locations, metadata: this.metadata() };
  }

  /**
   * Location details and daily forecast: /api/v1/weather/locations/51.5074,-0.1278
   */
  @Get('locations/:locationId')
  async getLocation(
    @Param('locationId') locationId: string,
  ): Promise<LocationWeatherResponse> {
    const details = await this.summaryService.locationDetails(locationId);
    if (!details) {
      throw new NotFoundError(`Location not found: ${locationId}`);
    }
    return {
      location: details.location,
      forecast: details.forecast.forecasts,
      metadata: this.metadata(),
    };
  }

  private metadata(): ResponseMetadata {
    return {
      timestamp: new Date().toISOString(),
      source: API_SOURCE,
      rateLimitRemaining: this.summaryService.getRemainingRequests(),
    };
  }
}
