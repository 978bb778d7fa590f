import { Inject, Injectable } from '@nestjs/common';
import { Coordinates } from '../geo/coordinates';
import { parseTemperatureUnit, Temperature } from '../geo/temperature';
import { invalid, valid, ValidationResult } from '../geo/validation-result';
import { WEATHER_CONFIG, WeatherConfig } from './weather.config';

export interface WeatherSummaryRequest {
  coordinates: Coordinates[];
  threshold: Temperature;
}

/**
 * Checks raw query values and turns them into value objects. Failures come
 * back as results; nothing here throws.
 */
@Injectable()
export class WeatherRequestValidationService {
  private readonly maxLocations: number;
  private readonly ceilingCelsius?: number;

  constructor(@Inject(WEATHER_CONFIG) config: WeatherConfig) {
    this.maxLocations = config.maxLocationsPerRequest;
    this.ceilingCelsius = config.temperatureCeilingCelsius;
  }

  validateWeatherSummaryRequest(
    locations?: string | null,
    temperature?: string | null,
    unit?: string | null,
  ): ValidationResult<WeatherSummaryRequest> {
    const locationsParam = locations?.trim();
    if (!locationsParam) {
      return invalid('LOCATIONS_REQUIRED', 'Locations parameter is required');
    }
    const temperatureParam = temperature?.trim();
    if (!temperatureParam) {
      return invalid('TEMPERATURE_REQUIRED', 'Temperature parameter is required');
    }

    const coordinates = Coordinates.parseMultiple(locationsParam);
    if (!coordinates.ok) {
      return coordinates;
    }
    if (coordinates.value.length > this.maxLocations) {
      return invalid(
        'TOO_MANY_LOCATIONS',
        `Too many locations requested. Maximum allowed: ${this.maxLocations}, got: ${coordinates.value.length}`,
      );
    }

    const temperatureUnit = parseTemperatureUnit(unit);
    if (!temperatureUnit.ok) {
      return temperatureUnit;
    }

    const threshold = Temperature.parse(temperatureParam, temperatureUnit.value, {
      ceilingCelsius: this.ceilingCelsius,
    });
    if (!threshold.ok) {
      return threshold;
    }

    return valid({ coordinates: coordinates.value, threshold: threshold.value });
  }

  validateLocationWeatherRequest(location?: string | null): ValidationResult<Coordinates> {
    const locationParam = location?.trim();
    if (!locationParam) {
      return invalid('LOCATION_REQUIRED', 'Location parameter is required');
    }
    return Coordinates.parse(locationParam);
  }
}
