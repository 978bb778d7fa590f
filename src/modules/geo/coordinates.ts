import { invalid, valid, ValidationResult } from './validation-result';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a strictly numeric token. Blank strings, hex literals and
 * `Infinity` are rejected, unlike with `Number()`.
 */
export function parseNumber(raw: string): number | null {
  const trimmed = raw.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Geographic coordinates in decimal degrees.
 * Instances are only created through the validating factories.
 */
export class Coordinates {
  static readonly MIN_LATITUDE = -90;
  static readonly MAX_LATITUDE = 90;
  static readonly MIN_LONGITUDE = -180;
  static readonly MAX_LONGITUDE = 180;

  private constructor(
    readonly latitude: number,
    readonly longitude: number,
  ) {
    Object.freeze(this);
  }

  static of(latitude: number, longitude: number): ValidationResult<Coordinates> {
    if (
      !Number.isFinite(latitude) ||
      latitude < Coordinates.MIN_LATITUDE ||
      latitude > Coordinates.MAX_LATITUDE
    ) {
      return invalid(
        'LATITUDE_OUT_OF_RANGE',
        `Latitude must be between -90 and 90 degrees, got: ${latitude}`,
      );
    }
    if (
      !Number.isFinite(longitude) ||
      longitude < Coordinates.MIN_LONGITUDE ||
      longitude > Coordinates.MAX_LONGITUDE
    ) {
      return invalid(
        'LONGITUDE_OUT_OF_RANGE',
        `Longitude must be between -180 and 180 degrees, got: ${longitude}`,
      );
    }
    return valid(new Coordinates(latitude, longitude));
  }

  /**
   * Parse a single `"lat,lon"` pair.
   */
  static parse(coordinateString: string): ValidationResult<Coordinates> {
    const parts = coordinateString.trim().split(',');
    if (parts.length !== 2) {
      return invalid(
        'INVALID_COORDINATE_FORMAT',
        `Invalid coordinate format: '${coordinateString}'. Expected format: 'lat,lon'`,
      );
    }
    return Coordinates.fromParts(parts[0], parts[1]);
  }

  /**
   * Parse a flat list such as `"lat1,lon1,lat2,lon2"` into pairs.
   */
  static parseMultiple(
    coordinatesString: string,
  ): ValidationResult<Coordinates[]> {
    const parts = coordinatesString
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);

    if (parts.length === 0) {
      return invalid(
        'COORDINATE_PAIRS_REQUIRED',
        'At least one coordinate pair required',
      );
    }
    if (parts.length % 2 !== 0) {
      return invalid(
        'UNPAIRED_COORDINATE',
        'Coordinates must be in pairs (lat,lon)',
      );
    }

    const coordinates: Coordinates[] = [];
    for (let i = 0; i < parts.length; i += 2) {
      const result = Coordinates.fromParts(parts[i], parts[i + 1]);
      if (!result.ok) {
        return result;
      }
      coordinates.push(result.value);
    }
    return valid(coordinates);
  }

  private static fromParts(
    rawLatitude: string,
    rawLongitude: string,
  ): ValidationResult<Coordinates> {
    const latitude = parseNumber(rawLatitude);
    if (latitude === null) {
      return invalid('INVALID_LATITUDE', `Invalid latitude: '${rawLatitude}'`);
    }
    const longitude = parseNumber(rawLongitude);
    if (longitude === null) {
      return invalid(
        'INVALID_LONGITUDE',
        `Invalid longitude: '${rawLongitude}'`,
      );
    }
    return Coordinates.of(latitude, longitude);
  }

  equals(other: Coordinates): boolean {
    return (
      this.latitude === other.latitude && this.longitude === other.longitude
    );
  }

  /**
   * Format as `"lat,lon"`, the form used for location ids and cache keys.
   */
  toString(): string {
    return `${this.latitude},${this.longitude}`;
  }
}
