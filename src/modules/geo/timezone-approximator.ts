import { Coordinates } from './coordinates';

const MIN_OFFSET_HOURS = -12;
const MAX_OFFSET_HOURS = 14;
const DEGREES_PER_HOUR = 15;
const HOUR_MS = 60 * 60 * 1000;

/**
 * Approximates local calendar dates from longitude alone: one hour of
 * offset per 15 degrees. Political timezone boundaries and daylight saving
 * are ignored, and no date-line correction is made near ±180°.
 */
export class TimezoneApproximator {
  static offsetHours(longitude: number): number {
    const offset = Math.round(longitude / DEGREES_PER_HOUR);
    // Math.round(-0.4) is -0
    return Math.min(MAX_OFFSET_HOURS, Math.max(MIN_OFFSET_HOURS, offset)) || 0;
  }

  /**
   * Local date (YYYY-MM-DD) at the given coordinates.
   */
  static today(coordinates: Coordinates, nowUtc: Date = new Date()): string {
    const offsetMs = TimezoneApproximator.offsetHours(coordinates.longitude) * HOUR_MS;
    return toIsoDate(new Date(nowUtc.getTime() + offsetMs));
  }

  static tomorrow(coordinates: Coordinates, nowUtc: Date = new Date()): string {
    const [year, month, day] = TimezoneApproximator.today(coordinates, nowUtc)
      .split('-')
      .map(Number);
    return toIsoDate(new Date(Date.UTC(year, month - 1, day + 1)));
  }

  static isTomorrow(
    coordinates: Coordinates,
    date: string,
    nowUtc: Date = new Date(),
  ): boolean {
    return date === TimezoneApproximator.tomorrow(coordinates, nowUtc);
  }
}

function toIsoDate(date: Date): string {
  return date.toISOString().split('T')[0];
}
