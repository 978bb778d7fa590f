import { parseNumber } from './coordinates';
import { invalid, valid, ValidationResult } from './validation-result';

export enum TemperatureUnit {
  CELSIUS = 'celsius',
  FAHRENHEIT = 'fahrenheit',
}

const UNIT_SYMBOLS: Record<TemperatureUnit, string> = {
  [TemperatureUnit.CELSIUS]: 'C',
  [TemperatureUnit.FAHRENHEIT]: 'F',
};

export const ABSOLUTE_ZERO_CELSIUS = -273.15;

export interface TemperatureBounds {
  /** Upper bound in degrees Celsius. No ceiling when omitted. */
  ceilingCelsius?: number;
}

/**
 * Parse a unit name. Blank or missing input means Celsius.
 */
export function parseTemperatureUnit(
  unit?: string | null,
): ValidationResult<TemperatureUnit> {
  switch ((unit ?? '').trim().toLowerCase()) {
    case '':
    case 'c':
    case 'celsius':
      return valid(TemperatureUnit.CELSIUS);
    case 'f':
    case 'fahrenheit':
      return valid(TemperatureUnit.FAHRENHEIT);
    default:
      return invalid(
        'INVALID_TEMPERATURE_UNIT',
        `Invalid temperature unit: '${unit}'. Supported: celsius, fahrenheit`,
      );
  }
}

function fahrenheitToCelsius(value: number): number {
  return ((value - 32) * 5) / 9;
}

function celsiusToFahrenheit(value: number): number {
  return (value * 9) / 5 + 32;
}

export class Temperature {
  private constructor(
    readonly value: number,
    readonly unit: TemperatureUnit,
  ) {
    Object.freeze(this);
  }

  static of(
    value: number,
    unit: TemperatureUnit,
    bounds: TemperatureBounds = {},
  ): ValidationResult<Temperature> {
    if (!Number.isFinite(value)) {
      return invalid('INVALID_TEMPERATURE', `Invalid temperature value: ${value}`);
    }

    const celsius =
      unit === TemperatureUnit.CELSIUS ? value : fahrenheitToCelsius(value);
    const symbol = UNIT_SYMBOLS[unit];

    if (celsius < ABSOLUTE_ZERO_CELSIUS) {
      return invalid(
        'BELOW_ABSOLUTE_ZERO',
        `Temperature cannot be below absolute zero (-273.15°C), got: ${value}°${symbol}`,
      );
    }
    if (bounds.ceilingCelsius !== undefined && celsius > bounds.ceilingCelsius) {
      return invalid(
        'ABOVE_TEMPERATURE_CEILING',
        `Temperature seems unreasonably high (>${bounds.ceilingCelsius}°C), got: ${value}°${symbol}`,
      );
    }
    return valid(new Temperature(value, unit));
  }

  static celsius(value: number): ValidationResult<Temperature> {
    return Temperature.of(value, TemperatureUnit.CELSIUS);
  }

  static fahrenheit(value: number): ValidationResult<Temperature> {
    return Temperature.of(value, TemperatureUnit.FAHRENHEIT);
  }

  static parse(
    temperatureString: string,
    unit: TemperatureUnit,
    bounds: TemperatureBounds = {},
  ): ValidationResult<Temperature> {
    const value = parseNumber(temperatureString);
    if (value === null) {
      return invalid(
        'INVALID_TEMPERATURE',
        `Invalid temperature value: '${temperatureString}'`,
      );
    }
    return Temperature.of(value, unit, bounds);
  }

  toCelsius(): number {
    return this.unit === TemperatureUnit.CELSIUS
      ? this.value
      : fahrenheitToCelsius(this.value);
  }

  toFahrenheit(): number {
    return this.unit === TemperatureUnit.FAHRENHEIT
      ? this.value
      : celsiusToFahrenheit(this.value);
  }

  toUnit(target: TemperatureUnit): number {
    return target === TemperatureUnit.CELSIUS
      ? this.toCelsius()
      : this.toFahrenheit();
  }

  /**
   * Strict comparison, done in Celsius so mixed units compare correctly.
   */
  isAbove(threshold: Temperature): boolean {
    return this.toCelsius() > threshold.toCelsius();
  }

  format(): string {
    return `${this.value}°${UNIT_SYMBOLS[this.unit]}`;
  }
}
