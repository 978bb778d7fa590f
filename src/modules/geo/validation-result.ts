/**
 * Machine-readable reasons a request value can be rejected.
 */
export type ValidationReason =
  | 'LOCATIONS_REQUIRED'
  | 'LOCATION_REQUIRED'
  | 'TEMPERATURE_REQUIRED'
  | 'INVALID_COORDINATE_FORMAT'
  | 'INVALID_LATITUDE'
  | 'INVALID_LONGITUDE'
  | 'LATITUDE_OUT_OF_RANGE'
  | 'LONGITUDE_OUT_OF_RANGE'
  | 'COORDINATE_PAIRS_REQUIRED'
  | 'UNPAIRED_COORDINATE'
  | 'TOO_MANY_LOCATIONS'
  | 'INVALID_TEMPERATURE'
  | 'BELOW_ABSOLUTE_ZERO'
  | 'ABOVE_TEMPERATURE_CEILING'
  | 'INVALID_TEMPERATURE_UNIT'
  | 'INVALID_QUERY';

export interface ValidationFailure {
  reason: ValidationReason;
  message: string;
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ValidationFailure };

export function valid<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

export function invalid<T>(
  reason: ValidationReason,
  message: string,
): ValidationResult<T> {
  return { ok: false, failure: { reason, message } };
}
