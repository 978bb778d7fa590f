import { ConfigService } from '@nestjs/config';

/**
 * Read a numeric setting. Environment values arrive as strings, so they are
 * parsed here; a missing or non-numeric value falls back to the default.
 */
export function getNumber(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  return getOptionalNumber(configService, key) ?? defaultValue;
}

export function getOptionalNumber(
  configService: ConfigService,
  key: string,
): number | undefined {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return undefined;
  }
  const value = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export const MINUTE_MS = 60 * 1000;
