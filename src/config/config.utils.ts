import { ConfigService } from '@nestjs/config';

/**
 * Parse a config value that may arrive as a boolean (validated config)
 * or as a raw environment string.
 */
export const parseBoolean = (value: unknown, defaultValue: boolean): boolean => {
  if (value === undefined || value === null || value === '') return defaultValue;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.toLowerCase() === 'true';
  return defaultValue;
};

export const parseNumber = (value: unknown, defaultValue: number): number => {
  if (value === undefined || value === null || value === '') return defaultValue;
  if (typeof value === 'number') return Number.isFinite(value) ? value : defaultValue;
  if (typeof value === 'string') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : defaultValue;
  }
  return defaultValue;
};

export const parseString = (
  value: unknown,
  defaultValue?: string,
): string | undefined => {
  if (typeof value === 'string' && value.trim() !== '') return value;
  return defaultValue;
};

/**
 * Typed readers over an optional ConfigService. Services are constructed
 * without one in unit tests, in which case every key falls back.
 */
export const readNumber = (
  configService: ConfigService | undefined,
  key: string,
  defaultValue: number,
): number => parseNumber(configService?.get<unknown>(key), defaultValue);

export const readBoolean = (
  configService: ConfigService | undefined,
  key: string,
  defaultValue: boolean,
): boolean => parseBoolean(configService?.get<unknown>(key), defaultValue);

export const readString = (
  configService: ConfigService | undefined,
  key: string,
  defaultValue?: string,
): string | undefined => parseString(configService?.get<unknown>(key), defaultValue);
