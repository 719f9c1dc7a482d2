import { TimestampInput } from '../interfaces/session.interface';

// Epoch values below this are seconds (1e11 s is year 5138; 1e11 ms is 1973)
const EPOCH_SECONDS_CEILING = 1e11;

/**
 * Convert any stored timestamp representation to a Date. Applied once where
 * legacy records enter the store; everything past that point compares Dates.
 *
 * Unparseable input yields `fallback`.
 */
export function normalizeTimestamp(value: TimestampInput | undefined, fallback: Date): Date {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? fallback : new Date(value.getTime());
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return fallback;
    const ms = Math.abs(value) < EPOCH_SECONDS_CEILING ? value * 1000 : value;
    return new Date(ms);
  }

  if (typeof value === 'string' && value.trim() !== '') {
    const numeric = Number(value);
    if (Number.isFinite(numeric)) {
      return normalizeTimestamp(numeric, fallback);
    }
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? fallback : new Date(parsed);
  }

  return fallback;
}
