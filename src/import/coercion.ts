import { Logger } from '@nestjs/common';

const logger = new Logger('FieldCoercion');

const DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isAbsent(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || value === '';
}

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Parses a `YYYY-MM-DD` date into its zero-padded form. Anything that is not
 * a real calendar date yields `null`.
 */
export function toDate(value: unknown): string | null {
  if (isAbsent(value)) {
    return null;
  }
  if (typeof value !== 'string') {
    logger.warn(
      `Unexpected value type for date conversion: ${typeof value}. Skipping.`,
    );
    return null;
  }

  const match = DATE_PATTERN.exec(value);
  if (match) {
    const [year, month, day] = match.slice(1).map(Number);
    const parsed = new Date(Date.UTC(year, month - 1, day));
    if (
      parsed.getUTCFullYear() === year &&
      parsed.getUTCMonth() === month - 1 &&
      parsed.getUTCDate() === day
    ) {
      return `${String(year).padStart(4, '0')}-${pad(month)}-${pad(day)}`;
    }
  }

  logger.warn(`Invalid date format for value: ${value}. Skipping.`);
  return null;
}

/**
 * Numeric quantity with a fallback. Absent and zero values return the
 * fallback quietly; unparseable ones return it with a warning.
 */
export function toDecimal(value: unknown, fallback = 0): number {
  if (isAbsent(value) || value === 0) {
    return fallback;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  logger.warn(
    `Invalid decimal value for ${String(value)}. Using default value ${fallback}.`,
  );
  return fallback;
}

export function toInteger(value: unknown): number | null {
  if (isAbsent(value)) {
    return null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }

  logger.warn(`Invalid integer value for ${String(value)}. Skipping.`);
  return null;
}

/** Clock values travel as integers (`HHMM` or minutes, as the producer wrote them). */
export function toTimeOfDay(value: unknown): number | null {
  return toInteger(value);
}
