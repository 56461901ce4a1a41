import { matches } from 'class-validator';

export const NIL_GUID = '00000000-0000-0000-0000-000000000000';

/** 8-4-4-4-12 hex digits; version and variant bits are not checked. */
export const CANONICAL_GUID =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const MAX_GUID = (1n << 128n) - 1n;

export function isCanonicalGuid(value: unknown): value is string {
  return typeof value === 'string' && matches(value, CANONICAL_GUID);
}

export function normalizeGuid(value: string): string {
  return value.toLowerCase();
}

/**
 * Some producers write a bare number where a guid belongs. Offsets the nil
 * guid by that number so the same input always maps to the same key.
 */
export function guidFromNumber(value: string): string | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const n = BigInt(value);
  if (n > MAX_GUID) {
    return null;
  }

  const hex = n.toString(16).padStart(32, '0');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join('-');
}
