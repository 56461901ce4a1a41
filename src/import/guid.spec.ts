import { guidFromNumber, isCanonicalGuid, NIL_GUID, normalizeGuid } from './guid';

describe('guid', () => {
  it('accepts the canonical 36-character form', () => {
    expect(isCanonicalGuid('11111111-1111-1111-1111-111111111111')).toBe(true);
    expect(isCanonicalGuid('A1B2C3D4-E5F6-4A7B-8C9D-0E1F2A3B4C5D')).toBe(true);
    expect(isCanonicalGuid(NIL_GUID)).toBe(true);
  });

  it('does not require RFC version or variant bits', () => {
    expect(isCanonicalGuid('a1b2c3d4-e5f6-0a7b-0c9d-0e1f2a3b4c5d')).toBe(true);
    expect(isCanonicalGuid('00000000-0000-0000-0000-000000000007')).toBe(true);
    expect(isCanonicalGuid('22222222-2222-2222-2222-222222222222')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isCanonicalGuid('not-a-valid-id')).toBe(false);
    expect(isCanonicalGuid('11111111111111111111111111111111')).toBe(false);
    expect(isCanonicalGuid('zzzzzzzz-1111-1111-1111-111111111111')).toBe(false);
    expect(isCanonicalGuid(42)).toBe(false);
    expect(isCanonicalGuid(undefined)).toBe(false);
  });

  it('normalizes to lower case', () => {
    expect(normalizeGuid('ABCDEF01-2345-6789-ABCD-EF0123456789')).toBe(
      'abcdef01-2345-6789-abcd-ef0123456789',
    );
  });

  it('derives a guid from a numeric string', () => {
    expect(guidFromNumber('7')).toBe('00000000-0000-0000-0000-000000000007');
    expect(guidFromNumber('4096')).toBe('00000000-0000-0000-0000-000000001000');
    expect(guidFromNumber('7')).toBe(guidFromNumber('7'));
  });

  it('refuses non-numeric and oversized values', () => {
    expect(guidFromNumber('12a')).toBeNull();
    expect(guidFromNumber('')).toBeNull();
    expect(guidFromNumber((1n << 128n).toString())).toBeNull();
  });
});
