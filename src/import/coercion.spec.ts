import { Logger } from '@nestjs/common';
import { toDate, toDecimal, toInteger, toTimeOfDay } from './coercion';

describe('field coercion', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  describe('toDate', () => {
    it('parses ISO dates', () => {
      expect(toDate('2024-03-09')).toBe('2024-03-09');
      expect(warn).not.toHaveBeenCalled();
    });

    it('pads single-digit month and day', () => {
      expect(toDate('2024-3-9')).toBe('2024-03-09');
    });

    it('returns null quietly for empty input', () => {
      expect(toDate('')).toBeNull();
      expect(toDate(null)).toBeNull();
      expect(toDate(undefined)).toBeNull();
      expect(warn).not.toHaveBeenCalled();
    });

    it('returns null with a warning for malformed strings', () => {
      expect(toDate('13/32/2024')).toBeNull();
      expect(warn).toHaveBeenCalledWith(
        'Invalid date format for value: 13/32/2024. Skipping.',
      );
    });

    it('rejects dates that do not exist', () => {
      expect(toDate('2023-02-29')).toBeNull();
      expect(toDate('2024-13-01')).toBeNull();
      expect(toDate('2024-02-29')).toBe('2024-02-29');
    });

    it('warns about non-string input', () => {
      expect(toDate(20240309)).toBeNull();
      expect(warn).toHaveBeenCalledWith(
        'Unexpected value type for date conversion: number. Skipping.',
      );
    });
  });

  describe('toDecimal', () => {
    it('keeps numbers and parses numeric strings', () => {
      expect(toDecimal(1.25)).toBe(1.25);
      expect(toDecimal('90')).toBe(90);
      expect(toDecimal(' 2.5 ')).toBe(2.5);
    });

    it('falls back with a warning on garbage', () => {
      expect(toDecimal('abc', 0)).toBe(0);
      expect(warn).toHaveBeenCalledWith(
        'Invalid decimal value for abc. Using default value 0.',
      );
    });

    it('falls back quietly when absent', () => {
      expect(toDecimal(undefined)).toBe(0);
      expect(toDecimal('', 7)).toBe(7);
      expect(toDecimal(null, 3)).toBe(3);
      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe('toInteger', () => {
    it('parses integer strings and truncates numbers', () => {
      expect(toInteger('42')).toBe(42);
      expect(toInteger(-3)).toBe(-3);
      expect(toInteger(4.9)).toBe(4);
      expect(toInteger(0)).toBe(0);
    });

    it('returns null for empty input without warning', () => {
      expect(toInteger('')).toBeNull();
      expect(warn).not.toHaveBeenCalled();
    });

    it('returns null with a warning for non-integers', () => {
      expect(toInteger('1.5')).toBeNull();
      expect(toInteger('two')).toBeNull();
      expect(warn).toHaveBeenCalledTimes(2);
    });
  });

  describe('toTimeOfDay', () => {
    it('reads clock strings as integers', () => {
      expect(toTimeOfDay('0930')).toBe(930);
      expect(toTimeOfDay('')).toBeNull();
      expect(toTimeOfDay('09:30')).toBeNull();
    });
  });
});
