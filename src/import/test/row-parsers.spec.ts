import { parseBooleanToken, parseDecimal, parseInteger, optionalText, requireText } from '../utils/row-parsers';
import { RowValidationError } from '../errors/import.errors';

describe('row parsers', () => {
  describe('requireText / optionalText', () => {
    it('should trim values and reject blanks when required', () => {
      expect(requireText('  Aspen ', 'name')).toBe('Aspen');
      expect(() => requireText('   ', 'name')).toThrow('Missing name');
      expect(optionalText('  ', 'address')).toBeNull();
    });

    it('should enforce the maximum length', () => {
      expect(() => requireText('abcdef', 'state', 5)).toThrow('state is longer than 5 characters');
    });
  });

  describe('parseInteger', () => {
    const rules = { min: 1, fallback: 2 };

    it('should fall back on an empty cell', () => {
      expect(parseInteger('', 'max_guests', rules)).toBe(2);
    });

    it('should parse whole numbers', () => {
      expect(parseInteger(' 6 ', 'max_guests', rules)).toBe(6);
    });

    it.each(['-1', '2.5', 'three', '1e3'])('should reject %s', (value) => {
      expect(() => parseInteger(value, 'max_guests', rules)).toThrow(RowValidationError);
    });

    it('should reject values below the minimum', () => {
      expect(() => parseInteger('0', 'max_guests', rules)).toThrow('must be at least 1');
    });
  });

  describe('parseDecimal', () => {
    const price = { max: 99999999.99, decimalPlaces: 2 };

    it('should accept values within the scale, ignoring trailing zeros', () => {
      expect(parseDecimal('450', 'price_per_night', price)).toBe(450);
      expect(parseDecimal('99.50', 'price_per_night', price)).toBe(99.5);
      expect(parseDecimal('12.3400', 'price_per_night', price)).toBe(12.34);
    });

    it('should reject over-precise, negative and malformed values', () => {
      expect(() => parseDecimal('1.005', 'price_per_night', price)).toThrow('at most 2 decimal place(s) allowed');
      expect(() => parseDecimal('-5', 'price_per_night', price)).toThrow('expected a non-negative number');
      expect(() => parseDecimal('$5', 'price_per_night', price)).toThrow(RowValidationError);
    });

    it('should require a value when there is no fallback', () => {
      expect(() => parseDecimal('', 'price_per_night', price)).toThrow('Missing price_per_night');
      expect(parseDecimal('', 'bathrooms', { max: 99.9, decimalPlaces: 1, fallback: 1 })).toBe(1);
    });

    it('should reject values above the maximum', () => {
      expect(() => parseDecimal('100', 'bathrooms', { max: 99.9, decimalPlaces: 1 })).toThrow('must not exceed 99.9');
    });
  });

  describe('parseBooleanToken', () => {
    const tokens = { truthy: ['true', 'yes'], falsy: ['false', 'no'] };

    it('should map configured tokens case-insensitively', () => {
      expect(parseBooleanToken(' YES ', 'is_available', tokens, false)).toBe(true);
      expect(parseBooleanToken('False', 'is_available', tokens, true)).toBe(false);
      expect(parseBooleanToken('', 'is_available', tokens, true)).toBe(true);
    });

    it('should reject unknown tokens', () => {
      expect(() => parseBooleanToken('maybe', 'is_available', tokens, true)).toThrow(
        'Invalid is_available "maybe": expected one of true, yes, false, no',
      );
    });
  });
});
