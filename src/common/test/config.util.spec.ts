import { ConfigService } from '@nestjs/config';
import { readBoolean, readPositiveInt, readTokenList } from '../utils/config.util';

describe('config utils', () => {
  const config = new ConfigService({
    TEST_PAGE_SIZE: '25',
    TEST_BAD_SIZE: '0',
    TEST_FLAG: 'Yes',
    TEST_TOKENS: ' Si , OUI,,ja ',
  });

  it('should read positive integers with a fallback', () => {
    expect(readPositiveInt(config, 'TEST_PAGE_SIZE', 10)).toBe(25);
    expect(readPositiveInt(config, 'TEST_UNSET_SIZE', 10)).toBe(10);
  });

  it('should throw on a non-positive integer', () => {
    expect(() => readPositiveInt(config, 'TEST_BAD_SIZE', 10)).toThrow('TEST_BAD_SIZE must be a positive integer, got "0"');
  });

  it('should read booleans', () => {
    expect(readBoolean(config, 'TEST_FLAG', false)).toBe(true);
    expect(readBoolean(config, 'TEST_UNSET_FLAG', true)).toBe(true);
  });

  it('should read lower-cased token lists', () => {
    expect(readTokenList(config, 'TEST_TOKENS', [])).toEqual(['si', 'oui', 'ja']);
    expect(readTokenList(config, 'TEST_UNSET_TOKENS', ['true'])).toEqual(['true']);
  });
});
