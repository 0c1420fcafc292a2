import 'reflect-metadata';
import { validate } from './env-validation';

describe('env-validation', () => {
  it('should validate valid configuration', () => {
    const config = {
      NODE_ENV: 'development',
      PORT: 3000,
      EXCHANGE_CACHE_TTL_SECONDS: '300',
    };

    const result = validate(config);
    expect(result.NODE_ENV).toBe('development');
    expect(result.PORT).toBe(3000);
    expect(result.EXCHANGE_CACHE_TTL_SECONDS).toBe(300);
  });

  it('should use default values when nothing is set', () => {
    const result = validate({});
    expect(result.NODE_ENV).toBe('development');
    expect(result.PORT).toBe(3000);
    expect(result.EXCHANGE_PROVIDER_TIMEOUT_MS).toBeUndefined();
  });

  it('should throw error for invalid NODE_ENV', () => {
    expect(() => validate({ NODE_ENV: 'invalid' })).toThrow();
  });

  it('should throw error for invalid PORT type', () => {
    expect(() => validate({ PORT: 'not-a-number' })).toThrow();
  });

  it('should reject a zero cache TTL', () => {
    expect(() => validate({ EXCHANGE_CACHE_TTL_SECONDS: '0' })).toThrow();
  });

  it('should reject a provider base URL that is not a URL', () => {
    expect(() => validate({ EXCHANGE_PROVIDER_BASE_URL: 'not a url' })).toThrow();
  });

  it('should reject an amount precision above 8', () => {
    expect(() => validate({ EXCHANGE_AMOUNT_PRECISION: '9' })).toThrow();
  });
});
