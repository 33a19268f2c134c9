import { describe, it, expect } from 'vitest';
import { extractBearerSecret } from '../middleware/auth.js';

describe('extractBearerSecret', () => {
  it('should return the token of a Bearer header', () => {
    expect(extractBearerSecret('Bearer ffk_abc123')).toBe('ffk_abc123');
  });

  it('should accept any casing of the scheme and extra spaces', () => {
    expect(extractBearerSecret('bearer   ffk_abc123  ')).toBe('ffk_abc123');
    expect(extractBearerSecret('BEARER ffk_abc123')).toBe('ffk_abc123');
  });

  it('should treat a missing header as no credential', () => {
    expect(extractBearerSecret(undefined)).toBeUndefined();
    expect(extractBearerSecret('')).toBeUndefined();
  });

  it('should treat other schemes as no credential', () => {
    expect(extractBearerSecret('Basic dXNlcjpwYXNz')).toBeUndefined();
    expect(extractBearerSecret('ffk_abc123')).toBeUndefined();
  });

  it('should treat an empty bearer token as no credential', () => {
    expect(extractBearerSecret('Bearer ')).toBeUndefined();
    expect(extractBearerSecret('Bearer')).toBeUndefined();
  });
});
