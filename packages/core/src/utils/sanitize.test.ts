import { describe, it, expect } from 'vitest';
import { sanitizeContext, sanitizeForLogging } from './sanitize.js';

describe('sanitizeForLogging', () => {
  it('redacts bearer and basic credentials in strings', () => {
    expect(sanitizeForLogging('auth: Bearer abc.def-123')).toBe('auth: Bearer [REDACTED_TOKEN]');
    expect(sanitizeForLogging('Basic dXNlcjpwYXNz')).toBe('Basic [REDACTED_CREDENTIALS]');
  });

  it('redacts tokens in query strings', () => {
    expect(sanitizeForLogging('/v1/chat?api_key=test-secret&model=x')).toBe('/v1/chat?api_key=[REDACTED]&model=x');
    expect(sanitizeForLogging('/cb?token=abc#frag')).toBe('/cb?token=[REDACTED]#frag');
  });

  it('passes other primitives through', () => {
    expect(sanitizeForLogging(42)).toBe(42);
    expect(sanitizeForLogging(null)).toBeNull();
    expect(sanitizeForLogging(undefined)).toBeUndefined();
    expect(sanitizeForLogging('/v1/models')).toBe('/v1/models');
  });

  it('sanitizes arrays and nested objects', () => {
    expect(sanitizeForLogging([{ cookie: 'a=b' }, 'Bearer xyz'])).toEqual([
      { cookie: '[REDACTED]' },
      'Bearer [REDACTED_TOKEN]',
    ]);
  });

  it('returns errors unchanged', () => {
    const err = new Error('boom');
    expect(sanitizeForLogging(err)).toBe(err);
  });
});

describe('sanitizeContext', () => {
  it('redacts sensitive keys regardless of case', () => {
    expect(
      sanitizeContext({
        Authorization: 'Bearer abc',
        'X-API-Key': 'test-secret',
        clientSecret: 'test-secret',
        path: '/a',
      })
    ).toEqual({
      Authorization: '[REDACTED]',
      'X-API-Key': '[REDACTED]',
      clientSecret: '[REDACTED]',
      path: '/a',
    });
  });

  it('recurses into nested values', () => {
    expect(sanitizeContext({ headers: { cookie: 'sid=1', accept: '*/*' } })).toEqual({
      headers: { cookie: '[REDACTED]', accept: '*/*' },
    });
  });
});
