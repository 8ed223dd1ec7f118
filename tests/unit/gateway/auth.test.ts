/**
 * Socket Auth Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { authorizeUpgrade, isValidToken } from '@/gateway/auth.js';

const options = { path: '/ws', token: 'test-secret' };

describe('isValidToken', () => {
  it('should accept the exact secret', () => {
    expect(isValidToken('test-secret', 'test-secret')).toBe(true);
  });

  it('should reject a different, shorter or missing token', () => {
    expect(isValidToken('test-secret', 'test-secreT')).toBe(false);
    expect(isValidToken('test-secret', 'test')).toBe(false);
    expect(isValidToken('test-secret', null)).toBe(false);
    expect(isValidToken('test-secret', '')).toBe(false);
  });
});

describe('authorizeUpgrade', () => {
  it('should accept a valid token on the socket path', () => {
    expect(authorizeUpgrade('/ws?token=test-secret', options)).toEqual({
      accept: true,
    });
  });

  it('should reject a bad or missing token with 401', () => {
    expect(authorizeUpgrade('/ws?token=wrong', options)).toEqual({
      accept: false,
      status: 401,
      reason: 'Unauthorized',
    });
    expect(authorizeUpgrade('/ws', options)).toEqual({
      accept: false,
      status: 401,
      reason: 'Unauthorized',
    });
  });

  it('should reject other paths with 404', () => {
    expect(authorizeUpgrade('/socket?token=test-secret', options)).toEqual({
      accept: false,
      status: 404,
      reason: 'Not Found',
    });
  });
});
