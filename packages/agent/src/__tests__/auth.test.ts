import { describe, it, expect } from 'vitest';
import { generateToken, parseBearerToken, verifyToken } from '../auth.js';

describe('generateToken', () => {
  it('should generate a 64-character hex string', () => {
    expect(generateToken()).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should generate unique tokens', () => {
    const tokens = new Set<string>();
    for (let i = 0; i < 50; i++) {
      tokens.add(generateToken());
    }
    expect(tokens.size).toBe(50);
  });
});

describe('parseBearerToken', () => {
  it('should extract the token', () => {
    expect(parseBearerToken('Bearer test-secret')).toBe('test-secret');
  });

  it('should accept any casing of the scheme', () => {
    expect(parseBearerToken('bearer test-secret')).toBe('test-secret');
  });

  it('should use the first of repeated headers', () => {
    expect(parseBearerToken(['Bearer first', 'Bearer second'])).toBe('first');
  });

  it('should return null for a missing header', () => {
    expect(parseBearerToken(undefined)).toBeNull();
    expect(parseBearerToken('')).toBeNull();
  });

  it('should return null for other schemes', () => {
    expect(parseBearerToken('Basic dXNlcjpwYXNz')).toBeNull();
    expect(parseBearerToken('Bearer')).toBeNull();
  });
});

describe('verifyToken', () => {
  it('should accept a listed token', () => {
    expect(verifyToken('test-secret', ['other', 'test-secret'])).toBe(true);
  });

  it('should reject an unlisted token', () => {
    expect(verifyToken('test-secret', ['other'])).toBe(false);
  });

  it('should reject tokens of a different length', () => {
    expect(verifyToken('test', ['test-secret'])).toBe(false);
  });

  it('should reject everything when no tokens are accepted', () => {
    expect(verifyToken('test-secret', [])).toBe(false);
  });
});
