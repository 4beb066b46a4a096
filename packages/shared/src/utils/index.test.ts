import { describe, it, expect } from 'vitest';
import { normalizeServerUrl, redactUrl, sanitizeInput } from './index.js';

describe('normalizeServerUrl', () => {
  it('should add http:// when the scheme is missing', () => {
    expect(normalizeServerUrl('media.lan:8096')).toBe('http://media.lan:8096');
  });

  it('should keep https and strip trailing slashes', () => {
    expect(normalizeServerUrl(' https://jf.example.org/jellyfin// ')).toBe('https://jf.example.org/jellyfin');
  });

  it('should return empty string for blank input', () => {
    expect(normalizeServerUrl('   ')).toBe('');
  });
});

describe('redactUrl', () => {
  it('should hide api_key values', () => {
    expect(redactUrl('http://jf/Audio/1/stream?static=true&api_key=test-token&UserId=u1'))
      .toBe('http://jf/Audio/1/stream?static=true&api_key=REDACTED&UserId=u1');
  });
});

describe('sanitizeInput', () => {
  it('should strip control characters and trim', () => {
    expect(sanitizeInput('  Abbey\x07 Road  ')).toBe('Abbey Road');
  });

  it('should cut to the max length', () => {
    expect(sanitizeInput('abcdef', 3)).toBe('abc');
  });
});
