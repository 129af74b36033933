import { describe, it, expect } from 'vitest';
import { extractBasicAuth } from '../middleware/client-authenticator.js';
import { parseTokenTypeHint } from '../server.js';

function basic(value: string): string {
  return `Basic ${Buffer.from(value).toString('base64')}`;
}

describe('extractBasicAuth', () => {
  it('splits the credentials at the first colon', () => {
    expect(extractBasicAuth(basic('client-1:pass:word'))).toEqual({
      clientId: 'client-1',
      clientSecret: 'pass:word',
    });
  });

  it('form-decodes both parts', () => {
    expect(extractBasicAuth(basic('my%20client:p%40ss'))).toEqual({
      clientId: 'my client',
      clientSecret: 'p@ss',
    });
  });

  it('rejects other schemes and malformed values', () => {
    expect(extractBasicAuth('Bearer abc')).toBeNull();
    expect(extractBasicAuth(basic('no-colon'))).toBeNull();
    expect(extractBasicAuth(basic('bad%E0%A4%A:secret'))).toBeNull();
  });
});

describe('parseTokenTypeHint', () => {
  it('keeps known hints and drops the rest', () => {
    expect(parseTokenTypeHint('access_token')).toBe('access_token');
    expect(parseTokenTypeHint('refresh_token')).toBe('refresh_token');
    expect(parseTokenTypeHint('id_token')).toBeUndefined();
    expect(parseTokenTypeHint(undefined)).toBeUndefined();
  });
});
