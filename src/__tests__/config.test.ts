import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, createServerConfig, loadConfig, readSecret } from '../config/index.js';
import { TEST_ISSUER, TEST_SIGNING_SECRET } from './test-setup.js';

describe('createServerConfig', () => {
  const signing = { algorithm: 'HS256' as const, secret: TEST_SIGNING_SECRET };

  it('applies defaults', () => {
    const config = createServerConfig({ issuer: TEST_ISSUER, signing });

    expect(config).toEqual({
      issuer: TEST_ISSUER,
      accessTokenTtl: 3600,
      refreshTokenTtl: 2592000,
      authorizationCodeTtl: 600,
      personalAccessTokenTtl: 31536000,
      personalAccessClientId: 'personal-access',
      signing,
      policy: {
        requirePkceForConfidentialClients: false,
        allowPlainPkce: true,
        revokeAccessTokensOnRefreshRevocation: false,
        revokeFamilyOnReplay: false,
      },
    });
  });

  it('returns a frozen configuration', () => {
    const config = createServerConfig({ issuer: TEST_ISSUER, signing });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.policy)).toBe(true);
    expect(Object.isFrozen(config.signing)).toBe(true);
  });

  it('rejects a short HS256 secret', () => {
    expect(() =>
      createServerConfig({ issuer: TEST_ISSUER, signing: { algorithm: 'HS256', secret: 'too-short' } })
    ).toThrow(ConfigError);
  });

  it('rejects an access token lifetime above one day', () => {
    expect(() => createServerConfig({ issuer: TEST_ISSUER, signing, accessTokenTtl: 86401 })).toThrow(
      'accessTokenTtl: accessTokenTtl must not exceed 86400 seconds'
    );
    expect(createServerConfig({ issuer: TEST_ISSUER, signing, accessTokenTtl: 86400 }).accessTokenTtl).toBe(
      86400
    );
  });

  it('rejects non-positive lifetimes', () => {
    expect(() => createServerConfig({ issuer: TEST_ISSUER, signing, authorizationCodeTtl: 0 })).toThrow(
      ConfigError
    );
  });

  it('collects every issue', () => {
    try {
      createServerConfig({ issuer: '', signing: { algorithm: 'HS256', secret: 'short' } });
      expect.unreachable('createServerConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.issues : []).toHaveLength(2);
    }
  });
});

describe('loadConfig', () => {
  let secretDir: string | undefined;

  afterEach(() => {
    if (secretDir) {
      rmSync(secretDir, { recursive: true, force: true });
      secretDir = undefined;
    }
  });

  it('falls back to defaults and an ephemeral signing key', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({
      port: 3000,
      host: '0.0.0.0',
      nodeEnv: 'development',
      baseUrl: 'http://localhost:3000',
    });
    expect(config.logging.level).toBe('info');
    expect(config.oauth.issuer).toBe('http://localhost:3000');
    expect(config.ephemeralSigningKey).toBe(true);
    expect(config.oauth.signing.algorithm).toBe('HS256');
  });

  it('reads settings from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      HOST: 'auth.internal',
      LOG_LEVEL: 'debug',
      OAUTH_ISSUER: TEST_ISSUER,
      JWT_SIGNING_KEY: TEST_SIGNING_SECRET,
      JWT_KEY_ID: 'key-2025',
      ACCESS_TOKEN_TTL: '900',
      ALLOW_PLAIN_PKCE: 'false',
      REVOKE_FAMILY_ON_REPLAY: 'TRUE',
      REVOKE_ACCESS_TOKENS_ON_REFRESH_REVOCATION: '1',
    });

    expect(config.server.baseUrl).toBe('http://auth.internal:8080');
    expect(config.logging.level).toBe('debug');
    expect(config.ephemeralSigningKey).toBe(false);
    expect(config.oauth).toMatchObject({
      issuer: TEST_ISSUER,
      accessTokenTtl: 900,
      signing: { algorithm: 'HS256', secret: TEST_SIGNING_SECRET, keyId: 'key-2025' },
      policy: {
        requirePkceForConfidentialClients: false,
        allowPlainPkce: false,
        revokeAccessTokensOnRefreshRevocation: true,
        revokeFamilyOnReplay: true,
      },
    });
  });

  it('reads the signing key from a file', () => {
    secretDir = mkdtempSync(join(tmpdir(), 'oauth-config-'));
    const file = join(secretDir, 'signing-key');
    writeFileSync(file, `${TEST_SIGNING_SECRET}\n`);

    const config = loadConfig({ JWT_SIGNING_KEY_FILE: file, JWT_SIGNING_KEY: 'ignored' });

    expect(config.oauth.signing).toMatchObject({ secret: TEST_SIGNING_SECRET });
    expect(config.ephemeralSigningKey).toBe(false);
  });

  it('fails when a secret file is missing', () => {
    expect(() => readSecret('JWT_SIGNING_KEY', { JWT_SIGNING_KEY_FILE: '/nonexistent/signing-key' })).toThrow(
      'JWT_SIGNING_KEY_FILE points to a missing file: /nonexistent/signing-key'
    );
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('PORT must be an integer, got "eighty"');
    expect(() => loadConfig({ ALLOW_PLAIN_PKCE: 'yes' })).toThrow(
      'ALLOW_PLAIN_PKCE must be "true" or "false", got "yes"'
    );
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadConfig({ JWT_ALGORITHM: 'none' })).toThrow('JWT_ALGORITHM is not supported: none');
  });

  it('requires both keys for asymmetric signing', () => {
    expect(() => loadConfig({ JWT_ALGORITHM: 'RS256' })).toThrow(ConfigError);
  });
});
