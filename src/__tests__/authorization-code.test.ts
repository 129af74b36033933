import { describe, it, expect, beforeEach } from 'vitest';
import { ScopeManager } from '../services/scope-service.js';
import { OAuthError } from '../errors/oauth-error.js';
import { hashToken } from '../crypto/hash.js';
import {
  createTestServer,
  expectOAuthError,
  generateCodeChallenge,
  generateCodeVerifier,
  registerConfidentialClient,
  registerPublicClient,
  requireValue,
  REDIRECT_URI,
  type TestServer,
} from './test-setup.js';
import type { ClientView } from '../types/client.js';

describe('Authorization code grant', () => {
  let ctx: TestServer;
  let publicClient: ClientView;

  beforeEach(async () => {
    ctx = createTestServer();
    publicClient = await registerPublicClient(ctx.server);
  });

  async function issueS256Code(client: ClientView = publicClient) {
    const verifier = generateCodeVerifier();
    const { code } = await ctx.server.authorize({
      clientId: client.clientId,
      userId: 'user-1',
      redirectUri: REDIRECT_URI,
      scope: 'api:read',
      codeChallenge: generateCodeChallenge(verifier),
      codeChallengeMethod: 'S256',
    });
    return { code, verifier };
  }

  function exchange(code: string, verifier?: string, client: ClientView = publicClient) {
    return ctx.server.grant(client, {
      grant_type: 'authorization_code',
      code,
      redirect_uri: REDIRECT_URI,
      code_verifier: verifier,
    });
  }

  it('exchanges a PKCE-bound code once and rejects the second exchange', async () => {
    const { code, verifier } = await issueS256Code();

    const tokens = await exchange(code, verifier);
    expect(tokens.token_type).toBe('Bearer');
    expect(tokens.expires_in).toBe(3600);
    expect(tokens.scope).toBe('api:read');
    expect(tokens.access_token.split('.')).toHaveLength(3);
    expect(tokens.refresh_token).toMatch(/^[A-Za-z0-9_-]{43}$/);

    await expectOAuthError(exchange(code, verifier), 'invalid_grant');
  });

  it('rejects a wrong verifier without consuming the code', async () => {
    const { code, verifier } = await issueS256Code();

    await expectOAuthError(exchange(code, generateCodeVerifier()), 'invalid_grant');

    const tokens = await exchange(code, verifier);
    expect(tokens.access_token).toBeTruthy();
    await expectOAuthError(exchange(code, verifier), 'invalid_grant');
  });

  it('lets exactly one of two concurrent exchanges win', async () => {
    const { code, verifier } = await issueS256Code();

    const results = await Promise.allSettled([exchange(code, verifier), exchange(code, verifier)]);

    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.reason).toBeInstanceOf(OAuthError);
    expect(rejected[0]?.reason).toMatchObject({ code: 'invalid_grant' });
  });

  it('requires the code_verifier for a PKCE-bound code', async () => {
    const { code } = await issueS256Code();
    await expectOAuthError(exchange(code), 'invalid_request');
  });

  it('accepts the plain method, which is the default', async () => {
    const verifier = generateCodeVerifier();
    const { code } = await ctx.server.authorize({
      clientId: publicClient.clientId,
      userId: 'user-1',
      redirectUri: REDIRECT_URI,
      codeChallenge: verifier,
    });

    const stored = requireValue(await ctx.storage.authorizationCodes.findByTokenHash(hashToken(code)));
    expect(stored.codeChallengeMethod).toBe('plain');

    const tokens = await exchange(code, verifier);
    expect(tokens.access_token).toBeTruthy();
  });

  it('refuses plain when the policy forbids it', async () => {
    ctx = createTestServer({ config: { policy: { allowPlainPkce: false } } });
    publicClient = await registerPublicClient(ctx.server);

    await expectOAuthError(
      ctx.server.authorize({
        clientId: publicClient.clientId,
        userId: 'user-1',
        redirectUri: REDIRECT_URI,
        codeChallenge: generateCodeVerifier(),
        codeChallengeMethod: 'plain',
      }),
      'invalid_request'
    );
  });

  it('requires PKCE from public clients', async () => {
    await expectOAuthError(
      ctx.server.authorize({
        clientId: publicClient.clientId,
        userId: 'user-1',
        redirectUri: REDIRECT_URI,
      }),
      'invalid_request'
    );
  });

  it('rejects unknown challenge methods', async () => {
    await expectOAuthError(
      ctx.server.authorize({
        clientId: publicClient.clientId,
        userId: 'user-1',
        redirectUri: REDIRECT_URI,
        codeChallenge: generateCodeChallenge(generateCodeVerifier()),
        codeChallengeMethod: 'S512',
      }),
      'invalid_request'
    );
  });

  it('lets confidential clients skip PKCE unless the policy requires it', async () => {
    const { client } = await registerConfidentialClient(ctx.server);

    const { code } = await ctx.server.authorize({
      clientId: client.clientId,
      userId: 'user-1',
      redirectUri: REDIRECT_URI,
      scope: 'api:write',
    });
    const tokens = await exchange(code, undefined, client);
    expect(tokens.scope).toBe('api:write');

    const strict = createTestServer({ config: { policy: { requirePkceForConfidentialClients: true } } });
    const strictClient = await registerConfidentialClient(strict.server);
    await expectOAuthError(
      strict.server.authorize({
        clientId: strictClient.client.clientId,
        userId: 'user-1',
        redirectUri: REDIRECT_URI,
      }),
      'invalid_request'
    );
  });

  it('rejects a verifier for a code issued without a challenge', async () => {
    const { client } = await registerConfidentialClient(ctx.server);
    const { code } = await ctx.server.authorize({
      clientId: client.clientId,
      userId: 'user-1',
      redirectUri: REDIRECT_URI,
    });

    await expectOAuthError(exchange(code, generateCodeVerifier(), client), 'invalid_grant');
  });

  it('falls back to the default scopes when none are requested', async () => {
    const { client } = await registerConfidentialClient(ctx.server);
    const { code } = await ctx.server.authorize({
      clientId: client.clientId,
      userId: 'user-1',
      redirectUri: REDIRECT_URI,
    });

    const tokens = await exchange(code, undefined, client);
    expect(tokens.scope).toBe('api:read');
  });

  it('fails invalid_scope at issuance for a scope outside the allow-list', async () => {
    const scopes = new ScopeManager([
      { id: 'read', description: 'Read access', dangerous: false },
      { id: 'admin', description: 'Administrative access', dangerous: true },
    ]);
    ctx = createTestServer({ scopes });

    const { client } = await ctx.server.registerClient({
      name: 'Reader',
      clientType: 'confidential',
      redirectUris: [REDIRECT_URI],
      allowedGrants: ['authorization_code'],
      allowedScopes: ['read'],
    });

    await expectOAuthError(
      ctx.server.authorize({
        clientId: client.clientId,
        userId: 'user-1',
        redirectUri: REDIRECT_URI,
        scope: 'admin',
      }),
      'invalid_scope'
    );
  });

  it('rejects an unregistered redirect URI at issuance', async () => {
    await expectOAuthError(
      ctx.server.authorize({
        clientId: publicClient.clientId,
        userId: 'user-1',
        redirectUri: 'https://evil.test.local/callback',
        codeChallenge: generateCodeChallenge(generateCodeVerifier()),
        codeChallengeMethod: 'S256',
      }),
      'invalid_request'
    );
  });

  it('rejects a mismatched redirect URI at exchange', async () => {
    const { code, verifier } = await issueS256Code();

    await expectOAuthError(
      ctx.server.grant(publicClient, {
        grant_type: 'authorization_code',
        code,
        redirect_uri: 'https://app.test.local/other',
        code_verifier: verifier,
      }),
      'invalid_grant'
    );
  });

  it('rejects a code presented by another client', async () => {
    const { code, verifier } = await issueS256Code();
    const { client: other } = await registerConfidentialClient(ctx.server);

    await expectOAuthError(exchange(code, verifier, other), 'invalid_grant');
  });

  it('rejects an expired code', async () => {
    const { code, verifier } = await issueS256Code();

    ctx.time.advance(600);

    await expectOAuthError(exchange(code, verifier), 'invalid_grant');
  });

  it('rejects an unknown code and a missing code', async () => {
    await expectOAuthError(exchange('not-a-real-code', generateCodeVerifier()), 'invalid_grant');
    await expectOAuthError(
      ctx.server.grant(publicClient, { grant_type: 'authorization_code', redirect_uri: REDIRECT_URI }),
      'invalid_request'
    );
  });

  it('stores only the hash of the code', async () => {
    const { code } = await issueS256Code();

    expect(await ctx.storage.authorizationCodes.findByTokenHash(code)).toBeNull();
    const stored = requireValue(await ctx.storage.authorizationCodes.findByTokenHash(hashToken(code)));
    expect(stored.tokenHash).toBe(hashToken(code));
    expect(stored.userId).toBe('user-1');
  });

  it('fails invalid_client for an unknown or revoked client', async () => {
    await expectOAuthError(
      ctx.server.authorize({ clientId: 'nobody', userId: 'user-1', redirectUri: REDIRECT_URI }),
      'invalid_client'
    );

    await ctx.server.revokeClient(publicClient.clientId);
    await expectOAuthError(issueS256Code(), 'invalid_client');
  });

  it('fails unsupported_grant_type for a client without the grant', async () => {
    const { client } = await ctx.server.registerClient({
      name: 'Machine',
      clientType: 'confidential',
      allowedGrants: ['client_credentials'],
      allowedScopes: ['api:read'],
    });

    await expectOAuthError(
      ctx.server.authorize({ clientId: client.clientId, userId: 'user-1', redirectUri: REDIRECT_URI }),
      'unsupported_grant_type'
    );
  });
});
