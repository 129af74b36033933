import { describe, it, expect, beforeEach } from 'vitest';
import {
  createTestServer,
  expectOAuthError,
  registerPublicClient,
  REDIRECT_URI,
  type TestServer,
} from './test-setup.js';

describe('Client registry', () => {
  let ctx: TestServer;

  beforeEach(() => {
    ctx = createTestServer();
  });

  it('authenticates a confidential client only with its secret', async () => {
    const { client, clientSecret } = await ctx.server.registerClient({
      name: 'Billing Service',
      clientType: 'confidential',
      clientSecret: 's3cr3t',
      allowedGrants: ['client_credentials'],
      allowedScopes: ['api:read'],
    });

    expect(clientSecret).toBe('s3cr3t');

    await expectOAuthError(
      ctx.server.authenticateClient({ clientId: client.clientId, clientSecret: 'wrong' }),
      'invalid_client'
    );

    const authenticated = await ctx.server.authenticateClient({
      clientId: client.clientId,
      clientSecret: 's3cr3t',
    });
    expect(authenticated.clientId).toBe(client.clientId);
  });

  it('generates a secret when none is supplied and never exposes the hash', async () => {
    const { client, clientSecret } = await ctx.server.registerClient({
      name: 'Generated Secret',
      clientType: 'confidential',
      allowedGrants: ['client_credentials'],
      allowedScopes: ['api:read'],
    });

    expect(clientSecret).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(client).not.toHaveProperty('clientSecretHash');
    expect(Object.keys(client).sort()).toEqual([
      'allowedGrants',
      'allowedScopes',
      'clientId',
      'clientType',
      'createdAt',
      'defaultScopes',
      'name',
      'redirectUris',
      'revoked',
      'updatedAt',
    ]);

    const stored = await ctx.storage.clients.findById(client.clientId);
    expect(stored?.clientSecretHash?.startsWith('$scrypt$')).toBe(true);
    expect(stored?.clientSecretHash).not.toContain(clientSecret ?? '');
  });

  it('uses the requested client_id and rejects duplicates', async () => {
    const input = {
      clientId: 'reporting-job',
      name: 'Reporting Job',
      clientType: 'confidential' as const,
      allowedGrants: ['client_credentials' as const],
      allowedScopes: ['api:read'],
    };

    const { client } = await ctx.server.registerClient(input);
    expect(client.clientId).toBe('reporting-job');

    await expectOAuthError(ctx.server.registerClient(input), 'invalid_request');
  });

  it('lets only one of two concurrent registrations claim a client_id', async () => {
    const input = {
      clientId: 'shared-id',
      name: 'Racing Registration',
      clientType: 'confidential' as const,
      allowedGrants: ['client_credentials' as const],
      allowedScopes: ['api:read'],
    };

    const results = await Promise.allSettled([
      ctx.server.registerClient(input),
      ctx.server.registerClient(input),
    ]);

    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.find((result) => result.status === 'rejected');
    expect(rejected?.status === 'rejected' ? rejected.reason : undefined).toMatchObject({
      code: 'invalid_request',
      description: 'client_id is already registered',
    });
    expect(await ctx.storage.clients.list()).toHaveLength(1);
  });

  it('fails invalid_client for unknown clients and for a missing secret', async () => {
    const { client } = await ctx.server.registerClient({
      name: 'Confidential',
      clientType: 'confidential',
      allowedGrants: ['client_credentials'],
      allowedScopes: [],
    });

    await expectOAuthError(
      ctx.server.authenticateClient({ clientId: 'does-not-exist', clientSecret: 'whatever' }),
      'invalid_client'
    );
    await expectOAuthError(ctx.server.authenticateClient({ clientId: client.clientId }), 'invalid_client');
  });

  it('authenticates public clients by id alone', async () => {
    const client = await registerPublicClient(ctx.server);

    const authenticated = await ctx.server.authenticateClient({ clientId: client.clientId });
    expect(authenticated.clientType).toBe('public');

    await expectOAuthError(
      ctx.server.authenticateClient({ clientId: client.clientId, clientSecret: 'anything' }),
      'invalid_client'
    );
  });

  it('rejects a revoked client even with the right secret', async () => {
    const { client, clientSecret } = await ctx.server.registerClient({
      name: 'Soon Revoked',
      clientType: 'confidential',
      clientSecret: 's3cr3t',
      allowedGrants: ['client_credentials'],
      allowedScopes: [],
    });
    expect(clientSecret).toBe('s3cr3t');

    await ctx.server.revokeClient(client.clientId);
    // Idempotent
    await ctx.server.revokeClient(client.clientId);

    await expectOAuthError(
      ctx.server.authenticateClient({ clientId: client.clientId, clientSecret: 's3cr3t' }),
      'invalid_client'
    );

    const found = await ctx.server.findClient(client.clientId);
    expect(found?.revoked).toBe(true);
  });

  it('rotates a confidential client secret', async () => {
    const { client } = await ctx.server.registerClient({
      name: 'Rotating',
      clientType: 'confidential',
      clientSecret: 'old-secret',
      allowedGrants: ['client_credentials'],
      allowedScopes: [],
    });

    const newSecret = await ctx.server.rotateClientSecret(client.clientId);

    await expectOAuthError(
      ctx.server.authenticateClient({ clientId: client.clientId, clientSecret: 'old-secret' }),
      'invalid_client'
    );
    const authenticated = await ctx.server.authenticateClient({
      clientId: client.clientId,
      clientSecret: newSecret,
    });
    expect(authenticated.clientId).toBe(client.clientId);
  });

  it('refuses to rotate the secret of a public client', async () => {
    const client = await registerPublicClient(ctx.server);
    await expectOAuthError(ctx.server.rotateClientSecret(client.clientId), 'invalid_request');
  });

  describe('registration rules', () => {
    it('rejects a public client with a secret', async () => {
      await expectOAuthError(
        ctx.server.registerClient({
          name: 'Bad',
          clientType: 'public',
          clientSecret: 's3cr3t',
          redirectUris: [REDIRECT_URI],
          allowedGrants: ['authorization_code'],
          allowedScopes: [],
        }),
        'invalid_request'
      );
    });

    it('rejects client_credentials for a public client', async () => {
      await expectOAuthError(
        ctx.server.registerClient({
          name: 'Bad',
          clientType: 'public',
          allowedGrants: ['client_credentials'],
          allowedScopes: [],
        }),
        'invalid_request'
      );
    });

    it('requires a redirect URI for authorization_code', async () => {
      await expectOAuthError(
        ctx.server.registerClient({
          name: 'Bad',
          clientType: 'confidential',
          allowedGrants: ['authorization_code'],
          allowedScopes: [],
        }),
        'invalid_request'
      );
    });

    it('rejects redirect URIs with a fragment', async () => {
      await expectOAuthError(
        ctx.server.registerClient({
          name: 'Bad',
          clientType: 'confidential',
          redirectUris: ['https://app.test.local/callback#section'],
          allowedGrants: ['authorization_code'],
          allowedScopes: [],
        }),
        'invalid_request'
      );
    });

    it('rejects unknown scopes in the allow-list', async () => {
      await expectOAuthError(
        ctx.server.registerClient({
          name: 'Bad',
          clientType: 'confidential',
          allowedGrants: ['client_credentials'],
          allowedScopes: ['api:read', 'made:up'],
        }),
        'invalid_scope'
      );
    });

    it('requires default scopes to be allowed', async () => {
      await expectOAuthError(
        ctx.server.registerClient({
          name: 'Bad',
          clientType: 'confidential',
          allowedGrants: ['client_credentials'],
          allowedScopes: ['api:read'],
          defaultScopes: ['api:write'],
        }),
        'invalid_scope'
      );
    });
  });

  it('lists registered clients', async () => {
    await registerPublicClient(ctx.server);
    await ctx.server.registerClient({
      name: 'Second',
      clientType: 'confidential',
      allowedGrants: ['client_credentials'],
      allowedScopes: [],
    });

    const clients = await ctx.server.listClients();
    expect(clients.map((client) => client.name).sort()).toEqual(['Public Test Client', 'Second']);
  });
});
