import { z } from 'zod';
import type { ClientView, CreateClientInput, OAuthClient, RegisteredClient } from '../types/client.js';
import type { IClientStorage } from '../storage/interfaces/index.js';
import type { Logger } from '../utils/logger.js';
import type { Clock } from '../utils/clock.js';
import type { ScopeManager } from './scope-service.js';
import { OAuthError } from '../errors/oauth-error.js';
import { audit } from '../utils/audit.js';
import { generateClientId, generateClientSecret } from '../crypto/random.js';
import { hashClientSecret, verifyClientSecret } from '../crypto/hash.js';
import {
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  SUPPORTED_GRANT_TYPES,
  WILDCARD_SCOPE,
} from '../config/constants.js';

const createClientSchema = z
  .object({
    clientId: z
      .string()
      .regex(/^[\x21-\x7E]+$/, 'client_id must be printable ASCII without spaces')
      .optional(),
    name: z.string().trim().min(1, 'name is required'),
    clientType: z.enum(['confidential', 'public']),
    clientSecret: z.string().min(1, 'client_secret must not be empty').optional(),
    redirectUris: z.array(z.string().url('redirect URIs must be absolute URLs')).default([]),
    allowedGrants: z.array(z.enum(SUPPORTED_GRANT_TYPES)).min(1, 'at least one grant type is required'),
    allowedScopes: z.array(z.string().min(1)).default([]),
    defaultScopes: z.array(z.string().min(1)).default([]),
  })
  .superRefine((input, ctx) => {
    if (input.clientType === 'public' && input.clientSecret !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'public clients cannot have a secret' });
    }
    if (
      input.clientType === 'public' &&
      input.allowedGrants.includes(GRANT_TYPE_CLIENT_CREDENTIALS)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'client_credentials requires a confidential client',
      });
    }
    if (
      input.allowedGrants.includes(GRANT_TYPE_AUTHORIZATION_CODE) &&
      input.redirectUris.length === 0
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'authorization_code requires at least one redirect URI',
      });
    }
    // RFC 6749 Section 3.1.2
    if (input.redirectUris.some((uri) => uri.includes('#'))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'redirect URIs must not contain a fragment',
      });
    }
  });

/**
 * Strip the secret hash before a client leaves the registry
 */
export function toClientView(client: OAuthClient): ClientView {
  const { clientSecretHash: _hash, ...view } = client;
  return view;
}

export interface ClientRegistryOptions {
  storage: IClientStorage;
  scopes: ScopeManager;
  logger: Logger;
  clock: Clock;
}

/**
 * Registration and authentication of OAuth clients
 */
export class ClientRegistry {
  private readonly storage: IClientStorage;
  private readonly scopes: ScopeManager;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private dummyHash: Promise<string> | null = null;

  constructor(options: ClientRegistryOptions) {
    this.storage = options.storage;
    this.scopes = options.scopes;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  /**
   * Register a new client.
   * For confidential clients the plaintext secret is returned here and nowhere else.
   */
  async register(input: CreateClientInput): Promise<RegisteredClient> {
    const parsed = createClientSchema.safeParse(input);
    if (!parsed.success) {
      throw OAuthError.invalidRequest(
        parsed.error.issues.map((issue) => issue.message).join('; ')
      );
    }
    const data = parsed.data;

    const unknownScopes = data.allowedScopes.filter(
      (scope) => scope !== WILDCARD_SCOPE && !this.scopes.exists(scope)
    );
    if (unknownScopes.length > 0) {
      throw OAuthError.invalidScope(`Unknown scopes: ${unknownScopes.join(', ')}`);
    }
    const defaultScopes = this.scopes.validate(data.defaultScopes, data.allowedScopes);

    const clientId = data.clientId ?? generateClientId();
    if (await this.storage.findById(clientId)) {
      throw OAuthError.invalidRequest('client_id is already registered');
    }

    let clientSecret: string | undefined;
    let clientSecretHash: string | undefined;
    if (data.clientType === 'confidential') {
      clientSecret = data.clientSecret ?? generateClientSecret();
      clientSecretHash = await hashClientSecret(clientSecret);
    }

    const now = new Date(this.clock());
    const client: OAuthClient = {
      clientId,
      clientSecretHash,
      clientType: data.clientType,
      name: data.name,
      redirectUris: Array.from(new Set(data.redirectUris)),
      allowedGrants: Array.from(new Set(data.allowedGrants)),
      allowedScopes: Array.from(new Set(data.allowedScopes)),
      defaultScopes,
      revoked: false,
      createdAt: now,
      updatedAt: now,
    };

    // Concurrent registrations can both pass the lookup above
    if (!(await this.storage.insert(client))) {
      throw OAuthError.invalidRequest('client_id is already registered');
    }

    audit(
      this.logger,
      {
        event: 'oauth.client_registered',
        clientId,
        clientType: client.clientType,
        grantTypes: client.allowedGrants,
      },
      `Client registered: ${client.name}`
    );

    return { client: toClientView(client), clientSecret };
  }

  /**
   * Authenticate a client by id and (for confidential clients) secret.
   *
   * Every failure raises the same invalid_client error. Unknown clients are
   * checked against a dummy hash so the response time does not reveal whether
   * the client exists.
   */
  async authenticate(clientId: string, secret?: string): Promise<ClientView> {
    const client = await this.storage.findById(clientId);

    if (!client || client.clientType === 'confidential') {
      const hash = client?.clientSecretHash ?? (await this.getDummyHash());
      const valid = await verifyClientSecret(secret ?? '', hash);

      if (!client || !valid || secret === undefined || client.revoked) {
        throw OAuthError.invalidClient();
      }
      return toClientView(client);
    }

    // Public clients authenticate by identifier alone
    if (secret !== undefined || client.revoked) {
      throw OAuthError.invalidClient();
    }
    return toClientView(client);
  }

  /**
   * Replace the secret of a confidential client, returning the new plaintext secret
   */
  async rotateSecret(clientId: string): Promise<string> {
    const client = await this.storage.findById(clientId);
    if (!client || client.revoked) {
      throw OAuthError.invalidClient();
    }
    if (client.clientType !== 'confidential') {
      throw OAuthError.invalidRequest('Public clients have no secret');
    }

    const secret = generateClientSecret();
    await this.storage.update(clientId, {
      clientSecretHash: await hashClientSecret(secret),
      updatedAt: new Date(this.clock()),
    });

    audit(
      this.logger,
      { event: 'oauth.client_secret_rotated', clientId },
      'Client secret rotated'
    );

    return secret;
  }

  /**
   * Revoke a client. Revocation is permanent and idempotent; the record is kept.
   */
  async revoke(clientId: string): Promise<void> {
    const client = await this.storage.findById(clientId);
    if (!client) {
      throw OAuthError.invalidClient();
    }
    if (client.revoked) {
      return;
    }

    await this.storage.update(clientId, { revoked: true, updatedAt: new Date(this.clock()) });
    audit(this.logger, { event: 'oauth.client_revoked', clientId }, 'Client revoked');
  }

  async find(clientId: string): Promise<ClientView | null> {
    const client = await this.storage.findById(clientId);
    return client ? toClientView(client) : null;
  }

  async list(): Promise<ClientView[]> {
    const clients = await this.storage.list();
    return clients.map(toClientView);
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = hashClientSecret(generateClientSecret());
    }
    return this.dummyHash;
  }
}
