import { z } from 'zod';
import type { ServerConfig } from '../config/server-config.js';
import type { PersonalAccessToken, PersonalAccessTokenView } from '../types/token.js';
import type { IPersonalAccessTokenStorage } from '../storage/interfaces/index.js';
import type { Logger } from '../utils/logger.js';
import type { Clock } from '../utils/clock.js';
import type { ScopeManager } from './scope-service.js';
import { OAuthError } from '../errors/oauth-error.js';
import { audit } from '../utils/audit.js';
import { generateId, generatePersonalAccessToken } from '../crypto/random.js';
import { hashToken } from '../crypto/hash.js';
import { WILDCARD_SCOPE } from '../config/constants.js';

const createTokenSchema = z.object({
  name: z.string().trim().min(1, 'name is required').max(255),
  scopes: z.array(z.string().min(1)).default([]),
  /** Lifetime in seconds; null never expires, undefined uses the configured default */
  expiresIn: z.number().int().positive().nullable().optional(),
});

export type CreatePersonalAccessTokenInput = z.input<typeof createTokenSchema>;

export interface CreatedPersonalAccessToken {
  /** Plaintext token, shown once */
  token: string;
  record: PersonalAccessTokenView;
}

export interface PersonalAccessTokenServiceOptions {
  config: ServerConfig;
  storage: IPersonalAccessTokenStorage;
  scopes: ScopeManager;
  logger: Logger;
  clock: Clock;
}

function toView(token: PersonalAccessToken): PersonalAccessTokenView {
  const { tokenHash: _hash, ...view } = token;
  return view;
}

/**
 * Long-lived tokens a user creates for scripts and integrations
 */
export class PersonalAccessTokenService {
  private readonly config: ServerConfig;
  private readonly storage: IPersonalAccessTokenStorage;
  private readonly scopes: ScopeManager;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: PersonalAccessTokenServiceOptions) {
    this.config = options.config;
    this.storage = options.storage;
    this.scopes = options.scopes;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  async create(userId: string, input: CreatePersonalAccessTokenInput): Promise<CreatedPersonalAccessToken> {
    if (!userId) {
      throw OAuthError.invalidRequest('Missing user');
    }

    const parsed = createTokenSchema.safeParse(input);
    if (!parsed.success) {
      throw OAuthError.invalidRequest(
        parsed.error.issues.map((issue) => issue.message).join('; ')
      );
    }
    const { name, expiresIn } = parsed.data;

    // Any registered scope may be requested; there is no client allow-list
    const scopes = this.scopes.validate(parsed.data.scopes, [WILDCARD_SCOPE]);

    const value = generatePersonalAccessToken();
    const now = this.clock();
    const lifetime = expiresIn === undefined ? this.config.personalAccessTokenTtl : expiresIn;

    const record: PersonalAccessToken = {
      id: generateId(),
      tokenHash: hashToken(value),
      userId,
      name,
      scopes,
      issuedAt: new Date(now),
      expiresAt: lifetime === null ? undefined : new Date(now + lifetime * 1000),
    };

    await this.storage.insert(record);

    audit(
      this.logger,
      { event: 'oauth.personal_access_token_created', userId, tokenId: record.id, scopes },
      `Personal access token created: ${name}`
    );

    return { token: value, record: toView(record) };
  }

  async list(userId: string): Promise<PersonalAccessTokenView[]> {
    const tokens = await this.storage.listByUser(userId);
    return tokens.map(toView);
  }

  /**
   * Revoke one of the user's tokens. Returns false if the user has no live token with that id.
   */
  async revoke(userId: string, tokenId: string): Promise<boolean> {
    const token = await this.storage.findById(tokenId);
    if (!token || token.userId !== userId) {
      return false;
    }

    const revoked = await this.storage.updateIf(
      token.id,
      { revokedAt: undefined },
      { revokedAt: new Date(this.clock()) }
    );

    if (revoked) {
      audit(
        this.logger,
        { event: 'oauth.personal_access_token_revoked', userId, tokenId },
        'Personal access token revoked'
      );
    }

    return revoked;
  }

  /**
   * Revoke a token by its plaintext value (token revocation endpoint)
   */
  async revokeByValue(value: string): Promise<boolean> {
    const token = await this.storage.findByTokenHash(hashToken(value));
    if (!token) {
      return false;
    }
    return this.revoke(token.userId, token.id);
  }

  /**
   * Resolve a presented token to its live record, stamping `lastUsedAt`
   */
  async validate(value: string, options: { touch?: boolean } = {}): Promise<PersonalAccessTokenView | null> {
    const token = await this.storage.findByTokenHash(hashToken(value));
    if (!token || token.revokedAt) {
      return null;
    }

    const now = this.clock();
    if (token.expiresAt && token.expiresAt.getTime() <= now) {
      return null;
    }

    if (options.touch !== false) {
      const lastUsedAt = new Date(now);
      await this.storage.updateIf(token.id, { revokedAt: undefined }, { lastUsedAt });
      return toView({ ...token, lastUsedAt });
    }

    return toView(token);
  }

  /**
   * Client id reported for personal access tokens in introspection
   */
  get clientId(): string {
    return this.config.personalAccessClientId;
  }
}
