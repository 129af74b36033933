import type { ServerConfig } from '../config/server-config.js';
import type { ClientView } from '../types/client.js';
import type { TokenResponse } from '../types/oauth.js';
import type { RefreshToken } from '../types/token.js';
import type { IRefreshTokenStorage } from '../storage/interfaces/index.js';
import type { Logger } from '../utils/logger.js';
import type { Clock } from '../utils/clock.js';
import type { ScopeManager } from './scope-service.js';
import type { TokenService } from './token-service.js';
import { OAuthError } from '../errors/oauth-error.js';
import { audit } from '../utils/audit.js';
import { hashToken } from '../crypto/hash.js';

export interface RefreshRequest {
  refreshToken?: string;
  scope?: string;
}

export interface RefreshTokenServiceOptions {
  config: ServerConfig;
  storage: IRefreshTokenStorage;
  scopes: ScopeManager;
  tokens: TokenService;
  logger: Logger;
  clock: Clock;
}

/**
 * Refresh token grant with rotation
 *
 * RFC 6749 Section 6
 *
 * - Each refresh token can only be used once
 * - A new refresh token is issued with each refresh, in the same family
 * - Presenting a rotated token is audited as a replay, and optionally revokes the family
 */
export class RefreshTokenService {
  private readonly config: ServerConfig;
  private readonly storage: IRefreshTokenStorage;
  private readonly scopes: ScopeManager;
  private readonly tokens: TokenService;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: RefreshTokenServiceOptions) {
    this.config = options.config;
    this.storage = options.storage;
    this.scopes = options.scopes;
    this.tokens = options.tokens;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  async refresh(client: ClientView, request: RefreshRequest): Promise<TokenResponse> {
    if (!request.refreshToken) {
      throw OAuthError.invalidRequest('Missing refresh_token parameter');
    }

    const token = await this.storage.findByTokenHash(hashToken(request.refreshToken));
    if (!token) {
      throw OAuthError.invalidGrant('Invalid refresh token');
    }

    if (token.clientId !== client.clientId) {
      throw OAuthError.invalidGrant('Refresh token was issued to a different client');
    }

    if (token.revokedAt) {
      if (token.revocationReason === 'rotated') {
        await this.handleReplay(token, client);
      }
      throw OAuthError.invalidGrant('Refresh token has been revoked');
    }

    const now = this.clock();
    if (token.expiresAt.getTime() <= now) {
      throw OAuthError.invalidGrant('Refresh token has expired');
    }

    // Handle scope downgrading: only a subset of the original grant
    let scopes = token.scopes;
    if (request.scope !== undefined) {
      const requested = this.scopes.parseScopes(request.scope);
      if (!this.scopes.isSubset(requested, token.scopes)) {
        const extra = requested.filter((scope) => !token.scopes.includes(scope));
        throw OAuthError.invalidScope(
          `Cannot request scopes not in original grant: ${extra.join(', ')}`
        );
      }
      if (requested.length > 0) {
        scopes = requested;
      }
    }

    const rotated = await this.storage.updateIf(
      token.id,
      { revokedAt: undefined },
      { revokedAt: new Date(now), revocationReason: 'rotated' }
    );
    if (!rotated) {
      await this.handleReplay(token, client);
      throw OAuthError.invalidGrant('Refresh token has been revoked');
    }

    const response = await this.tokens.issueTokenPair({
      client,
      userId: token.userId,
      scopes,
      // The new refresh token keeps the original grant (RFC 6749 Section 6)
      refreshScopes: token.scopes,
      familyId: token.familyId,
      parentTokenId: token.id,
    });

    audit(
      this.logger,
      {
        event: 'oauth.token_refreshed',
        clientId: client.clientId,
        userId: token.userId,
        familyId: token.familyId,
        scopes,
      },
      'Refresh token rotated'
    );

    return response;
  }

  /**
   * Revoke every live token of a family
   */
  async revokeFamily(familyId: string, reason: 'revoked' | 'replay'): Promise<number> {
    const family = await this.storage.findByFamily(familyId);
    const revokedAt = new Date(this.clock());

    const results = await Promise.all(
      family.map((member) =>
        this.storage.updateIf(
          member.id,
          { revokedAt: undefined },
          { revokedAt, revocationReason: reason }
        )
      )
    );

    return results.filter(Boolean).length;
  }

  private async handleReplay(token: RefreshToken, client: ClientView): Promise<void> {
    audit(
      this.logger,
      {
        event: 'oauth.refresh_token_replay',
        clientId: client.clientId,
        userId: token.userId,
        familyId: token.familyId,
        tokenId: token.id,
      },
      'Rotated refresh token presented again'
    );

    if (this.config.policy.revokeFamilyOnReplay) {
      const count = await this.revokeFamily(token.familyId, 'replay');
      audit(
        this.logger,
        {
          event: 'oauth.refresh_token_family_revoked',
          clientId: client.clientId,
          familyId: token.familyId,
          revoked: count,
        },
        'Refresh token family revoked after replay'
      );
    }
  }
}
