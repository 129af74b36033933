import type { ServerConfig } from '../config/server-config.js';
import type {
  ActiveIntrospectionResponse,
  IntrospectionResponse,
  TokenTypeHint,
} from '../types/oauth.js';
import type { IRefreshTokenStorage, IRevokedTokenStorage } from '../storage/interfaces/index.js';
import type { Logger } from '../utils/logger.js';
import type { Clock } from '../utils/clock.js';
import type { TokenService } from './token-service.js';
import type { PersonalAccessTokenService } from './personal-access-token-service.js';
import { audit } from '../utils/audit.js';
import { toEpochSeconds } from '../utils/clock.js';
import { hashToken } from '../crypto/hash.js';
import { looksLikeJwt } from '../crypto/jwt.js';

/**
 * Identity behind a validated bearer token
 */
export interface BearerPrincipal {
  tokenType: 'access_token' | 'personal_access_token';
  tokenId: string;
  clientId: string;
  userId?: string;
  scopes: string[];
}

export interface RevokeOptions {
  hint?: TokenTypeHint;
  /** Authenticated client making the request; tokens of other clients are left alone */
  clientId?: string;
}

export interface TokenIntrospectionServiceOptions {
  config: ServerConfig;
  tokens: TokenService;
  personalAccessTokens: PersonalAccessTokenService;
  refreshTokenStorage: IRefreshTokenStorage;
  revokedTokenStorage: IRevokedTokenStorage;
  logger: Logger;
  clock: Clock;
}

const INACTIVE: IntrospectionResponse = Object.freeze({ active: false });

type Lookup = () => Promise<IntrospectionResponse | null>;

/**
 * Token introspection (RFC 7662) and revocation (RFC 7009)
 *
 * Anything that is not a live token introspects as exactly `{ active: false }`.
 * Storage failures are not treated as inactive; they propagate.
 */
export class TokenIntrospectionService {
  private readonly config: ServerConfig;
  private readonly tokens: TokenService;
  private readonly personalAccessTokens: PersonalAccessTokenService;
  private readonly refreshTokenStorage: IRefreshTokenStorage;
  private readonly revokedTokenStorage: IRevokedTokenStorage;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: TokenIntrospectionServiceOptions) {
    this.config = options.config;
    this.tokens = options.tokens;
    this.personalAccessTokens = options.personalAccessTokens;
    this.refreshTokenStorage = options.refreshTokenStorage;
    this.revokedTokenStorage = options.revokedTokenStorage;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  async introspect(token: string, hint?: TokenTypeHint): Promise<IntrospectionResponse> {
    if (!token) {
      return { ...INACTIVE };
    }

    const access: Lookup = () => this.introspectAccessToken(token);
    const refresh: Lookup = () => this.introspectRefreshToken(token);
    const personal: Lookup = () => this.introspectPersonalAccessToken(token);

    const lookups = hint === 'refresh_token' ? [refresh, access, personal] : [access, refresh, personal];

    for (const lookup of lookups) {
      const result = await lookup();
      if (result) {
        return result;
      }
    }

    return { ...INACTIVE };
  }

  /**
   * Resolve a bearer token (JWT access token or personal access token) for a resource server
   */
  async authenticateBearer(token: string): Promise<BearerPrincipal | null> {
    if (looksLikeJwt(token)) {
      const claims = await this.tokens.verifyAccessToken(token);
      if (claims) {
        return {
          tokenType: 'access_token',
          tokenId: claims.jti,
          clientId: claims.client_id,
          userId: claims.sub,
          scopes: claims.scope ? claims.scope.split(' ') : [],
        };
      }
      return null;
    }

    const pat = await this.personalAccessTokens.validate(token);
    if (!pat) {
      return null;
    }
    return {
      tokenType: 'personal_access_token',
      tokenId: pat.id,
      clientId: this.personalAccessTokens.clientId,
      userId: pat.userId,
      scopes: pat.scopes,
    };
  }

  /**
   * Revoke a token. Completes silently for unknown tokens and for tokens
   * issued to another client, so the caller learns nothing about them.
   */
  async revoke(token: string, options: RevokeOptions = {}): Promise<void> {
    if (!token) {
      return;
    }

    if (options.hint === 'access_token') {
      if (await this.revokeAccessToken(token, options.clientId)) return;
      if (await this.revokeRefreshToken(token, options.clientId)) return;
    } else {
      if (await this.revokeRefreshToken(token, options.clientId)) return;
      if (await this.revokeAccessToken(token, options.clientId)) return;
    }

    // Personal access tokens belong to a user, not a client
    if (options.clientId === undefined) {
      await this.personalAccessTokens.revokeByValue(token);
    }
  }

  private async introspectAccessToken(token: string): Promise<IntrospectionResponse | null> {
    if (!looksLikeJwt(token)) {
      return null;
    }

    const claims = await this.tokens.verifyAccessToken(token);
    if (!claims) {
      return null;
    }

    const response: ActiveIntrospectionResponse = {
      active: true,
      scope: claims.scope,
      client_id: claims.client_id,
      token_type: 'access_token',
      exp: claims.exp,
      iat: claims.iat,
      aud: claims.aud,
      iss: claims.iss,
      jti: claims.jti,
    };
    if (claims.sub !== undefined) {
      response.sub = claims.sub;
    }
    return response;
  }

  private async introspectRefreshToken(token: string): Promise<IntrospectionResponse | null> {
    const refreshToken = await this.refreshTokenStorage.findByTokenHash(hashToken(token));
    if (!refreshToken) {
      return null;
    }

    if (refreshToken.revokedAt || refreshToken.expiresAt.getTime() <= this.clock()) {
      return { ...INACTIVE };
    }

    const response: ActiveIntrospectionResponse = {
      active: true,
      scope: refreshToken.scopes.join(' '),
      client_id: refreshToken.clientId,
      token_type: 'refresh_token',
      exp: toEpochSeconds(refreshToken.expiresAt.getTime()),
      iat: toEpochSeconds(refreshToken.issuedAt.getTime()),
      iss: this.config.issuer,
    };
    if (refreshToken.userId !== undefined) {
      response.sub = refreshToken.userId;
    }
    return response;
  }

  private async introspectPersonalAccessToken(token: string): Promise<IntrospectionResponse | null> {
    const pat = await this.personalAccessTokens.validate(token, { touch: false });
    if (!pat) {
      return null;
    }

    const response: ActiveIntrospectionResponse = {
      active: true,
      scope: pat.scopes.join(' '),
      client_id: this.personalAccessTokens.clientId,
      token_type: 'personal_access_token',
      sub: pat.userId,
      iat: toEpochSeconds(pat.issuedAt.getTime()),
      iss: this.config.issuer,
    };
    if (pat.expiresAt) {
      response.exp = toEpochSeconds(pat.expiresAt.getTime());
    }
    return response;
  }

  private async revokeRefreshToken(token: string, clientId: string | undefined): Promise<boolean> {
    const refreshToken = await this.refreshTokenStorage.findByTokenHash(hashToken(token));
    if (!refreshToken) {
      return false;
    }

    if (clientId !== undefined && refreshToken.clientId !== clientId) {
      // Don't reveal token belongs to different client
      return true;
    }

    const revokedAt = new Date(this.clock());
    const revoked = await this.refreshTokenStorage.updateIf(
      refreshToken.id,
      { revokedAt: undefined },
      { revokedAt, revocationReason: 'revoked' }
    );
    if (!revoked) {
      return true;
    }

    const cascade =
      this.config.policy.revokeAccessTokensOnRefreshRevocation &&
      refreshToken.accessTokenExpiresAt.getTime() > revokedAt.getTime();
    if (cascade) {
      await this.revokedTokenStorage.revoke({
        tokenId: refreshToken.accessTokenId,
        tokenType: 'access_token',
        expiresAt: refreshToken.accessTokenExpiresAt,
        revokedAt,
      });
    }

    audit(
      this.logger,
      {
        event: 'oauth.token_revoked',
        tokenType: 'refresh_token',
        clientId: refreshToken.clientId,
        userId: refreshToken.userId,
        familyId: refreshToken.familyId,
        accessTokenRevoked: cascade,
      },
      'Refresh token revoked'
    );
    return true;
  }

  private async revokeAccessToken(token: string, clientId: string | undefined): Promise<boolean> {
    if (!looksLikeJwt(token)) {
      return false;
    }

    const claims = await this.tokens.verifyAccessToken(token);
    if (!claims) {
      return false;
    }

    if (clientId !== undefined && claims.client_id !== clientId) {
      return true;
    }

    await this.revokedTokenStorage.revoke({
      tokenId: claims.jti,
      tokenType: 'access_token',
      expiresAt: new Date(claims.exp * 1000),
      revokedAt: new Date(this.clock()),
    });

    audit(
      this.logger,
      {
        event: 'oauth.token_revoked',
        tokenType: 'access_token',
        clientId: claims.client_id,
        userId: claims.sub,
        tokenId: claims.jti,
      },
      'Access token revoked'
    );
    return true;
  }
}
