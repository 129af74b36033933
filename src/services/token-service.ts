import type { ServerConfig } from '../config/server-config.js';
import type { ClientView } from '../types/client.js';
import type { TokenResponse } from '../types/oauth.js';
import type { AccessTokenClaims, IssuedAccessToken } from '../types/token.js';
import type { IRefreshTokenStorage, IRevokedTokenStorage } from '../storage/interfaces/index.js';
import type { AccessTokenSigner } from '../crypto/jwt.js';
import type { Clock } from '../utils/clock.js';
import { toEpochSeconds } from '../utils/clock.js';
import { generateFamilyId, generateId, generateJti, generateRefreshToken } from '../crypto/random.js';
import { hashToken } from '../crypto/hash.js';
import { GRANT_TYPE_REFRESH_TOKEN, TOKEN_TYPE_BEARER } from '../config/constants.js';

export interface AccessTokenOptions {
  client: ClientView;
  userId?: string;
  scopes: string[];
}

export interface RefreshTokenOptions extends AccessTokenOptions {
  accessToken: IssuedAccessToken;
  familyId?: string;
  parentTokenId?: string;
}

export interface TokenPairOptions extends AccessTokenOptions {
  /** Scopes stored on the refresh token, when they differ from the access token's */
  refreshScopes?: string[];
  familyId?: string;
  parentTokenId?: string;
}

export interface TokenServiceOptions {
  config: ServerConfig;
  signer: AccessTokenSigner;
  refreshTokenStorage: IRefreshTokenStorage;
  revokedTokenStorage: IRevokedTokenStorage;
  clock: Clock;
}

/**
 * Service for token generation
 */
export class TokenService {
  private readonly config: ServerConfig;
  private readonly signer: AccessTokenSigner;
  private readonly refreshTokenStorage: IRefreshTokenStorage;
  private readonly revokedTokenStorage: IRevokedTokenStorage;
  private readonly clock: Clock;

  constructor(options: TokenServiceOptions) {
    this.config = options.config;
    this.signer = options.signer;
    this.refreshTokenStorage = options.refreshTokenStorage;
    this.revokedTokenStorage = options.revokedTokenStorage;
    this.clock = options.clock;
  }

  /**
   * Mint a signed access token. Access tokens are not persisted.
   */
  async issueAccessToken(options: AccessTokenOptions): Promise<IssuedAccessToken> {
    const { client, userId, scopes } = options;

    const issuedAt = this.clock();
    const iat = toEpochSeconds(issuedAt);
    const exp = iat + this.config.accessTokenTtl;
    const jti = generateJti();

    const claims: AccessTokenClaims = {
      iss: this.config.issuer,
      aud: client.clientId,
      exp,
      iat,
      jti,
      client_id: client.clientId,
      scope: scopes.join(' '),
      token_type: 'access_token',
    };
    if (userId !== undefined) {
      claims.sub = userId;
    }

    return {
      token: await this.signer.sign(claims),
      tokenId: jti,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }

  /**
   * Create and store a refresh token. Only its SHA-256 hash is persisted.
   */
  async issueRefreshToken(options: RefreshTokenOptions): Promise<string> {
    const { client, userId, scopes, accessToken, familyId, parentTokenId } = options;

    const value = generateRefreshToken();
    const issuedAt = this.clock();

    await this.refreshTokenStorage.insert({
      id: generateId(),
      tokenHash: hashToken(value),
      clientId: client.clientId,
      userId,
      scopes: [...scopes],
      accessTokenId: accessToken.tokenId,
      accessTokenExpiresAt: accessToken.expiresAt,
      familyId: familyId ?? generateFamilyId(),
      parentTokenId,
      issuedAt: new Date(issuedAt),
      expiresAt: new Date(issuedAt + this.config.refreshTokenTtl * 1000),
    });

    return value;
  }

  /**
   * Generate a complete token response.
   * A refresh token is included for user-bound grants when the client may use
   * the refresh_token grant.
   */
  async issueTokenPair(options: TokenPairOptions): Promise<TokenResponse> {
    const { client, userId, scopes } = options;

    const accessToken = await this.issueAccessToken({ client, userId, scopes });

    const response: TokenResponse = {
      access_token: accessToken.token,
      token_type: TOKEN_TYPE_BEARER,
      expires_in: this.config.accessTokenTtl,
      scope: scopes.join(' '),
    };

    if (userId !== undefined && client.allowedGrants.includes(GRANT_TYPE_REFRESH_TOKEN)) {
      response.refresh_token = await this.issueRefreshToken({
        client,
        userId,
        scopes: options.refreshScopes ?? scopes,
        accessToken,
        familyId: options.familyId,
        parentTokenId: options.parentTokenId,
      });
    }

    return response;
  }

  /**
   * Validate an access token: signature, issuer, expiry and the revocation denylist.
   */
  async verifyAccessToken(token: string): Promise<AccessTokenClaims | null> {
    const claims = await this.signer.verify(token);
    if (!claims) {
      return null;
    }

    if (await this.revokedTokenStorage.isRevoked(claims.jti)) {
      return null;
    }

    return claims;
  }
}
