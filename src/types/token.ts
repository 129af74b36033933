import type { CodeChallengeMethod, TokenTypeHint } from './oauth.js';

/**
 * JWT Access Token Payload
 * RFC 9068 JWT Profile for OAuth 2.0 Access Tokens
 */
export interface AccessTokenClaims {
  iss: string; // Issuer
  sub?: string; // Resource owner, absent for client_credentials
  aud: string; // Audience (client_id)
  exp: number; // Expiration time
  iat: number; // Issued at
  jti: string; // JWT ID, key of the revocation denylist
  client_id: string;
  scope: string;
  token_type: 'access_token';
}

/**
 * Access token as minted by the issuer (never persisted)
 */
export interface IssuedAccessToken {
  token: string;
  tokenId: string;
  issuedAt: Date;
  expiresAt: Date;
}

/**
 * Authorization Code (stored)
 *
 * State is derived: consumed once `consumedAt` is set, expired once
 * `expiresAt` has passed, issued otherwise.
 */
export interface AuthorizationCode {
  id: string;
  tokenHash: string; // SHA-256 of the code value
  clientId: string;
  userId: string;
  redirectUri: string;
  scopes: string[];
  codeChallenge?: string;
  codeChallengeMethod?: CodeChallengeMethod;
  issuedAt: Date;
  expiresAt: Date;
  consumedAt?: Date;
}

export type AuthorizationCodeState = 'issued' | 'consumed' | 'expired';

/**
 * Why a refresh token stopped being usable
 */
export type RefreshTokenRevocationReason = 'rotated' | 'revoked' | 'replay';

/**
 * Refresh Token (stored)
 */
export interface RefreshToken {
  id: string;
  tokenHash: string; // SHA-256 of the token value
  clientId: string;
  userId?: string;
  scopes: string[]; // Scopes of the original grant
  accessTokenId: string; // jti of the access token minted alongside
  accessTokenExpiresAt: Date;
  familyId: string; // Token family for replay detection
  parentTokenId?: string; // For rotation tracking
  issuedAt: Date;
  expiresAt: Date;
  revokedAt?: Date;
  revocationReason?: RefreshTokenRevocationReason;
}

/**
 * Personal Access Token (stored)
 */
export interface PersonalAccessToken {
  id: string;
  tokenHash: string;
  userId: string;
  name: string;
  scopes: string[];
  issuedAt: Date;
  expiresAt?: Date; // Absent: never expires
  lastUsedAt?: Date;
  revokedAt?: Date;
}

/**
 * Personal access token as shown to its owner
 */
export type PersonalAccessTokenView = Omit<PersonalAccessToken, 'tokenHash'>;

/**
 * Revoked Token (for JWT revocation tracking)
 */
export interface RevokedToken {
  tokenId: string; // jti claim from JWT
  tokenType: TokenTypeHint;
  expiresAt: Date; // When the original token would have expired
  revokedAt: Date;
}
