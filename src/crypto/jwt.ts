import * as jose from 'jose';
import { z } from 'zod';
import type { SigningConfig } from '../config/server-config.js';
import type { AccessTokenClaims } from '../types/token.js';
import type { Clock } from '../utils/clock.js';

/**
 * JWT signing and verification of access tokens using the jose library
 */

const ACCESS_TOKEN_TYP = 'at+jwt'; // RFC 9068 JWT Profile for OAuth 2.0 Access Tokens

const accessTokenClaimsSchema = z.object({
  iss: z.string(),
  sub: z.string().optional(),
  aud: z.string(),
  exp: z.number().int(),
  iat: z.number().int(),
  jti: z.string().min(1),
  client_id: z.string().min(1),
  scope: z.string(),
  token_type: z.literal('access_token'),
});

type SigningKeys = {
  signingKey: jose.KeyLike | Uint8Array;
  verificationKey: jose.KeyLike | Uint8Array;
};

/**
 * Import the configured keys.
 * HS256 uses the shared secret for both operations; asymmetric algorithms use PEM keys.
 */
async function importKeys(signing: SigningConfig): Promise<SigningKeys> {
  if (signing.algorithm === 'HS256') {
    const secret = new TextEncoder().encode(signing.secret);
    return { signingKey: secret, verificationKey: secret };
  }

  const [signingKey, verificationKey] = await Promise.all([
    jose.importPKCS8(signing.privateKey, signing.algorithm),
    jose.importSPKI(signing.publicKey, signing.algorithm),
  ]);
  return { signingKey, verificationKey };
}

/**
 * Signs and verifies self-contained access tokens.
 * Nothing about an access token is persisted except, on revocation, its `jti`.
 */
export class AccessTokenSigner {
  private keys: Promise<SigningKeys> | null = null;

  constructor(
    private readonly signing: SigningConfig,
    private readonly issuer: string,
    private readonly clock: Clock
  ) {}

  private getKeys(): Promise<SigningKeys> {
    if (!this.keys) {
      this.keys = importKeys(this.signing);
    }
    return this.keys;
  }

  /**
   * Sign a JWT access token
   */
  async sign(claims: AccessTokenClaims): Promise<string> {
    const { signingKey } = await this.getKeys();

    const header: jose.JWTHeaderParameters = {
      alg: this.signing.algorithm,
      typ: ACCESS_TOKEN_TYP,
    };
    if (this.signing.keyId) {
      header.kid = this.signing.keyId;
    }

    return new jose.SignJWT({ ...claims }).setProtectedHeader(header).sign(signingKey);
  }

  /**
   * Verify signature, issuer, type and expiry against the server clock.
   * Returns null for any token that is not a valid access token of this issuer;
   * failures other than token validation propagate.
   */
  async verify(token: string): Promise<AccessTokenClaims | null> {
    const { verificationKey } = await this.getKeys();

    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, verificationKey, {
        issuer: this.issuer,
        typ: ACCESS_TOKEN_TYP,
        algorithms: [this.signing.algorithm],
        currentDate: new Date(this.clock()),
        clockTolerance: 0,
      }));
    } catch (error) {
      if (error instanceof jose.errors.JOSEError) {
        return null;
      }
      throw error;
    }

    const claims = accessTokenClaimsSchema.safeParse(payload);
    return claims.success ? claims.data : null;
  }
}

/**
 * Cheap check for the compact JWS shape, used to route introspection lookups
 */
export function looksLikeJwt(token: string): boolean {
  return /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/.test(token);
}
