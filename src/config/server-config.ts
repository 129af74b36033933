import { z } from 'zod';
import {
  ASYMMETRIC_SIGNING_ALGORITHMS,
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_AUTHORIZATION_CODE_TTL,
  DEFAULT_PERSONAL_ACCESS_CLIENT_ID,
  DEFAULT_PERSONAL_ACCESS_TOKEN_TTL,
  DEFAULT_REFRESH_TOKEN_TTL,
  MAX_ACCESS_TOKEN_TTL,
  MIN_HMAC_SECRET_LENGTH,
  SIGNING_ALGORITHM_HS256,
} from './constants.js';

const ttlSchema = z.number().int().positive();

const hmacSigningSchema = z.object({
  algorithm: z.literal(SIGNING_ALGORITHM_HS256),
  secret: z
    .string()
    .min(MIN_HMAC_SECRET_LENGTH, `HS256 secret must be at least ${MIN_HMAC_SECRET_LENGTH} characters`),
  keyId: z.string().min(1).optional(),
});

const asymmetricSigningSchema = z.object({
  algorithm: z.enum(ASYMMETRIC_SIGNING_ALGORITHMS),
  privateKey: z.string().min(1, 'PKCS#8 private key is required'),
  publicKey: z.string().min(1, 'SPKI public key is required'),
  keyId: z.string().min(1).optional(),
});

const signingSchema = z
  .discriminatedUnion('algorithm', [hmacSigningSchema, asymmetricSigningSchema])
  .readonly();

const policySchema = z
  .object({
    /** Require PKCE from confidential clients as well as public ones */
    requirePkceForConfidentialClients: z.boolean().default(false),
    /** Accept the `plain` code challenge method */
    allowPlainPkce: z.boolean().default(true),
    /** Revoking a refresh token also denylists the access token minted with it */
    revokeAccessTokensOnRefreshRevocation: z.boolean().default(false),
    /** Replaying a rotated refresh token revokes every live token of its family */
    revokeFamilyOnReplay: z.boolean().default(false),
  })
  .readonly();

export const serverConfigSchema = z
  .object({
    issuer: z.string().min(1, 'issuer is required'),
    accessTokenTtl: ttlSchema
      .max(MAX_ACCESS_TOKEN_TTL, `accessTokenTtl must not exceed ${MAX_ACCESS_TOKEN_TTL} seconds`)
      .default(DEFAULT_ACCESS_TOKEN_TTL),
    refreshTokenTtl: ttlSchema.default(DEFAULT_REFRESH_TOKEN_TTL),
    authorizationCodeTtl: ttlSchema.default(DEFAULT_AUTHORIZATION_CODE_TTL),
    personalAccessTokenTtl: ttlSchema.default(DEFAULT_PERSONAL_ACCESS_TOKEN_TTL),
    personalAccessClientId: z.string().min(1).default(DEFAULT_PERSONAL_ACCESS_CLIENT_ID),
    signing: signingSchema,
    policy: policySchema.default({}),
  })
  .readonly();

export type ServerConfigInput = z.input<typeof serverConfigSchema>;
export type ServerConfig = z.output<typeof serverConfigSchema>;
export type SigningConfig = ServerConfig['signing'];
export type ServerPolicy = ServerConfig['policy'];

/**
 * Raised when configuration does not pass validation
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid server configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Validate and freeze the authorization server configuration.
 *
 * The returned object (and its nested `signing` and `policy` sections) is
 * frozen, so a single instance can be shared by concurrent requests.
 */
export function createServerConfig(input: ServerConfigInput): ServerConfig {
  const result = serverConfigSchema.safeParse(input);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  return result.data;
}
