import { z } from 'zod';
import type { ClientView } from '../types/client.js';
import type { GrantType, TokenRequestParams, TokenResponse } from '../types/oauth.js';
import { OAuthError } from '../errors/oauth-error.js';
import { SUPPORTED_GRANT_TYPES } from '../config/constants.js';

/**
 * A token endpoint grant, run for an already authenticated client
 */
export type GrantHandler = (client: ClientView, params: TokenRequestParams) => Promise<TokenResponse>;

// Empty form fields count as absent
const optionalParam = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const requiredParam = (name: string) =>
  z.string({ required_error: `Missing ${name} parameter` }).min(1, `Missing ${name} parameter`);

export const authorizationCodeParamsSchema = z.object({
  code: optionalParam,
  redirect_uri: optionalParam,
  code_verifier: optionalParam,
});

export const clientCredentialsParamsSchema = z.object({
  scope: optionalParam,
});

export const passwordParamsSchema = z.object({
  username: requiredParam('username'),
  password: requiredParam('password'),
  scope: optionalParam,
});

export const refreshTokenParamsSchema = z.object({
  refresh_token: optionalParam,
  scope: optionalParam,
});

/**
 * Validate the grant-specific parameters of a token request
 */
export function parseTokenParams<T extends z.ZodTypeAny>(
  schema: T,
  params: TokenRequestParams
): z.output<T> {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw OAuthError.invalidRequest(result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}

/**
 * Read `grant_type` from a token request
 */
export function parseGrantType(params: TokenRequestParams): GrantType {
  const grantType = params['grant_type'];

  if (!grantType) {
    throw OAuthError.invalidRequest('Missing grant_type parameter');
  }

  const supported = SUPPORTED_GRANT_TYPES.find((type) => type === grantType);
  if (!supported) {
    throw OAuthError.unsupportedGrantType(`Unsupported grant type: ${grantType}`);
  }

  return supported;
}

/**
 * Reject a grant the client was not registered for
 */
export function assertGrantAllowed(client: ClientView, grantType: GrantType): void {
  if (!client.allowedGrants.includes(grantType)) {
    throw OAuthError.unsupportedGrantType(`Client is not authorized for the ${grantType} grant`);
  }
}
