/**
 * OAuth 2.0 Grant Types
 * RFC 6749 Sections 4.1, 4.3, 4.4, 6
 */
export type GrantType = 'authorization_code' | 'client_credentials' | 'password' | 'refresh_token';

/**
 * Response types for authorization endpoint
 */
export type ResponseType = 'code';

/**
 * PKCE Code Challenge Methods
 * RFC 7636 Section 4.2
 */
export type CodeChallengeMethod = 'S256' | 'plain';

/**
 * Token types
 */
export type TokenType = 'Bearer';

/**
 * Token type hints accepted by introspection and revocation
 */
export type TokenTypeHint = 'access_token' | 'refresh_token';

/**
 * Authorization Request (GET /authorize)
 * RFC 6749 Section 4.1.1
 */
export interface AuthorizationRequest {
  clientId: string;
  userId: string;
  redirectUri: string;
  scope?: string;
  codeChallenge?: string;
  codeChallengeMethod?: string;
}

/**
 * Authorization Response
 * RFC 6749 Section 4.1.2
 */
export interface AuthorizationResponse {
  code: string;
  expiresAt: Date;
}

/**
 * Raw token endpoint parameters, as received from the transport
 */
export type TokenRequestParams = Readonly<Record<string, string | undefined>>;

/**
 * Client credentials presented to the token endpoint
 */
export interface ClientCredentials {
  clientId: string;
  clientSecret?: string;
}

/**
 * Token Response
 * RFC 6749 Section 5.1
 */
export interface TokenResponse {
  access_token: string;
  token_type: TokenType;
  expires_in: number;
  refresh_token?: string;
  scope: string;
}

/**
 * Token Introspection Response
 * RFC 7662 Section 2.2
 */
export type IntrospectionResponse = { active: false } | ActiveIntrospectionResponse;

export interface ActiveIntrospectionResponse {
  active: true;
  scope: string;
  client_id: string;
  token_type: TokenTypeHint | 'personal_access_token';
  iat: number;
  exp?: number;
  sub?: string;
  aud?: string;
  iss?: string;
  jti?: string;
}

/**
 * Authorization Server Metadata
 * RFC 8414 Section 2
 */
export interface AuthorizationServerMetadata {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  revocation_endpoint: string;
  introspection_endpoint: string;
  response_types_supported: ResponseType[];
  grant_types_supported: GrantType[];
  token_endpoint_auth_methods_supported: string[];
  revocation_endpoint_auth_methods_supported: string[];
  introspection_endpoint_auth_methods_supported: string[];
  code_challenge_methods_supported: CodeChallengeMethod[];
  scopes_supported: string[];
}
