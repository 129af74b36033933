/**
 * OAuth 2.0 Constants
 */

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_CLIENT_CREDENTIALS = 'client_credentials' as const;
export const GRANT_TYPE_PASSWORD = 'password' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;

// All supported grant types
export const SUPPORTED_GRANT_TYPES = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_REFRESH_TOKEN,
] as const;

// Response types
export const RESPONSE_TYPE_CODE = 'code' as const;
export const SUPPORTED_RESPONSE_TYPES = [RESPONSE_TYPE_CODE] as const;

// Code challenge methods (RFC 7636 Section 4.2)
export const CODE_CHALLENGE_METHOD_S256 = 'S256' as const;
export const CODE_CHALLENGE_METHOD_PLAIN = 'plain' as const;
export const SUPPORTED_CODE_CHALLENGE_METHODS = [
  CODE_CHALLENGE_METHOD_S256,
  CODE_CHALLENGE_METHOD_PLAIN,
] as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;

// Client authentication methods
export const CLIENT_AUTH_BASIC = 'client_secret_basic' as const;
export const CLIENT_AUTH_POST = 'client_secret_post' as const;
export const CLIENT_AUTH_NONE = 'none' as const;

export const SUPPORTED_CLIENT_AUTH_METHODS = [
  CLIENT_AUTH_BASIC,
  CLIENT_AUTH_POST,
  CLIENT_AUTH_NONE,
] as const;

// Signing algorithms
export const SIGNING_ALGORITHM_HS256 = 'HS256' as const;

export const ASYMMETRIC_SIGNING_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'ES256',
  'ES384',
  'ES512',
] as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const MAX_ACCESS_TOKEN_TTL = 86400; // 24 hours
export const DEFAULT_REFRESH_TOKEN_TTL = 2592000; // 30 days
export const DEFAULT_AUTHORIZATION_CODE_TTL = 600; // 10 minutes
export const DEFAULT_PERSONAL_ACCESS_TOKEN_TTL = 31536000; // 1 year

// Token/code lengths
export const AUTHORIZATION_CODE_LENGTH = 32; // bytes
export const REFRESH_TOKEN_LENGTH = 32; // bytes
export const PERSONAL_ACCESS_TOKEN_LENGTH = 40; // bytes
export const CLIENT_ID_LENGTH = 16; // bytes
export const CLIENT_SECRET_LENGTH = 32; // bytes
export const MIN_HMAC_SECRET_LENGTH = 32; // characters

// Wildcard scope, grants every registered scope
export const WILDCARD_SCOPE = '*' as const;

// Client id reported for personal access tokens
export const DEFAULT_PERSONAL_ACCESS_CLIENT_ID = 'personal-access';

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Content types
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
