import type { GrantType } from './oauth.js';

/**
 * OAuth 2.0 Client Types
 * RFC 6749 Section 2.1
 */
export type ClientType = 'confidential' | 'public';

/**
 * Client Authentication Methods
 * RFC 6749 Section 2.3
 */
export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post' | 'none';

/**
 * OAuth 2.0 Client, as stored
 *
 * A confidential client always has a secret hash, a public client never does.
 * Clients are revoked, never deleted.
 */
export interface OAuthClient {
  clientId: string; // Public identifier
  clientSecretHash?: string; // scrypt hash, absent for public clients
  clientType: ClientType;
  name: string;
  redirectUris: string[]; // Registered redirect URIs (exact match required)
  allowedGrants: GrantType[];
  allowedScopes: string[];
  defaultScopes: string[];
  revoked: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Client as handed out by the registry, without its secret hash
 */
export type ClientView = Omit<OAuthClient, 'clientSecretHash'>;

/**
 * Client registration input
 */
export interface CreateClientInput {
  clientId?: string;
  name: string;
  clientType: ClientType;
  clientSecret?: string;
  redirectUris?: string[];
  allowedGrants: GrantType[];
  allowedScopes: string[];
  defaultScopes?: string[];
}

/**
 * Result of a client registration. The secret is only ever returned here.
 */
export interface RegisteredClient {
  client: ClientView;
  clientSecret?: string;
}

/**
 * Authenticated client context
 */
export interface AuthenticatedClient {
  client: ClientView;
  authMethod: ClientAuthMethod;
}
