import type { Context } from 'hono';
import type { AuthenticatedClient } from './client.js';
import type { BearerPrincipal } from '../services/introspection-service.js';

/**
 * Extended Hono context variables for OAuth
 */
export interface OAuthVariables {
  client?: AuthenticatedClient;
  principal?: BearerPrincipal;
}

/**
 * OAuth-aware Hono context
 */
export type OAuthContext = Context<{ Variables: OAuthVariables }>;
