export { AuthorizationServer, parseTokenTypeHint, type AuthorizationServerOptions } from './server.js';
export { createOAuth2Server, type OAuth2ServerOptions } from './app.js';
export { bearerAuth, requireScopes, getPrincipal, type BearerAuthOptions } from './middleware/bearer-auth.js';
export { clientAuthenticator, getAuthenticatedClient } from './middleware/client-authenticator.js';
export { createMemoryStorage } from './storage/memory/index.js';
export { ScopeManager, DEFAULT_SCOPES, type Scope } from './services/scope-service.js';
export type { BearerPrincipal } from './services/introspection-service.js';
export type {
  CreatePersonalAccessTokenInput,
  CreatedPersonalAccessToken,
} from './services/personal-access-token-service.js';
export { createLogger, type Logger } from './utils/logger.js';
export { systemClock, type Clock } from './utils/clock.js';
export type * from './types/index.js';
export * from './storage/interfaces/index.js';
export {
  createServerConfig,
  serverConfigSchema,
  ConfigError,
  loadConfig,
  type ServerConfig,
  type ServerConfigInput,
  type ServerPolicy,
  type SigningConfig,
} from './config/index.js';
export * from './errors/index.js';
export { generateCodeChallenge, verifyCodeChallenge } from './crypto/pkce.js';
