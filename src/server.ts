import type { ServerConfig } from './config/server-config.js';
import type { ClientView, CreateClientInput, RegisteredClient } from './types/client.js';
import type {
  AuthorizationRequest,
  AuthorizationResponse,
  AuthorizationServerMetadata,
  ClientCredentials,
  GrantType,
  IntrospectionResponse,
  TokenRequestParams,
  TokenResponse,
  TokenTypeHint,
} from './types/oauth.js';
import type { PersonalAccessTokenView } from './types/token.js';
import type { IStorage, IUserCredentialsVerifier } from './storage/interfaces/index.js';
import type { Logger } from './utils/logger.js';
import type { Clock } from './utils/clock.js';
import type { GrantHandler } from './grants/token-request.js';
import type { BearerPrincipal } from './services/introspection-service.js';
import type {
  CreatePersonalAccessTokenInput,
  CreatedPersonalAccessToken,
} from './services/personal-access-token-service.js';
import { OAuthError, isOAuthError } from './errors/oauth-error.js';
import { createLogger } from './utils/logger.js';
import { audit } from './utils/audit.js';
import { systemClock } from './utils/clock.js';
import { AccessTokenSigner } from './crypto/jwt.js';
import { ScopeManager } from './services/scope-service.js';
import { ClientRegistry } from './services/client-registry.js';
import { TokenService } from './services/token-service.js';
import { AuthorizationCodeService } from './services/authorization-code-service.js';
import { RefreshTokenService } from './services/refresh-token-service.js';
import { PersonalAccessTokenService } from './services/personal-access-token-service.js';
import { TokenIntrospectionService } from './services/introspection-service.js';
import { parseGrantType } from './grants/token-request.js';
import { createAuthorizationCodeHandler } from './grants/authorization-code/handler.js';
import { createClientCredentialsHandler } from './grants/client-credentials/handler.js';
import { createPasswordHandler } from './grants/password/handler.js';
import { createRefreshTokenHandler } from './grants/refresh-token/handler.js';
import {
  SUPPORTED_CLIENT_AUTH_METHODS,
  SUPPORTED_CODE_CHALLENGE_METHODS,
  SUPPORTED_GRANT_TYPES,
  SUPPORTED_RESPONSE_TYPES,
  CODE_CHALLENGE_METHOD_S256,
  CLIENT_AUTH_BASIC,
  CLIENT_AUTH_POST,
} from './config/constants.js';

export interface AuthorizationServerOptions {
  config: ServerConfig;
  storage: IStorage;
  /** Scope registry; defaults to the built-in scopes */
  scopes?: ScopeManager;
  /** Enables the password grant */
  userCredentialsVerifier?: IUserCredentialsVerifier;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Token type hints we act on. Anything else is ignored (RFC 7009 Section 2.1).
 */
export function parseTokenTypeHint(hint: string | undefined): TokenTypeHint | undefined {
  return hint === 'access_token' || hint === 'refresh_token' ? hint : undefined;
}

/**
 * OAuth 2.0 authorization server
 *
 * Wires the services together over one storage backend and one configuration.
 * Independent instances share no state. Every public operation either resolves,
 * throws an OAuthError, or throws a generic server_error after logging the cause.
 *
 * ```typescript
 * const server = new AuthorizationServer({
 *   config: createServerConfig({ issuer: 'https://auth.example.com', signing: { algorithm: 'HS256', secret } }),
 *   storage: createMemoryStorage(),
 * });
 *
 * const { client, clientSecret } = await server.registerClient({ ... });
 * const tokens = await server.token(
 *   { clientId: client.clientId, clientSecret },
 *   { grant_type: 'client_credentials', scope: 'api:read' }
 * );
 * ```
 */
export class AuthorizationServer {
  readonly config: ServerConfig;
  readonly scopes: ScopeManager;
  readonly logger: Logger;

  private readonly clients: ClientRegistry;
  private readonly authorizationCodes: AuthorizationCodeService;
  private readonly refreshTokens: RefreshTokenService;
  private readonly personalAccessTokens: PersonalAccessTokenService;
  private readonly introspection: TokenIntrospectionService;
  private readonly grants: Record<GrantType, GrantHandler>;

  constructor(options: AuthorizationServerOptions) {
    const { config, storage } = options;
    const clock = options.clock ?? systemClock;

    this.config = config;
    this.scopes = options.scopes ?? ScopeManager.withDefaults();
    this.logger = options.logger ?? createLogger({ name: 'oauth2-server' });

    const logger = this.logger;
    const scopes = this.scopes;

    const tokens = new TokenService({
      config,
      signer: new AccessTokenSigner(config.signing, config.issuer, clock),
      refreshTokenStorage: storage.refreshTokens,
      revokedTokenStorage: storage.revokedTokens,
      clock,
    });

    this.clients = new ClientRegistry({ storage: storage.clients, scopes, logger, clock });

    this.authorizationCodes = new AuthorizationCodeService({
      config,
      storage: storage.authorizationCodes,
      scopes,
      tokens,
      logger,
      clock,
    });

    this.refreshTokens = new RefreshTokenService({
      config,
      storage: storage.refreshTokens,
      scopes,
      tokens,
      logger,
      clock,
    });

    this.personalAccessTokens = new PersonalAccessTokenService({
      config,
      storage: storage.personalAccessTokens,
      scopes,
      logger,
      clock,
    });

    this.introspection = new TokenIntrospectionService({
      config,
      tokens,
      personalAccessTokens: this.personalAccessTokens,
      refreshTokenStorage: storage.refreshTokens,
      revokedTokenStorage: storage.revokedTokens,
      logger,
      clock,
    });

    this.grants = {
      authorization_code: createAuthorizationCodeHandler({
        authorizationCodes: this.authorizationCodes,
      }),
      client_credentials: createClientCredentialsHandler({ scopes, tokens }),
      password: createPasswordHandler({
        scopes,
        tokens,
        verifier: options.userCredentialsVerifier,
      }),
      refresh_token: createRefreshTokenHandler({ refreshTokens: this.refreshTokens }),
    };
  }

  // Clients

  registerClient(input: CreateClientInput): Promise<RegisteredClient> {
    return this.guard('registerClient', () => this.clients.register(input));
  }

  authenticateClient(credentials: ClientCredentials): Promise<ClientView> {
    return this.guard('authenticateClient', () =>
      this.clients.authenticate(credentials.clientId, credentials.clientSecret)
    );
  }

  findClient(clientId: string): Promise<ClientView | null> {
    return this.guard('findClient', () => this.clients.find(clientId));
  }

  listClients(): Promise<ClientView[]> {
    return this.guard('listClients', () => this.clients.list());
  }

  rotateClientSecret(clientId: string): Promise<string> {
    return this.guard('rotateClientSecret', () => this.clients.rotateSecret(clientId));
  }

  revokeClient(clientId: string): Promise<void> {
    return this.guard('revokeClient', () => this.clients.revoke(clientId));
  }

  // Authorization endpoint

  /**
   * Issue an authorization code for a user who has already authenticated and consented
   */
  authorize(request: AuthorizationRequest): Promise<AuthorizationResponse> {
    return this.guard('authorize', async () => {
      const client = await this.clients.find(request.clientId);
      if (!client || client.revoked) {
        throw OAuthError.invalidClient();
      }

      return this.authorizationCodes.issue(client, {
        userId: request.userId,
        redirectUri: request.redirectUri,
        scopes: this.scopes.parseScopes(request.scope),
        codeChallenge: request.codeChallenge,
        codeChallengeMethod: request.codeChallengeMethod,
      });
    });
  }

  // Token endpoint

  /**
   * Authenticate the client, then run the requested grant
   */
  token(credentials: ClientCredentials, params: TokenRequestParams): Promise<TokenResponse> {
    return this.guard('token', async () => {
      const client = await this.clients.authenticate(credentials.clientId, credentials.clientSecret);
      return this.runGrant(client, params);
    });
  }

  /**
   * Run a grant for a client the transport has already authenticated
   */
  grant(client: ClientView, params: TokenRequestParams): Promise<TokenResponse> {
    return this.guard('grant', () => this.runGrant(client, params));
  }

  // Introspection and revocation

  introspect(token: string, hint?: string): Promise<IntrospectionResponse> {
    return this.guard('introspect', () =>
      this.introspection.introspect(token, parseTokenTypeHint(hint))
    );
  }

  /**
   * Revoke a token (RFC 7009). When `clientId` is given, only that client's tokens are affected.
   */
  revoke(token: string, options: { hint?: string; clientId?: string } = {}): Promise<void> {
    return this.guard('revoke', () =>
      this.introspection.revoke(token, {
        hint: parseTokenTypeHint(options.hint),
        clientId: options.clientId,
      })
    );
  }

  /**
   * Validate a bearer token presented to a resource server
   *
   * @throws OAuthError invalid_token or insufficient_scope
   */
  validateBearer(token: string, requiredScopes: readonly string[] = []): Promise<BearerPrincipal> {
    return this.guard('validateBearer', async () => {
      const principal = await this.introspection.authenticateBearer(token);
      if (!principal) {
        throw OAuthError.invalidToken();
      }

      if (!this.scopes.satisfies(principal.scopes, requiredScopes)) {
        throw OAuthError.insufficientScope(`Required scopes: ${requiredScopes.join(' ')}`);
      }

      return principal;
    });
  }

  // Personal access tokens

  createPersonalAccessToken(
    userId: string,
    input: CreatePersonalAccessTokenInput
  ): Promise<CreatedPersonalAccessToken> {
    return this.guard('createPersonalAccessToken', () =>
      this.personalAccessTokens.create(userId, input)
    );
  }

  listPersonalAccessTokens(userId: string): Promise<PersonalAccessTokenView[]> {
    return this.guard('listPersonalAccessTokens', () => this.personalAccessTokens.list(userId));
  }

  revokePersonalAccessToken(userId: string, tokenId: string): Promise<boolean> {
    return this.guard('revokePersonalAccessToken', () =>
      this.personalAccessTokens.revoke(userId, tokenId)
    );
  }

  /**
   * Revoke every live refresh token descended from the same grant
   */
  revokeRefreshTokenFamily(familyId: string): Promise<number> {
    return this.guard('revokeRefreshTokenFamily', () =>
      this.refreshTokens.revokeFamily(familyId, 'revoked')
    );
  }

  // Discovery

  /**
   * Authorization server metadata (RFC 8414)
   */
  metadata(baseUrl: string): AuthorizationServerMetadata {
    const base = baseUrl.replace(/\/+$/, '');
    const confidentialAuthMethods = [CLIENT_AUTH_BASIC, CLIENT_AUTH_POST];

    return {
      issuer: this.config.issuer,
      authorization_endpoint: `${base}/authorize`,
      token_endpoint: `${base}/token`,
      revocation_endpoint: `${base}/revoke`,
      introspection_endpoint: `${base}/introspect`,
      response_types_supported: [...SUPPORTED_RESPONSE_TYPES],
      grant_types_supported: [...SUPPORTED_GRANT_TYPES],
      token_endpoint_auth_methods_supported: [...SUPPORTED_CLIENT_AUTH_METHODS],
      revocation_endpoint_auth_methods_supported: [...SUPPORTED_CLIENT_AUTH_METHODS],
      introspection_endpoint_auth_methods_supported: confidentialAuthMethods,
      code_challenge_methods_supported: this.config.policy.allowPlainPkce
        ? [...SUPPORTED_CODE_CHALLENGE_METHODS]
        : [CODE_CHALLENGE_METHOD_S256],
      scopes_supported: this.scopes.all().map((scope) => scope.id),
    };
  }

  private async runGrant(client: ClientView, params: TokenRequestParams): Promise<TokenResponse> {
    if (client.revoked) {
      throw OAuthError.invalidClient();
    }

    const grantType = parseGrantType(params);
    const response = await this.grants[grantType](client, params);

    audit(
      this.logger,
      {
        event: 'oauth.token_issued',
        clientId: client.clientId,
        grantType,
        scope: response.scope,
        refreshToken: response.refresh_token !== undefined,
      },
      `Token issued via ${grantType}`
    );

    return response;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isOAuthError(error)) {
        throw error;
      }
      this.logger.error({ err: error, operation }, 'Unexpected error in authorization server');
      throw OAuthError.serverError(error);
    }
  }
}
