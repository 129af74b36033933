import type { ServerConfig } from '../config/server-config.js';
import type { ClientView } from '../types/client.js';
import type { CodeChallengeMethod, TokenResponse } from '../types/oauth.js';
import type { AuthorizationCode, AuthorizationCodeState } from '../types/token.js';
import type { IAuthorizationCodeStorage } from '../storage/interfaces/index.js';
import type { Logger } from '../utils/logger.js';
import type { Clock } from '../utils/clock.js';
import type { ScopeManager } from './scope-service.js';
import type { TokenService } from './token-service.js';
import { OAuthError } from '../errors/oauth-error.js';
import { audit } from '../utils/audit.js';
import { generateAuthorizationCode, generateId } from '../crypto/random.js';
import { hashToken } from '../crypto/hash.js';
import { isValidCodeChallenge, isValidCodeVerifier, verifyCodeChallenge } from '../crypto/pkce.js';
import {
  CODE_CHALLENGE_METHOD_PLAIN,
  CODE_CHALLENGE_METHOD_S256,
  GRANT_TYPE_AUTHORIZATION_CODE,
} from '../config/constants.js';

export interface IssueCodeRequest {
  userId: string;
  redirectUri: string;
  scopes: string[];
  codeChallenge?: string;
  codeChallengeMethod?: string;
}

export interface IssuedCode {
  code: string;
  expiresAt: Date;
}

export interface ExchangeCodeRequest {
  code?: string;
  redirectUri?: string;
  codeVerifier?: string;
}

export interface AuthorizationCodeServiceOptions {
  config: ServerConfig;
  storage: IAuthorizationCodeStorage;
  scopes: ScopeManager;
  tokens: TokenService;
  logger: Logger;
  clock: Clock;
}

/**
 * Derive the lifecycle state of a stored code
 */
export function authorizationCodeState(code: AuthorizationCode, now: number): AuthorizationCodeState {
  if (code.consumedAt) {
    return 'consumed';
  }
  if (code.expiresAt.getTime() <= now) {
    return 'expired';
  }
  return 'issued';
}

/**
 * Issuance and single-use redemption of authorization codes (RFC 6749 Section 4.1, RFC 7636)
 */
export class AuthorizationCodeService {
  private readonly config: ServerConfig;
  private readonly storage: IAuthorizationCodeStorage;
  private readonly scopes: ScopeManager;
  private readonly tokens: TokenService;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: AuthorizationCodeServiceOptions) {
    this.config = options.config;
    this.storage = options.storage;
    this.scopes = options.scopes;
    this.tokens = options.tokens;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  /**
   * Issue a code for an already authenticated and consenting user
   */
  async issue(client: ClientView, request: IssueCodeRequest): Promise<IssuedCode> {
    if (client.revoked) {
      throw OAuthError.invalidClient();
    }

    if (!client.allowedGrants.includes(GRANT_TYPE_AUTHORIZATION_CODE)) {
      throw OAuthError.unsupportedGrantType(
        'Client is not authorized for authorization code grant'
      );
    }

    if (!client.redirectUris.includes(request.redirectUri)) {
      throw OAuthError.invalidRequest('Invalid redirect_uri');
    }

    const scopes =
      request.scopes.length > 0
        ? this.scopes.validate(request.scopes, client.allowedScopes)
        : [...client.defaultScopes];

    const pkce = this.resolvePkce(client, request);

    const value = generateAuthorizationCode();
    const now = this.clock();
    const expiresAt = new Date(now + this.config.authorizationCodeTtl * 1000);

    await this.storage.insert({
      id: generateId(),
      tokenHash: hashToken(value),
      clientId: client.clientId,
      userId: request.userId,
      redirectUri: request.redirectUri,
      scopes,
      codeChallenge: pkce?.challenge,
      codeChallengeMethod: pkce?.method,
      issuedAt: new Date(now),
      expiresAt,
    });

    audit(
      this.logger,
      {
        event: 'oauth.authorization_code_issued',
        clientId: client.clientId,
        userId: request.userId,
        scopes,
        pkce: pkce?.method ?? 'none',
      },
      'Authorization code issued'
    );

    return { code: value, expiresAt };
  }

  /**
   * Redeem a code for tokens.
   *
   * Every check reads immutable fields of the stored code; the one mutation is
   * the conditional `consumedAt` update, so a code redeems at most once even
   * under concurrent requests. A failed PKCE check leaves the code unconsumed.
   */
  async exchange(client: ClientView, request: ExchangeCodeRequest): Promise<TokenResponse> {
    const { code, redirectUri, codeVerifier } = request;

    if (!code) {
      throw OAuthError.invalidRequest('Missing code parameter');
    }

    if (!redirectUri) {
      throw OAuthError.invalidRequest('Missing redirect_uri parameter');
    }

    const record = await this.storage.findByTokenHash(hashToken(code));
    if (!record) {
      throw OAuthError.invalidGrant('Invalid authorization code');
    }

    const now = this.clock();
    const state = authorizationCodeState(record, now);

    if (state === 'consumed') {
      this.auditReplay(record, client);
      throw OAuthError.invalidGrant('Authorization code has already been used');
    }

    if (state === 'expired') {
      throw OAuthError.invalidGrant('Authorization code has expired');
    }

    if (record.clientId !== client.clientId) {
      throw OAuthError.invalidGrant('Authorization code was issued to a different client');
    }

    // Exact match required (RFC 6749 Section 4.1.3)
    if (record.redirectUri !== redirectUri) {
      throw OAuthError.invalidGrant('redirect_uri does not match');
    }

    if (record.codeChallenge && record.codeChallengeMethod) {
      if (!codeVerifier) {
        throw OAuthError.invalidRequest('Missing code_verifier parameter');
      }
      if (
        !isValidCodeVerifier(codeVerifier) ||
        !verifyCodeChallenge(codeVerifier, record.codeChallenge, record.codeChallengeMethod)
      ) {
        throw OAuthError.invalidGrant('Invalid code_verifier');
      }
    } else if (codeVerifier !== undefined) {
      throw OAuthError.invalidGrant('code_verifier sent for a code issued without a challenge');
    }

    const consumed = await this.storage.updateIf(
      record.id,
      { consumedAt: undefined },
      { consumedAt: new Date(now) }
    );
    if (!consumed) {
      this.auditReplay(record, client);
      throw OAuthError.invalidGrant('Authorization code has already been used');
    }

    return this.tokens.issueTokenPair({
      client,
      userId: record.userId,
      scopes: record.scopes,
    });
  }

  private resolvePkce(
    client: ClientView,
    request: IssueCodeRequest
  ): { challenge: string; method: CodeChallengeMethod } | null {
    const { codeChallenge, codeChallengeMethod } = request;

    if (!codeChallenge) {
      if (codeChallengeMethod) {
        throw OAuthError.invalidRequest('code_challenge_method sent without code_challenge');
      }
      if (client.clientType === 'public') {
        throw OAuthError.invalidRequest('Missing code_challenge parameter (PKCE required for public clients)');
      }
      if (this.config.policy.requirePkceForConfidentialClients) {
        throw OAuthError.invalidRequest('Missing code_challenge parameter (PKCE required)');
      }
      return null;
    }

    // RFC 7636 Section 4.3: method defaults to plain
    const method = codeChallengeMethod ?? CODE_CHALLENGE_METHOD_PLAIN;

    if (method !== CODE_CHALLENGE_METHOD_S256 && method !== CODE_CHALLENGE_METHOD_PLAIN) {
      throw OAuthError.invalidRequest(`Unsupported code_challenge_method: ${method}`);
    }

    if (method === CODE_CHALLENGE_METHOD_PLAIN && !this.config.policy.allowPlainPkce) {
      throw OAuthError.invalidRequest('Only S256 code_challenge_method is supported');
    }

    if (!isValidCodeChallenge(codeChallenge, method)) {
      throw OAuthError.invalidRequest('Invalid code_challenge format');
    }

    return { challenge: codeChallenge, method };
  }

  private auditReplay(record: AuthorizationCode, client: ClientView): void {
    audit(
      this.logger,
      {
        event: 'oauth.authorization_code_replay',
        clientId: client.clientId,
        issuedTo: record.clientId,
        userId: record.userId,
        codeId: record.id,
      },
      'Authorization code presented after it was consumed'
    );
  }
}
