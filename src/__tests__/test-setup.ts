import { expect } from 'vitest';
import { AuthorizationServer } from '../server.js';
import { createServerConfig, type ServerConfigInput } from '../config/server-config.js';
import { createMemoryStorage } from '../storage/memory/index.js';
import { createLogger } from '../utils/logger.js';
import { ScopeManager } from '../services/scope-service.js';
import { generateRandomBase64Url } from '../crypto/random.js';
import { generateCodeChallenge } from '../crypto/pkce.js';
import { OAuthError } from '../errors/oauth-error.js';
import type { OAuthErrorCode } from '../errors/error-codes.js';
import type { IStorage, IUserCredentialsVerifier } from '../storage/interfaces/index.js';
import type { User } from '../types/user.js';
import type { GrantType } from '../types/oauth.js';
import type { Clock } from '../utils/clock.js';

/**
 * Test fixtures and helpers
 */

export const TEST_ISSUER = 'https://auth.test.local';
export const TEST_SIGNING_SECRET = 'test-secret-for-hs256-at-least-32-chars';
export const REDIRECT_URI = 'https://app.test.local/callback';

// 2025-01-01T00:00:00Z
export const START_TIME = Date.UTC(2025, 0, 1);

export const silentLogger = createLogger({ level: 'silent' });

/**
 * Clock the tests move by hand
 */
export class ManualClock {
  private now: number;

  constructor(start: number = START_TIME) {
    this.now = start;
  }

  readonly clock: Clock = () => this.now;

  advance(seconds: number): void {
    this.now += seconds * 1000;
  }
}

export class TestCredentialsVerifier implements IUserCredentialsVerifier {
  private users = new Map<string, { password: string; user: User }>();

  addUser(username: string, password: string, user: User): this {
    this.users.set(username, { password, user });
    return this;
  }

  async verifyCredentials(username: string, password: string): Promise<User | null> {
    const entry = this.users.get(username);
    return entry && entry.password === password ? entry.user : null;
  }
}

export interface TestServerOptions {
  config?: Partial<ServerConfigInput>;
  scopes?: ScopeManager;
  userCredentialsVerifier?: IUserCredentialsVerifier;
}

export interface TestServer {
  server: AuthorizationServer;
  storage: IStorage;
  time: ManualClock;
}

export function createTestServer(options: TestServerOptions = {}): TestServer {
  const storage = createMemoryStorage();
  const time = new ManualClock();

  const server = new AuthorizationServer({
    config: createServerConfig({
      issuer: TEST_ISSUER,
      signing: { algorithm: 'HS256', secret: TEST_SIGNING_SECRET },
      ...options.config,
    }),
    storage,
    scopes: options.scopes,
    userCredentialsVerifier: options.userCredentialsVerifier,
    logger: silentLogger,
    clock: time.clock,
  });

  return { server, storage, time };
}

export async function registerConfidentialClient(
  server: AuthorizationServer,
  overrides: { clientSecret?: string; allowedScopes?: string[]; allowedGrants?: GrantType[] } = {}
) {
  const { client, clientSecret } = await server.registerClient({
    name: 'Confidential Test Client',
    clientType: 'confidential',
    clientSecret: overrides.clientSecret,
    redirectUris: [REDIRECT_URI],
    allowedGrants: overrides.allowedGrants ?? [
      'authorization_code',
      'client_credentials',
      'password',
      'refresh_token',
    ],
    allowedScopes: overrides.allowedScopes ?? ['api:read', 'api:write', 'users:read'],
    defaultScopes: ['api:read'],
  });
  return { client, clientSecret: requireValue(clientSecret) };
}

export async function registerPublicClient(server: AuthorizationServer) {
  const { client } = await server.registerClient({
    name: 'Public Test Client',
    clientType: 'public',
    redirectUris: [REDIRECT_URI],
    allowedGrants: ['authorization_code', 'refresh_token'],
    allowedScopes: ['api:read', 'api:write'],
  });
  return client;
}

// Generate a valid PKCE code verifier (43-128 characters using unreserved characters)
export function generateCodeVerifier(): string {
  // 48 bytes = 64 base64url characters
  return generateRandomBase64Url(48);
}

// Create Basic auth header
export function basicAuth(clientId: string, clientSecret: string): string {
  const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
  return `Basic ${credentials}`;
}

/**
 * Fail the test when a value the flow must produce is missing
 */
export function requireValue<T>(value: T | null | undefined, what = 'value'): T {
  if (value === null || value === undefined) {
    throw new Error(`Expected ${what} to be present`);
  }
  return value;
}

/**
 * Assert that a promise rejects with an OAuthError of the given code
 */
export async function expectOAuthError(promise: Promise<unknown>, code: OAuthErrorCode): Promise<void> {
  const error: unknown = await promise.then(
    () => null,
    (reason: unknown) => reason
  );
  expect(error).toBeInstanceOf(OAuthError);
  expect(error).toMatchObject({ code });
}

export { generateCodeChallenge };
