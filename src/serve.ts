import { serve } from '@hono/node-server';
import type { Context } from 'hono';
import { createOAuth2Server } from './app.js';
import { AuthorizationServer } from './server.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { getConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import type { IUserAuthenticator, AuthenticationResult } from './storage/interfaces/index.js';

// Load configuration
const config = getConfig();
const logger = createLogger({ level: config.logging.level });

/**
 * Example user authenticator for development.
 * In production, implement your own authenticator that integrates with your user system.
 */
class DevelopmentUserAuthenticator implements IUserAuthenticator {
  async authenticate(ctx: Context): Promise<AuthenticationResult> {
    const userId = ctx.req.query('user_id') ?? ctx.req.header('X-User-Id');

    if (!userId) {
      // In development, auto login as test user
      return {
        authenticated: true,
        user: { id: 'test-user-001', username: 'testuser', name: 'Test User' },
      };
    }

    return {
      authenticated: true,
      user: { id: userId, username: `user-${userId}` },
    };
  }
}

if (config.ephemeralSigningKey) {
  logger.warn('JWT_SIGNING_KEY is not set; using a random key. Issued tokens will not survive a restart.');
}

const server = new AuthorizationServer({
  config: config.oauth,
  storage: createMemoryStorage(),
  logger,
});

const app = createOAuth2Server({
  server,
  userAuthenticator:
    config.server.nodeEnv === 'production' ? undefined : new DevelopmentUserAuthenticator(),
  baseUrl: config.server.baseUrl,
  enableLogging: config.server.nodeEnv !== 'test',
});

serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info(
      {
        address: info.address,
        port: info.port,
        issuer: config.oauth.issuer,
        metadata: `${config.server.baseUrl}/.well-known/oauth-authorization-server`,
      },
      'OAuth 2.0 Authorization Server listening (in-memory storage; data is lost on restart)'
    );
  }
);
