import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';
import { generateRandomBase64Url } from '../crypto/random.js';
import {
  createServerConfig,
  ConfigError,
  type ServerConfig,
  type ServerConfigInput,
} from './server-config.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
export function readSecret(envVar: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const filePath = env[`${envVar}_FILE`];

  if (filePath) {
    if (!existsSync(filePath)) {
      throw new ConfigError([`${envVar}_FILE points to a missing file: ${filePath}`]);
    }
    return readFileSync(filePath, 'utf-8').trim();
  }

  return env[envVar];
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ConfigError([`${name} must be an integer, got "${raw}"`]);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name]?.toLowerCase();
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new ConfigError([`${name} must be "true" or "false", got "${raw}"`]);
}

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
const signingAlgorithmSchema = z.enum([
  constants.SIGNING_ALGORITHM_HS256,
  ...constants.ASYMMETRIC_SIGNING_ALGORITHMS,
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    baseUrl: string;
  };
  logging: {
    level: LogLevel;
  };
  oauth: ServerConfig;
  /**
   * True when no JWT_SIGNING_KEY was configured and a random one was generated.
   * Tokens signed with it do not survive a restart.
   */
  ephemeralSigningKey: boolean;
}

function loadSigning(env: NodeJS.ProcessEnv): {
  signing: ServerConfigInput['signing'];
  ephemeral: boolean;
} {
  const parsedAlgorithm = signingAlgorithmSchema.safeParse(
    env['JWT_ALGORITHM'] ?? constants.SIGNING_ALGORITHM_HS256
  );
  if (!parsedAlgorithm.success) {
    throw new ConfigError([`JWT_ALGORITHM is not supported: ${env['JWT_ALGORITHM'] ?? ''}`]);
  }
  const algorithm = parsedAlgorithm.data;
  const keyId = env['JWT_KEY_ID'];

  if (algorithm === constants.SIGNING_ALGORITHM_HS256) {
    const secret = readSecret('JWT_SIGNING_KEY', env);
    if (secret) {
      return { signing: { algorithm, secret, keyId }, ephemeral: false };
    }
    // 256-bit random secret
    return {
      signing: { algorithm, secret: generateRandomBase64Url(32), keyId },
      ephemeral: true,
    };
  }

  return {
    signing: {
      algorithm,
      privateKey: readSecret('JWT_PRIVATE_KEY', env) ?? '',
      publicKey: readSecret('JWT_PUBLIC_KEY', env) ?? '',
      keyId,
    },
    ephemeral: false,
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = readInt(env, 'PORT', 3000);
  const host = env['HOST'] ?? '0.0.0.0';
  const baseUrl =
    env['BASE_URL'] ?? `http://${host === '0.0.0.0' ? 'localhost' : host}:${port}`;

  const parsedLevel = logLevelSchema.safeParse(env['LOG_LEVEL'] ?? 'info');
  if (!parsedLevel.success) {
    throw new ConfigError([`LOG_LEVEL is not a valid level: ${env['LOG_LEVEL'] ?? ''}`]);
  }

  const { signing, ephemeral } = loadSigning(env);

  const oauth = createServerConfig({
    issuer: env['OAUTH_ISSUER'] ?? baseUrl,
    accessTokenTtl: readInt(env, 'ACCESS_TOKEN_TTL', constants.DEFAULT_ACCESS_TOKEN_TTL),
    refreshTokenTtl: readInt(env, 'REFRESH_TOKEN_TTL', constants.DEFAULT_REFRESH_TOKEN_TTL),
    authorizationCodeTtl: readInt(
      env,
      'AUTHORIZATION_CODE_TTL',
      constants.DEFAULT_AUTHORIZATION_CODE_TTL
    ),
    personalAccessTokenTtl: readInt(
      env,
      'PERSONAL_ACCESS_TOKEN_TTL',
      constants.DEFAULT_PERSONAL_ACCESS_TOKEN_TTL
    ),
    personalAccessClientId:
      env['PERSONAL_ACCESS_CLIENT_ID'] ?? constants.DEFAULT_PERSONAL_ACCESS_CLIENT_ID,
    signing,
    policy: {
      requirePkceForConfidentialClients: readBoolean(
        env,
        'REQUIRE_PKCE_FOR_CONFIDENTIAL_CLIENTS',
        false
      ),
      allowPlainPkce: readBoolean(env, 'ALLOW_PLAIN_PKCE', true),
      revokeAccessTokensOnRefreshRevocation: readBoolean(
        env,
        'REVOKE_ACCESS_TOKENS_ON_REFRESH_REVOCATION',
        false
      ),
      revokeFamilyOnReplay: readBoolean(env, 'REVOKE_FAMILY_ON_REPLAY', false),
    },
  });

  return {
    server: {
      port,
      host,
      nodeEnv: env['NODE_ENV'] ?? 'development',
      baseUrl,
    },
    logging: {
      level: parsedLevel.data,
    },
    oauth,
    ephemeralSigningKey: ephemeral,
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

export { createServerConfig, ConfigError, serverConfigSchema } from './server-config.js';
export type { ServerConfig, ServerConfigInput, ServerPolicy, SigningConfig } from './server-config.js';

// Re-export constants
export { constants };
