import type { ErrorHandler, MiddlewareHandler } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import type { Logger } from '../utils/logger.js';
import { OAuthError } from '../errors/oauth-error.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_WWW_AUTHENTICATE,
} from '../config/constants.js';

/**
 * WWW-Authenticate challenge for errors that carry one
 * (RFC 6749 Section 5.2, RFC 6750 Section 3)
 */
function challengeFor(error: OAuthError): string | null {
  switch (error.code) {
    case 'invalid_client':
      return 'Basic realm="oauth"';
    case 'invalid_token':
    case 'insufficient_scope':
      return `Bearer realm="oauth", error="${error.code}", error_description="${error.description.replace(/"/g, "'")}"`;
    default:
      return null;
  }
}

/**
 * Global error handler for OAuth errors
 *
 * Transforms errors into RFC-compliant OAuth error responses. Anything that is
 * not an OAuthError is logged and answered with a bare server_error.
 */
export function createErrorHandler(logger: Logger): ErrorHandler<{ Variables: OAuthVariables }> {
  return (err, c) => {
    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    if (err instanceof OAuthError) {
      if (err.statusCode >= 500) {
        logger.error({ err: err.cause ?? err, path: c.req.path }, 'OAuth server error');
      } else {
        logger.debug({ error: err.code, path: c.req.path }, err.description);
      }

      const challenge = challengeFor(err);
      if (challenge) {
        c.header(HEADER_WWW_AUTHENTICATE, challenge);
      }

      return c.json(err.toJSON(), err.statusCode);
    }

    logger.error({ err, path: c.req.path }, 'Unhandled error');
    return c.json(OAuthError.serverError(err).toJSON(), 500);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    if (c.req.path.endsWith('/authorize')) {
      c.header(
        'Content-Security-Policy',
        "default-src 'self'; frame-ancestors 'none'; form-action 'self'"
      );
    }
  };
}

/**
 * Request logging middleware. Logs method, path, status and duration only.
 */
export function requestLogger(logger: Logger): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    logger.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration: Date.now() - start,
        clientId: c.get('client')?.client.clientId,
      },
      'request completed'
    );
  };
}
