import {
  type OAuthErrorCode,
  type OAuthErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CLIENT,
  ERROR_INVALID_GRANT,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_UNSUPPORTED_RESPONSE_TYPE,
  ERROR_INVALID_SCOPE,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_SERVER_ERROR,
  ERROR_INVALID_TOKEN,
  ERROR_INSUFFICIENT_SCOPE,
} from './error-codes.js';

/**
 * OAuth 2.0 Error Response
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  state?: string;
}

/**
 * OAuth 2.0 Error class
 * Represents RFC-compliant OAuth errors
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: OAuthErrorStatus;
  public readonly description: string;
  public readonly state?: string;

  constructor(
    code: OAuthErrorCode,
    description?: string,
    options?: {
      state?: string;
      cause?: unknown;
    }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.state) {
      this.state = options.state;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.state) {
      response.state = this.state;
    }

    return response;
  }

  // Factory methods for common errors

  static invalidRequest(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description, { state });
  }

  static invalidClient(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_CLIENT, description);
  }

  static invalidGrant(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_GRANT, description);
  }

  static unauthorizedClient(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNAUTHORIZED_CLIENT, description, { state });
  }

  static unsupportedResponseType(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_RESPONSE_TYPE, description, { state });
  }

  static invalidScope(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_SCOPE, description, { state });
  }

  static unsupportedGrantType(description?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_GRANT_TYPE, description);
  }

  /**
   * Generic server error. The cause is kept for logging only and is never
   * part of the response body.
   */
  static serverError(cause?: unknown): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, undefined, { cause });
  }

  static invalidToken(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_TOKEN, description);
  }

  static insufficientScope(description?: string): OAuthError {
    return new OAuthError(ERROR_INSUFFICIENT_SCOPE, description);
  }
}

/**
 * Narrow an unknown thrown value to an OAuthError with the given code
 */
export function isOAuthError(error: unknown, code?: OAuthErrorCode): error is OAuthError {
  return error instanceof OAuthError && (code === undefined || error.code === code);
}
