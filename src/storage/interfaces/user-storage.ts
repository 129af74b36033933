import type { Context } from 'hono';
import type { User } from '../../types/user.js';

/**
 * Authentication result from the user authenticator
 */
export type AuthenticationResult =
  | { authenticated: true; user: User }
  | { authenticated: false; redirectTo: string };

/**
 * Pluggable user authenticator for the authorization endpoint
 *
 * The OAuth server does NOT manage users or sessions - it delegates to this
 * interface. Consent screens are the implementation's concern as well.
 *
 * ```typescript
 * class SessionAuthenticator implements IUserAuthenticator {
 *   async authenticate(ctx: Context): Promise<AuthenticationResult> {
 *     const user = await this.sessions.get(getCookie(ctx, 'session_id'));
 *     if (!user) {
 *       return { authenticated: false, redirectTo: `/login?return=${encodeURIComponent(ctx.req.url)}` };
 *     }
 *     return { authenticated: true, user };
 *   }
 * }
 * ```
 */
export interface IUserAuthenticator {
  /**
   * Authenticate the current request, or name the login page to send the user to
   */
  authenticate(ctx: Context): Promise<AuthenticationResult>;
}

/**
 * Verifies resource owner credentials for the password grant (RFC 6749 Section 4.3)
 */
export interface IUserCredentialsVerifier {
  /**
   * Returns the user when the credentials match, null otherwise
   */
  verifyCredentials(username: string, password: string): Promise<User | null>;
}
