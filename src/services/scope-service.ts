import { OAuthError } from '../errors/oauth-error.js';
import { WILDCARD_SCOPE } from '../config/constants.js';

/**
 * A registered scope
 */
export interface Scope {
  id: string;
  description: string;
  /** Metadata only. Extra consent for dangerous scopes is up to the caller. */
  dangerous: boolean;
}

export const DEFAULT_SCOPES: readonly Scope[] = [
  { id: WILDCARD_SCOPE, description: 'Full access to every scope', dangerous: true },
  { id: 'users:read', description: 'Read user profiles', dangerous: false },
  { id: 'users:write', description: 'Create and update users', dangerous: false },
  { id: 'users:delete', description: 'Delete users', dangerous: true },
  { id: 'api:read', description: 'Read API resources', dangerous: false },
  { id: 'api:write', description: 'Modify API resources', dangerous: false },
  { id: 'admin', description: 'Administrative access', dangerous: true },
];

const SCOPE_TOKEN_PATTERN = /^[\x21\x23-\x5B\x5D-\x7E]+$/; // RFC 6749 Section 3.3 scope-token

/**
 * Registry of known scopes and the rules for granting them
 */
export class ScopeManager {
  private scopes = new Map<string, Scope>();

  constructor(scopes: Iterable<Scope> = []) {
    for (const scope of scopes) {
      this.register(scope);
    }
  }

  /**
   * Registry seeded with the built-in scopes
   */
  static withDefaults(): ScopeManager {
    return new ScopeManager(DEFAULT_SCOPES);
  }

  /**
   * Register (or replace) a scope
   */
  register(scope: Scope): this {
    if (!SCOPE_TOKEN_PATTERN.test(scope.id)) {
      throw new Error(`Invalid scope identifier: "${scope.id}"`);
    }
    this.scopes.set(scope.id, { ...scope });
    return this;
  }

  get(id: string): Scope | undefined {
    return this.scopes.get(id);
  }

  exists(id: string): boolean {
    return this.scopes.has(id);
  }

  all(): Scope[] {
    return Array.from(this.scopes.values());
  }

  dangerous(): Scope[] {
    return this.all().filter((scope) => scope.dangerous);
  }

  /**
   * Scopes whose identifier starts with the given prefix, e.g. `users:`
   */
  filter(prefix: string): Scope[] {
    return this.all().filter((scope) => scope.id.startsWith(prefix));
  }

  /**
   * Parse a space-delimited scope string into an array (duplicates dropped)
   */
  parseScopes(scopeString: string | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    return Array.from(new Set(scopeString.split(' ').filter((s) => s.length > 0)));
  }

  /**
   * Convert scope array to space-delimited string
   */
  formatScopes(scopes: readonly string[]): string {
    return scopes.join(' ');
  }

  /**
   * Validate requested scopes against the registry and an allow-list.
   * An allow-list containing `*` admits every registered scope.
   *
   * @returns The requested scopes, de-duplicated
   * @throws OAuthError invalid_scope
   */
  validate(requested: readonly string[], allowed: readonly string[]): string[] {
    const unique = Array.from(new Set(requested));
    const allowsEverything = allowed.includes(WILDCARD_SCOPE);

    const unknown = unique.filter((scope) => !this.exists(scope));
    if (unknown.length > 0) {
      throw OAuthError.invalidScope(`Unknown scopes: ${unknown.join(', ')}`);
    }

    const notAllowed = unique.filter((scope) => !allowsEverything && !allowed.includes(scope));
    if (notAllowed.length > 0) {
      throw OAuthError.invalidScope(`Scopes not allowed for this client: ${notAllowed.join(', ')}`);
    }

    return unique;
  }

  /**
   * Resource-server side check: do the granted scopes cover every required scope?
   * A grant containing `*` satisfies everything.
   */
  satisfies(granted: readonly string[], required: readonly string[]): boolean {
    if (granted.includes(WILDCARD_SCOPE)) {
      return true;
    }
    return required.every((scope) => granted.includes(scope));
  }

  /**
   * True if every requested scope was part of the original grant
   * (used when narrowing on refresh; `*` is not expanded here)
   */
  isSubset(requested: readonly string[], granted: readonly string[]): boolean {
    return requested.every((scope) => granted.includes(scope));
  }
}
