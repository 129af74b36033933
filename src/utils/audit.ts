/**
 * Structured audit logging for security-relevant events.
 * All events are logged at info level with a structured `event` field,
 * except replay detections which are logged at warn.
 */

import type { Logger } from './logger.js';

export type AuditEvent =
  | 'oauth.client_registered'
  | 'oauth.client_secret_rotated'
  | 'oauth.client_revoked'
  | 'oauth.authorization_code_issued'
  | 'oauth.authorization_code_replay'
  | 'oauth.token_issued'
  | 'oauth.token_refreshed'
  | 'oauth.token_revoked'
  | 'oauth.refresh_token_replay'
  | 'oauth.refresh_token_family_revoked'
  | 'oauth.personal_access_token_created'
  | 'oauth.personal_access_token_revoked';

export interface AuditContext {
  event: AuditEvent;
  clientId?: string;
  userId?: string;
  grantType?: string;
  scopes?: string[];
  tokenId?: string;
  familyId?: string;
  [key: string]: unknown;
}

const REPLAY_EVENTS: ReadonlySet<AuditEvent> = new Set([
  'oauth.authorization_code_replay',
  'oauth.refresh_token_replay',
]);

/**
 * Log a structured audit event.
 */
export function audit(logger: Logger, context: AuditContext, message: string): void {
  if (REPLAY_EVENTS.has(context.event)) {
    logger.warn(context, `[AUDIT] ${message}`);
    return;
  }
  logger.info(context, `[AUDIT] ${message}`);
}
