import type { OAuthClient } from '../../types/client.js';

/**
 * Storage interface for OAuth client management.
 * Hashing, validation and redaction live in the client registry.
 */
export interface IClientStorage {
  /**
   * Persist a new client. Returns false, storing nothing, when the client_id
   * is already taken; the check and the write must be one atomic step
   * (a unique constraint in a database backend).
   */
  insert(client: OAuthClient): Promise<boolean>;

  /**
   * Find a client by client_id
   */
  findById(clientId: string): Promise<OAuthClient | null>;

  /**
   * Update a client, returning the stored result (null if unknown)
   */
  update(
    clientId: string,
    changes: Partial<Omit<OAuthClient, 'clientId' | 'createdAt'>>
  ): Promise<OAuthClient | null>;

  /**
   * List all clients
   */
  list(): Promise<OAuthClient[]>;
}
