import type { OAuthClient } from '../../types/client.js';
import type { IClientStorage } from '../interfaces/client-storage.js';

/**
 * In-memory OAuth client storage implementation
 */
export class MemoryClientStorage implements IClientStorage {
  private clients = new Map<string, OAuthClient>();

  async insert(client: OAuthClient): Promise<boolean> {
    if (this.clients.has(client.clientId)) {
      return false;
    }
    this.clients.set(client.clientId, { ...client });
    return true;
  }

  async findById(clientId: string): Promise<OAuthClient | null> {
    const client = this.clients.get(clientId);
    return client ? { ...client } : null;
  }

  async update(
    clientId: string,
    changes: Partial<Omit<OAuthClient, 'clientId' | 'createdAt'>>
  ): Promise<OAuthClient | null> {
    const client = this.clients.get(clientId);
    if (!client) return null;

    const updated: OAuthClient = { ...client, ...changes };
    this.clients.set(clientId, updated);
    return { ...updated };
  }

  async list(): Promise<OAuthClient[]> {
    return Array.from(this.clients.values()).map((client) => ({ ...client }));
  }
}
