import type { OAuthClient, CreateClientInput } from '../../types/client.js';
import type { IClientRegistry } from '../interfaces/client-storage.js';
import { ScopeSet } from '../../services/scope-service.js';

/**
 * In-memory OAuth client storage implementation
 */
export class MemoryClientStorage implements IClientRegistry {
  private clients = new Map<string, OAuthClient>();

  async create(input: CreateClientInput): Promise<OAuthClient> {
    if (this.clients.has(input.id)) {
      throw new Error(`Client already exists: ${input.id}`);
    }

    const client: OAuthClient = {
      id: input.id,
      redirectUri: input.redirectUri,
    };

    if (input.secret) {
      client.secret = input.secret;
    }

    if (input.allowedScope !== undefined) {
      client.allowedScope = ScopeSet.parse(input.allowedScope);
    }

    this.clients.set(client.id, client);

    return client;
  }

  async findById(id: string): Promise<OAuthClient | null> {
    return this.clients.get(id) ?? null;
  }

  async delete(id: string): Promise<void> {
    this.clients.delete(id);
  }
}
