import type { OAuthClient, CreateClientInput } from '../../types/client.js';

/**
 * Storage interface for OAuth client lookup
 *
 * The engine only ever reads clients; registration is the host's concern.
 */
export interface IClientStorage {
  /**
   * Find a client by its public identifier
   */
  findById(id: string): Promise<OAuthClient | null>;
}

/**
 * Client storage that can also register clients (reference implementations)
 */
export interface IClientRegistry extends IClientStorage {
  create(input: CreateClientInput): Promise<OAuthClient>;
  delete(id: string): Promise<void>;
}
