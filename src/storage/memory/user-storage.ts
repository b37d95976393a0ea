import type { ResourceOwner, CreateResourceOwnerInput } from '../../types/user.js';
import type { IResourceOwnerRegistry } from '../interfaces/user-storage.js';

/**
 * In-memory resource owner storage implementation
 */
export class MemoryResourceOwnerStorage implements IResourceOwnerRegistry {
  private owners = new Map<string, ResourceOwner>();

  async create(input: CreateResourceOwnerInput): Promise<ResourceOwner> {
    if (this.owners.has(input.username)) {
      throw new Error(`Resource owner already exists: ${input.username}`);
    }

    const owner: ResourceOwner = {
      username: input.username,
      secret: input.secret,
    };
    this.owners.set(owner.username, owner);

    return owner;
  }

  async findByUsername(username: string): Promise<ResourceOwner | null> {
    return this.owners.get(username) ?? null;
  }

  async delete(username: string): Promise<void> {
    this.owners.delete(username);
  }
}
