import type { ResourceOwner, CreateResourceOwnerInput } from '../../types/user.js';

/**
 * Pluggable resource owner lookup
 *
 * The OAuth server does NOT manage users - it delegates the lookup to this
 * interface and verifies the presented password with the configured
 * SecretVerifier. This allows integration with any user management system.
 *
 * Example implementation:
 *
 * ```typescript
 * class DirectoryOwnerStorage implements IResourceOwnerStorage {
 *   async findByUsername(username: string): Promise<ResourceOwner | null> {
 *     const entry = await this.directory.lookup(username);
 *     return entry ? { username: entry.uid, secret: entry.passwordHash } : null;
 *   }
 * }
 * ```
 */
export interface IResourceOwnerStorage {
  findByUsername(username: string): Promise<ResourceOwner | null>;
}

/**
 * Resource owner storage that can also register owners (reference implementations)
 */
export interface IResourceOwnerRegistry extends IResourceOwnerStorage {
  create(input: CreateResourceOwnerInput): Promise<ResourceOwner>;
  delete(username: string): Promise<void>;
}
