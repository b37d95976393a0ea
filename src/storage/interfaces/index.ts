export * from './client-storage.js';
export * from './user-storage.js';
export * from './credential-storage.js';

import type { IClientStorage } from './client-storage.js';
import type { IResourceOwnerStorage } from './user-storage.js';
import type { ICredentialStorage } from './credential-storage.js';

/**
 * Combined storage interface
 */
export interface IStorage {
  clients: IClientStorage;
  owners: IResourceOwnerStorage;
  credentials: ICredentialStorage;
}
