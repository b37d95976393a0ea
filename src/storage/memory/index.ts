import type { IStorage } from '../interfaces/index.js';
import { MemoryClientStorage } from './client-storage.js';
import { MemoryResourceOwnerStorage } from './user-storage.js';
import { MemoryCredentialStorage } from './credential-storage.js';

export { MemoryClientStorage } from './client-storage.js';
export { MemoryResourceOwnerStorage } from './user-storage.js';
export { MemoryCredentialStorage } from './credential-storage.js';

export interface MemoryStorage extends IStorage {
  clients: MemoryClientStorage;
  owners: MemoryResourceOwnerStorage;
  credentials: MemoryCredentialStorage;
}

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): MemoryStorage {
  return {
    clients: new MemoryClientStorage(),
    owners: new MemoryResourceOwnerStorage(),
    credentials: new MemoryCredentialStorage(),
  };
}
