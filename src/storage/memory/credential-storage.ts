import type { Credential, CredentialKind } from '../../types/token.js';
import type { ICredentialStorage } from '../interfaces/credential-storage.js';

/**
 * In-memory credential storage implementation
 *
 * One map per credential kind, keyed by token signature. runExclusive
 * serializes callers on a promise chain; it is not reentrant.
 */
export class MemoryCredentialStorage implements ICredentialStorage {
  private maps: Record<CredentialKind, Map<string, Credential>> = {
    access_token: new Map(),
    refresh_token: new Map(),
    authorization_code: new Map(),
  };
  private queue: Promise<void> = Promise.resolve();

  async put(kind: CredentialKind, signature: string, credential: Credential): Promise<void> {
    const map = this.maps[kind];
    if (map.has(signature)) {
      throw new Error(`Duplicate ${kind} signature`);
    }
    map.set(signature, { ...credential });
  }

  async get(kind: CredentialKind, signature: string): Promise<Credential | null> {
    const credential = this.maps[kind].get(signature);
    return credential ? { ...credential } : null;
  }

  async delete(kind: CredentialKind, signature: string): Promise<void> {
    this.maps[kind].delete(signature);
  }

  async markUsed(signature: string): Promise<boolean> {
    const code = this.maps.authorization_code.get(signature);
    if (!code) {
      return false;
    }

    if (code.used) {
      await this.revokeDescendants(signature);
      return false;
    }

    this.maps.authorization_code.set(signature, { ...code, used: true });
    return true;
  }

  async revokeDescendants(signature: string): Promise<number> {
    let revoked = 0;

    for (const kind of ['access_token', 'refresh_token'] as const) {
      const map = this.maps[kind];
      for (const [key, credential] of map) {
        if (credential.parentCode === signature) {
          map.delete(key);
          revoked++;
        }
      }
    }

    return revoked;
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const kind of ['access_token', 'refresh_token', 'authorization_code'] as const) {
      const map = this.maps[kind];
      for (const [key, credential] of map) {
        if (credential.expiresAt.getTime() > now.getTime()) {
          continue;
        }
        // A used code stays while tokens derived from it live, so a replay still revokes them
        if (kind === 'authorization_code' && credential.used && this.hasDescendants(key)) {
          continue;
        }
        map.delete(key);
        deleted++;
      }
    }

    return deleted;
  }

  private hasDescendants(signature: string): boolean {
    for (const kind of ['access_token', 'refresh_token'] as const) {
      for (const credential of this.maps[kind].values()) {
        if (credential.parentCode === signature) {
          return true;
        }
      }
    }
    return false;
  }

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.queue.then(fn);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Number of stored credentials of a kind (diagnostics and tests)
   */
  count(kind: CredentialKind): number {
    return this.maps[kind].size;
  }
}
