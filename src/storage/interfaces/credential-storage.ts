import type { Credential, CredentialKind } from '../../types/token.js';

/**
 * Storage interface for issued credentials
 *
 * Entries are keyed by the signature of their opaque token, one key space per
 * credential kind. Expiry is not enforced here: callers treat expired entries
 * as not found (see isExpired).
 */
export interface ICredentialStorage {
  /**
   * Store a new credential. Fails if the key is taken.
   */
  put(kind: CredentialKind, signature: string, credential: Credential): Promise<void>;

  /**
   * Find a credential by signature
   */
  get(kind: CredentialKind, signature: string): Promise<Credential | null>;

  /**
   * Remove a credential; a missing key is not an error
   */
  delete(kind: CredentialKind, signature: string): Promise<void>;

  /**
   * Mark an authorization code as redeemed.
   *
   * Returns true on the first redemption. On any later call the code is
   * considered stolen: every access and refresh token derived from it is
   * deleted and false is returned.
   */
  markUsed(signature: string): Promise<boolean>;

  /**
   * Delete every access and refresh token whose parentCode is the signature
   */
  revokeDescendants(signature: string): Promise<number>;

  /**
   * Delete expired credentials (cleanup)
   */
  deleteExpired(now: Date): Promise<number>;

  /**
   * Run fn in the store's exclusive section. Read-then-write sequences of a
   * request must run in here so concurrent requests cannot interleave.
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T>;
}
