import type { ScopeSet } from '../services/scope-service.js';

/**
 * Kinds of credential kept by the credential store
 */
export type CredentialKind = 'access_token' | 'refresh_token' | 'authorization_code';

/**
 * An issued access token, refresh token or authorization code.
 * Stored under the signature of its opaque token.
 */
export interface Credential {
  clientId: string;
  resourceOwnerId?: string; // Absent for client credentials
  scope: ScopeSet;
  issuedAt: Date;
  expiresAt: Date;
  redirectUri?: string; // Authorization codes only
  parentCode?: string; // Signature of the authorization code that produced it
  used: boolean; // Authorization codes only
}

export function isExpired(credential: Credential, now: Date): boolean {
  return credential.expiresAt.getTime() <= now.getTime();
}
