import type { ScopeSet } from '../services/scope-service.js';

/**
 * OAuth 2.0 Client
 *
 * A client without a secret is public; one with a secret is confidential.
 */
export interface OAuthClient {
  id: string;
  secret?: string; // As understood by the configured SecretVerifier
  redirectUri: string; // Registered redirect URI (exact match required)
  allowedScope?: ScopeSet; // Overrides the server-wide allowed scope
}

/**
 * Client creation input
 */
export interface CreateClientInput {
  id: string;
  secret?: string;
  redirectUri: string;
  allowedScope?: string;
}

/**
 * Client credentials as presented on a request
 */
export interface ClientCredentials {
  clientId: string;
  clientSecret?: string;
}

export function isConfidential(client: OAuthClient): boolean {
  return client.secret !== undefined && client.secret.length > 0;
}
