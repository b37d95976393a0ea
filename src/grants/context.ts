import type { ServerConfig } from '../config/index.js';
import type { IStorage } from '../storage/interfaces/index.js';
import type { SecretVerifier } from '../crypto/hash.js';
import type { OAuthClient } from '../types/client.js';
import type { ResourceOwner } from '../types/user.js';
import type { TokenRequest, TokenResponse } from '../types/oauth.js';
import type { TokenService } from '../services/token-service.js';
import type { ScopeSet } from '../services/scope-service.js';
import { OAuthError } from '../errors/oauth-error.js';
import { parseToken, MalformedTokenError } from '../crypto/opaque-token.js';

/**
 * Everything a grant flow needs, shared per server instance
 */
export interface GrantContext {
  config: ServerConfig;
  storage: IStorage;
  tokens: TokenService;
  verifySecret: SecretVerifier;
  now: () => Date;
}

/**
 * A token endpoint flow, run after client authentication
 */
export type GrantHandler = (request: TokenRequest, client: OAuthClient) => Promise<TokenResponse>;

/**
 * Scope a client may be granted
 */
export function allowedScopeFor(client: OAuthClient, config: ServerConfig): ScopeSet {
  return client.allowedScope ?? config.allowedScope;
}

/**
 * Look up and verify a resource owner. Returns null on any mismatch.
 */
export async function authenticateOwner(
  context: GrantContext,
  username: string | undefined,
  password: string | undefined
): Promise<ResourceOwner | null> {
  if (!username || password === undefined) {
    return null;
  }

  const owner = await context.storage.owners.findByUsername(username);
  if (!owner) {
    return null;
  }

  return (await context.verifySecret(owner.secret, password)) ? owner : null;
}

/**
 * Signature of a presented code or refresh token
 *
 * @throws OAuthError invalid_grant when the token is malformed or forged
 */
export function grantSignature(context: GrantContext, token: string): string {
  try {
    return parseToken(context.config.secret, token).signature;
  } catch (error) {
    if (error instanceof MalformedTokenError) {
      throw OAuthError.invalidGrant('Malformed grant token');
    }
    throw error;
  }
}
