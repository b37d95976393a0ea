import type { ServerConfig } from '../config/index.js';
import type { Credential } from '../types/token.js';
import type { ICredentialStorage } from '../storage/interfaces/credential-storage.js';
import { isExpired } from '../types/token.js';
import { BearerError } from '../errors/bearer-error.js';
import { parseToken, MalformedTokenError } from '../crypto/opaque-token.js';
import { ScopeSet } from './scope-service.js';

/**
 * Where a bearer token may be presented
 * RFC 6750 Section 2
 */
export interface BearerTokenSources {
  authorization?: string; // Authorization request header
  formToken?: string; // access_token form-encoded body parameter
  queryToken?: string; // access_token URI query parameter
}

const BEARER_SCHEME = /^Bearer(?:\s+(.*))?$/i;

/**
 * Extract the raw bearer token
 *
 * @throws BearerError protected-resource challenge when none is present,
 *   invalid_request when more than one method is used or the header is empty
 */
export function extractBearerToken(sources: BearerTokenSources): string {
  const found: string[] = [];

  if (sources.authorization) {
    const match = BEARER_SCHEME.exec(sources.authorization.trim());
    if (match) {
      const token = (match[1] ?? '').trim();
      if (!token) {
        throw BearerError.invalidRequest('malformed authorization header');
      }
      found.push(token);
    }
  }

  if (sources.formToken !== undefined) {
    found.push(sources.formToken);
  }

  if (sources.queryToken !== undefined) {
    found.push(sources.queryToken);
  }

  if (found.length > 1) {
    throw BearerError.invalidRequest('multiple token sources');
  }

  const [token] = found;
  if (token === undefined) {
    throw BearerError.protectedResource();
  }
  if (token.length === 0) {
    throw BearerError.invalidRequest('empty access token');
  }

  return token;
}

/**
 * Validates bearer tokens presented to protected resources
 */
export class BearerValidator {
  constructor(
    private readonly config: ServerConfig,
    private readonly credentials: ICredentialStorage,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Check a presented access token and the scope it grants
   *
   * @throws BearerError invalid_token or insufficient_scope
   */
  async validate(token: string, requiredScope: ScopeSet = ScopeSet.empty()): Promise<Credential> {
    let signature: string;
    try {
      signature = parseToken(this.config.secret, token).signature;
    } catch (error) {
      if (error instanceof MalformedTokenError) {
        throw BearerError.invalidToken('malformed token');
      }
      throw error;
    }

    const credential = await this.credentials.get('access_token', signature);
    if (!credential) {
      throw BearerError.invalidToken('unknown token');
    }

    if (isExpired(credential, this.now())) {
      throw BearerError.invalidToken('expired token');
    }

    if (!credential.scope.includes(requiredScope)) {
      throw BearerError.insufficientScope(requiredScope.toString());
    }

    return credential;
  }
}
