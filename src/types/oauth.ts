import type { ScopeSet } from '../services/scope-service.js';
import type { ClientCredentials } from './client.js';
import type {
  SUPPORTED_GRANT_TYPES,
  SUPPORTED_RESPONSE_TYPES,
  SUPPORTED_TOKEN_TYPE_HINTS,
} from '../config/constants.js';

/**
 * OAuth 2.0 Grant Types
 * RFC 6749 Section 4
 */
export type GrantType = (typeof SUPPORTED_GRANT_TYPES)[number];

/**
 * Response types for authorization endpoint
 */
export type ResponseType = (typeof SUPPORTED_RESPONSE_TYPES)[number];

/**
 * Token type hints for revocation and introspection
 * RFC 7009 Section 2.1
 */
export type TokenTypeHint = (typeof SUPPORTED_TOKEN_TYPE_HINTS)[number];

export type HttpMethod = 'GET' | 'POST';

/**
 * Authorization Request (GET/POST /authorize)
 * RFC 6749 Section 4.1.1, 4.2.1
 */
export interface AuthorizationRequest {
  method: HttpMethod;
  responseType: string;
  clientId: string;
  redirectUri: string;
  scope: ScopeSet;
  state?: string;
  username?: string;
  password?: string;
}

/**
 * Token Request (POST /token)
 * RFC 6749 Section 4.1.3, 4.3.2, 4.4.2, 6
 */
export interface TokenRequest {
  method: HttpMethod;
  grantType: string;
  scope: ScopeSet;
  client?: ClientCredentials;
  username?: string;
  password?: string;
  code?: string;
  redirectUri?: string;
  refreshToken?: string;
}

/**
 * Token Revocation Request
 * RFC 7009 Section 2.1
 */
export interface RevocationRequest {
  method: HttpMethod;
  token?: string;
  tokenTypeHint?: string;
  client?: ClientCredentials;
}

/**
 * Token Introspection Request
 * RFC 7662 Section 2.1
 */
export type IntrospectionRequest = RevocationRequest;

/**
 * Token Response
 * RFC 6749 Section 5.1
 */
export interface TokenResponse {
  token_type: 'bearer';
  access_token: string;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
  state?: string;
}

/**
 * Authorization code response
 * RFC 6749 Section 4.1.2
 */
export interface CodeResponse {
  code: string;
  state?: string;
}

/**
 * Token Introspection Response
 * RFC 7662 Section 2.2
 */
export interface IntrospectionResponse {
  active: boolean;
  scope?: string;
  client_id?: string;
  username?: string;
  token_type?: TokenTypeHint;
  exp?: number;
  iat?: number;
}

/**
 * Transport-neutral response produced by the engine.
 * A transport adapter turns it into a concrete HTTP response.
 */
export type EngineResponse =
  | {
      kind: 'json';
      status: number;
      headers: Record<string, string>;
      body: object;
    }
  | {
      kind: 'redirect';
      status: 302;
      headers: Record<string, string>;
      location: string;
    }
  | {
      kind: 'text';
      status: number;
      headers: Record<string, string>;
      body: string;
    }
  | {
      kind: 'empty';
      status: number;
      headers: Record<string, string>;
    };
