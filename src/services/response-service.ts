import type { EngineResponse, TokenResponse, CodeResponse } from '../types/oauth.js';
import { OAuthError } from '../errors/oauth-error.js';
import { BearerError } from '../errors/bearer-error.js';
import { ERROR_INVALID_CLIENT } from '../errors/error-codes.js';
import {
  CONTENT_TYPE_JSON,
  CONTENT_TYPE_TEXT,
  DEFAULT_REALM,
  HEADER_CACHE_CONTROL,
  HEADER_CONTENT_TYPE,
  HEADER_LOCATION,
  HEADER_PRAGMA,
  HEADER_WWW_AUTHENTICATE,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../config/constants.js';

const NO_STORE_HEADERS = {
  [HEADER_CACHE_CONTROL]: TOKEN_CACHE_CONTROL,
  [HEADER_PRAGMA]: TOKEN_PRAGMA,
};

/**
 * JSON response with no-store caching headers
 */
export function jsonResponse(status: number, body: object): EngineResponse {
  return {
    kind: 'json',
    status,
    headers: { [HEADER_CONTENT_TYPE]: CONTENT_TYPE_JSON, ...NO_STORE_HEADERS },
    body,
  };
}

export function textResponse(status: number, body: string): EngineResponse {
  return {
    kind: 'text',
    status,
    headers: { [HEADER_CONTENT_TYPE]: CONTENT_TYPE_TEXT },
    body,
  };
}

export function emptyResponse(status: number): EngineResponse {
  return { kind: 'empty', status, headers: {} };
}

/**
 * Append params to the query (sorted by key, existing ones kept) or
 * replace the fragment of the given URI
 */
export function buildRedirectUri(
  uri: string,
  params: Record<string, string>,
  useFragment: boolean
): string {
  const url = new URL(uri);
  const entries = Object.entries(params).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  if (useFragment) {
    url.hash = new URLSearchParams(entries).toString();
  } else {
    for (const [key, value] of entries) {
      url.searchParams.append(key, value);
    }
    url.searchParams.sort();
  }

  return url.toString();
}

export function redirectResponse(
  uri: string,
  params: Record<string, string>,
  useFragment: boolean
): EngineResponse {
  const location = buildRedirectUri(uri, params, useFragment);

  return {
    kind: 'redirect',
    status: 302,
    headers: { [HEADER_LOCATION]: location },
    location,
  };
}

/**
 * Direct error delivery: JSON body with the error's status.
 * Client authentication failures carry a Basic challenge.
 */
export function errorResponse(error: unknown): EngineResponse {
  const oauthError = OAuthError.from(error);
  const response = jsonResponse(oauthError.statusCode, oauthError.toJSON());

  if (oauthError.code === ERROR_INVALID_CLIENT) {
    response.headers[HEADER_WWW_AUTHENTICATE] = `Basic realm="${DEFAULT_REALM}"`;
  }

  return response;
}

/**
 * Redirect error delivery onto an already validated redirect URI
 */
export function redirectErrorResponse(
  uri: string,
  error: unknown,
  useFragment: boolean,
  state?: string
): EngineResponse {
  const oauthError = OAuthError.from(error).withState(state);
  return redirectResponse(uri, oauthError.toParams(), useFragment);
}

/**
 * Flat parameter map of a token response (for fragment delivery)
 */
export function tokenResponseParams(response: TokenResponse): Record<string, string> {
  const params: Record<string, string> = {
    token_type: response.token_type,
    access_token: response.access_token,
    expires_in: String(response.expires_in),
  };

  if (response.refresh_token) {
    params['refresh_token'] = response.refresh_token;
  }
  if (response.scope) {
    params['scope'] = response.scope;
  }
  if (response.state) {
    params['state'] = response.state;
  }

  return params;
}

export function codeResponseParams(response: CodeResponse): Record<string, string> {
  const params: Record<string, string> = { code: response.code };

  if (response.state) {
    params['state'] = response.state;
  }

  return params;
}

/**
 * Bearer error delivery: challenge header only.
 * Unknown errors and server errors degrade to a bare 500.
 */
export function bearerErrorResponse(error: BearerError): EngineResponse {
  if (error.statusCode === 500) {
    return emptyResponse(500);
  }

  return {
    kind: 'empty',
    status: error.statusCode,
    headers: { [HEADER_WWW_AUTHENTICATE]: error.toChallenge() },
  };
}
