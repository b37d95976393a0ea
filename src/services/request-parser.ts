import { z } from 'zod';
import type {
  AuthorizationRequest,
  HttpMethod,
  RevocationRequest,
  TokenRequest,
} from '../types/oauth.js';
import type { ClientCredentials } from '../types/client.js';
import { OAuthError } from '../errors/oauth-error.js';
import { ScopeSet } from './scope-service.js';

/**
 * Form and query fields as handed over by a transport adapter.
 * A repeated parameter arrives as an array.
 */
export type RequestFields = Record<string, string | string[] | undefined>;

/**
 * Transport-neutral view of an incoming HTTP request
 */
export interface RawRequest {
  method: string;
  fields: RequestFields;
  /** Raw Authorization header, if any */
  authorization?: string;
}

// RFC 6749 Section 3.1: parameters MUST NOT be included more than once
const param = (name: string) =>
  z
    .string({ invalid_type_error: `Parameter ${name} must not be repeated` })
    .optional();

const methodSchema = z.enum(['GET', 'POST'], {
  errorMap: () => ({ message: 'Unsupported request method' }),
});

const authorizationSchema = z.object({
  response_type: param('response_type'),
  client_id: param('client_id'),
  redirect_uri: param('redirect_uri'),
  scope: param('scope'),
  state: param('state'),
  username: param('username'),
  password: param('password'),
});

const tokenSchema = z.object({
  grant_type: param('grant_type'),
  client_id: param('client_id'),
  client_secret: param('client_secret'),
  scope: param('scope'),
  username: param('username'),
  password: param('password'),
  code: param('code'),
  redirect_uri: param('redirect_uri'),
  refresh_token: param('refresh_token'),
});

const revocationSchema = z.object({
  token: param('token'),
  token_type_hint: param('token_type_hint'),
  client_id: param('client_id'),
  client_secret: param('client_secret'),
});

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw OAuthError.invalidRequest(result.error.issues[0]?.message);
  }
  return result.data;
}

function parseMethod(method: string): HttpMethod {
  return parseWith(methodSchema, method.toUpperCase());
}

/**
 * Extract client credentials from a Basic Authorization header
 * RFC 6749 Section 2.3.1
 *
 * Returns null when the header uses another scheme.
 *
 * @throws OAuthError invalid_client when the Basic credentials are malformed
 */
export function parseBasicAuth(authorization: string | undefined): ClientCredentials | null {
  if (!authorization || !/^Basic\s/i.test(authorization)) {
    return null;
  }

  const decoded = Buffer.from(authorization.slice(6).trim(), 'base64').toString('utf-8');
  const colonIndex = decoded.indexOf(':');
  if (colonIndex <= 0) {
    throw OAuthError.invalidClient('Malformed Basic credentials');
  }

  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, colonIndex)),
      clientSecret: decodeURIComponent(decoded.slice(colonIndex + 1)),
    };
  } catch {
    throw OAuthError.invalidClient('Malformed Basic credentials');
  }
}

/**
 * Client credentials from the Basic header, falling back to the
 * client_id / client_secret body parameters
 */
function clientCredentials(
  authorization: string | undefined,
  clientId: string | undefined,
  clientSecret: string | undefined
): ClientCredentials | undefined {
  const basic = parseBasicAuth(authorization);
  if (basic) {
    if (clientId !== undefined && clientId !== basic.clientId) {
      throw OAuthError.invalidRequest('client_id does not match the authenticated client');
    }
    return basic;
  }

  if (!clientId) {
    return undefined;
  }

  return clientSecret !== undefined ? { clientId, clientSecret } : { clientId };
}

/**
 * Parse an authorization endpoint request (GET or POST /authorize)
 *
 * @throws OAuthError invalid_request
 */
export function parseAuthorizationRequest(raw: RawRequest): AuthorizationRequest {
  const method = parseMethod(raw.method);
  const fields = parseWith(authorizationSchema, raw.fields);

  const request: AuthorizationRequest = {
    method,
    responseType: fields.response_type ?? '',
    clientId: fields.client_id ?? '',
    redirectUri: fields.redirect_uri ?? '',
    scope: ScopeSet.parse(fields.scope),
  };

  if (fields.state) {
    request.state = fields.state;
  }
  if (fields.username !== undefined) {
    request.username = fields.username;
  }
  if (fields.password !== undefined) {
    request.password = fields.password;
  }

  return request;
}

/**
 * Parse a token endpoint request (POST /token)
 *
 * @throws OAuthError invalid_request, or invalid_client for malformed Basic credentials
 */
export function parseTokenRequest(raw: RawRequest): TokenRequest {
  const method = parseMethod(raw.method);
  const fields = parseWith(tokenSchema, raw.fields);

  const request: TokenRequest = {
    method,
    grantType: fields.grant_type ?? '',
    scope: ScopeSet.parse(fields.scope),
  };

  const client = clientCredentials(raw.authorization, fields.client_id, fields.client_secret);
  if (client) {
    request.client = client;
  }

  if (fields.username !== undefined) {
    request.username = fields.username;
  }
  if (fields.password !== undefined) {
    request.password = fields.password;
  }
  if (fields.code !== undefined) {
    request.code = fields.code;
  }
  if (fields.redirect_uri !== undefined) {
    request.redirectUri = fields.redirect_uri;
  }
  if (fields.refresh_token !== undefined) {
    request.refreshToken = fields.refresh_token;
  }

  return request;
}

/**
 * Parse a revocation or introspection request
 *
 * @throws OAuthError invalid_request, or invalid_client for malformed Basic credentials
 */
export function parseRevocationRequest(raw: RawRequest): RevocationRequest {
  const method = parseMethod(raw.method);
  const fields = parseWith(revocationSchema, raw.fields);

  const request: RevocationRequest = { method };

  const client = clientCredentials(raw.authorization, fields.client_id, fields.client_secret);
  if (client) {
    request.client = client;
  }
  if (fields.token !== undefined) {
    request.token = fields.token;
  }
  if (fields.token_type_hint) {
    request.tokenTypeHint = fields.token_type_hint;
  }

  return request;
}

export const parseIntrospectionRequest = parseRevocationRequest;
