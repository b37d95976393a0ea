/**
 * OAuth 2.0 Constants
 */

// Grant types (RFC 6749 Section 4)
export const GRANT_TYPE_PASSWORD = 'password' as const;
export const GRANT_TYPE_CLIENT_CREDENTIALS = 'client_credentials' as const;
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;

export const SUPPORTED_GRANT_TYPES = [
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
] as const;

// Response types
export const RESPONSE_TYPE_TOKEN = 'token' as const;
export const RESPONSE_TYPE_CODE = 'code' as const;
export const SUPPORTED_RESPONSE_TYPES = [RESPONSE_TYPE_TOKEN, RESPONSE_TYPE_CODE] as const;

// Token type hints (RFC 7009 Section 2.1)
export const TOKEN_TYPE_HINT_ACCESS_TOKEN = 'access_token' as const;
export const TOKEN_TYPE_HINT_REFRESH_TOKEN = 'refresh_token' as const;
export const SUPPORTED_TOKEN_TYPE_HINTS = [
  TOKEN_TYPE_HINT_ACCESS_TOKEN,
  TOKEN_TYPE_HINT_REFRESH_TOKEN,
] as const;

// Token types
export const TOKEN_TYPE_BEARER = 'bearer' as const;

// Default lifespans (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_REFRESH_TOKEN_TTL = 604800; // 7 days
export const DEFAULT_AUTHORIZATION_CODE_TTL = 600; // 10 minutes

// Opaque token key length (bytes)
export const DEFAULT_TOKEN_KEY_LENGTH = 16;
export const MIN_SECRET_LENGTH = 16; // bytes

// Realm used in challenges when nothing more specific applies
export const DEFAULT_REALM = 'OAuth2';

// Rate limiting defaults
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 100;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_CONTENT_TYPE = 'Content-Type';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_LOCATION = 'Location';

// Content types
export const CONTENT_TYPE_JSON = 'application/json;charset=UTF-8';
export const CONTENT_TYPE_TEXT = 'text/plain;charset=UTF-8';
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// Cache control for token and error responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';

// Shown on GET /authorize, since no authorization form is rendered
export const AUTHORIZATION_FORM_NOTICE =
  'This authorization server does not provide an authorization form.\n' +
  'Please submit the resource owner username and password in a POST request.';
