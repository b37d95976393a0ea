import type { ServerConfig } from './config/index.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { SecretVerifier } from './crypto/hash.js';
import type { GrantContext, GrantHandler } from './grants/context.js';
import type { AuthorizeHandler } from './grants/authorize/handler.js';
import type { Credential } from './types/token.js';
import type {
  AuthorizationRequest,
  EngineResponse,
  GrantType,
  IntrospectionRequest,
  IntrospectionResponse,
  RevocationRequest,
  TokenRequest,
  TokenTypeHint,
} from './types/oauth.js';
import type { BearerTokenSources } from './services/bearer-validator.js';
import type { RawRequest } from './services/request-parser.js';
import { isExpired } from './types/token.js';
import { OAuthError } from './errors/oauth-error.js';
import { BearerError } from './errors/bearer-error.js';
import { plainSecretVerifier } from './crypto/hash.js';
import { parseToken, MalformedTokenError, TokenGenerationError } from './crypto/opaque-token.js';
import { TokenService } from './services/token-service.js';
import { ClientAuthenticator } from './services/client-authenticator.js';
import { BearerValidator, extractBearerToken } from './services/bearer-validator.js';
import { ScopeSet } from './services/scope-service.js';
import { logger, errorFields } from './services/logger.js';
import {
  parseAuthorizationRequest,
  parseIntrospectionRequest,
  parseRevocationRequest,
  parseTokenRequest,
} from './services/request-parser.js';
import {
  bearerErrorResponse,
  emptyResponse,
  errorResponse,
  jsonResponse,
} from './services/response-service.js';
import { createAuthorizeHandler } from './grants/authorize/handler.js';
import { createPasswordHandler } from './grants/password/handler.js';
import { createClientCredentialsHandler } from './grants/client-credentials/handler.js';
import { createAuthorizationCodeHandler } from './grants/authorization-code/handler.js';
import { createRefreshTokenHandler } from './grants/refresh-token/handler.js';
import {
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_CLIENT_CREDENTIALS,
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_REFRESH_TOKEN,
  SUPPORTED_GRANT_TYPES,
  SUPPORTED_TOKEN_TYPE_HINTS,
  TOKEN_TYPE_HINT_ACCESS_TOKEN,
  TOKEN_TYPE_HINT_REFRESH_TOKEN,
} from './config/constants.js';

export interface AuthorizationServerOptions {
  storage: IStorage;
  config: ServerConfig;
  /** Verifies client and resource owner secrets (default: constant-time equality) */
  verifySecret?: SecretVerifier;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Outcome of authenticating a protected resource request
 */
export type ResourceAuthResult =
  | { authenticated: true; credential: Credential }
  | { authenticated: false; response: EngineResponse };

interface FoundToken {
  kind: TokenTypeHint;
  signature: string;
  credential: Credential;
}

/**
 * OAuth 2.0 authorization server engine
 *
 * Transport neutral: every endpoint takes a typed request (or a raw one,
 * see the handle* methods) and resolves to an EngineResponse. Errors never
 * escape; they are turned into the response the protocol prescribes.
 */
export class AuthorizationServer {
  readonly config: ServerConfig;
  readonly storage: IStorage;
  readonly tokens: TokenService;

  private readonly now: () => Date;
  private readonly clientAuthenticator: ClientAuthenticator;
  private readonly bearerValidator: BearerValidator;
  private readonly authorizeHandler: AuthorizeHandler;
  private readonly grants: Record<GrantType, GrantHandler>;

  constructor(options: AuthorizationServerOptions) {
    const { storage, config, verifySecret = plainSecretVerifier, now = () => new Date() } = options;

    this.config = config;
    this.storage = storage;
    this.now = now;
    this.tokens = new TokenService(config, storage.credentials);
    this.clientAuthenticator = new ClientAuthenticator(storage.clients, verifySecret);
    this.bearerValidator = new BearerValidator(config, storage.credentials, now);

    const context: GrantContext = { config, storage, tokens: this.tokens, verifySecret, now };

    this.authorizeHandler = createAuthorizeHandler(context);
    this.grants = {
      [GRANT_TYPE_PASSWORD]: createPasswordHandler(context),
      [GRANT_TYPE_CLIENT_CREDENTIALS]: createClientCredentialsHandler(context),
      [GRANT_TYPE_AUTHORIZATION_CODE]: createAuthorizationCodeHandler(context),
      [GRANT_TYPE_REFRESH_TOKEN]: createRefreshTokenHandler(context),
    };
  }

  /**
   * Authorization endpoint
   * RFC 6749 Section 3.1
   */
  authorize(request: AuthorizationRequest): Promise<EngineResponse> {
    return this.respond('authorize', () => this.authorizeHandler(request));
  }

  /**
   * Token endpoint
   * RFC 6749 Section 3.2
   */
  token(request: TokenRequest): Promise<EngineResponse> {
    return this.respond('token', () => this.exchange(request));
  }

  /**
   * Token introspection endpoint
   * RFC 7662
   */
  introspect(request: IntrospectionRequest): Promise<EngineResponse> {
    return this.respond('introspect', () => this.inspect(request));
  }

  /**
   * Token revocation endpoint
   * RFC 7009
   */
  revoke(request: RevocationRequest): Promise<EngineResponse> {
    return this.respond('revoke', () => this.revokeToken(request));
  }

  handleAuthorizationRequest(raw: RawRequest): Promise<EngineResponse> {
    return this.respond('authorize', () => this.authorizeHandler(parseAuthorizationRequest(raw)));
  }

  handleTokenRequest(raw: RawRequest): Promise<EngineResponse> {
    return this.respond('token', () => this.exchange(parseTokenRequest(raw)));
  }

  handleIntrospectionRequest(raw: RawRequest): Promise<EngineResponse> {
    return this.respond('introspect', () => this.inspect(parseIntrospectionRequest(raw)));
  }

  handleRevocationRequest(raw: RawRequest): Promise<EngineResponse> {
    return this.respond('revoke', () => this.revokeToken(parseRevocationRequest(raw)));
  }

  /**
   * Validate the bearer token of a protected resource request
   * RFC 6750
   */
  async authenticateResource(
    sources: BearerTokenSources,
    requiredScope: ScopeSet | string = ScopeSet.empty()
  ): Promise<ResourceAuthResult> {
    const scope = typeof requiredScope === 'string' ? ScopeSet.parse(requiredScope) : requiredScope;

    try {
      const token = extractBearerToken(sources);
      const credential = await this.bearerValidator.validate(token, scope);
      return { authenticated: true, credential };
    } catch (error) {
      if (error instanceof BearerError) {
        return { authenticated: false, response: bearerErrorResponse(error) };
      }
      logger.error('Bearer validation failed', errorFields(error));
      return { authenticated: false, response: bearerErrorResponse(BearerError.serverError(error)) };
    }
  }

  /**
   * Remove expired credentials from the store
   */
  sweepExpired(): Promise<number> {
    return this.storage.credentials.deleteExpired(this.now());
  }

  private async exchange(request: TokenRequest): Promise<EngineResponse> {
    if (request.method !== 'POST') {
      throw OAuthError.invalidRequest('Token requests must use POST');
    }

    if (!request.grantType) {
      throw OAuthError.invalidRequest('Missing grant_type parameter');
    }

    const grantType = SUPPORTED_GRANT_TYPES.find((type) => type === request.grantType);
    if (!grantType) {
      throw OAuthError.unsupportedGrantType(`Unsupported grant type: ${request.grantType}`);
    }

    const client = await this.clientAuthenticator.authenticate(request.client);
    const response = await this.grants[grantType](request, client);

    return jsonResponse(200, response);
  }

  private async inspect(request: IntrospectionRequest): Promise<EngineResponse> {
    const { client, signature, hint } = await this.tokenRequestContext(request);
    const found = await this.findToken(signature, hint);

    if (!found || isExpired(found.credential, this.now())) {
      return jsonResponse(200, { active: false } satisfies IntrospectionResponse);
    }

    const { credential } = found;
    if (credential.clientId !== client.id) {
      throw OAuthError.invalidClient('Token was issued to a different client');
    }

    const body: IntrospectionResponse = {
      active: true,
      client_id: credential.clientId,
      token_type: found.kind,
      exp: Math.floor(credential.expiresAt.getTime() / 1000),
      iat: Math.floor(credential.issuedAt.getTime() / 1000),
    };

    if (!credential.scope.isEmpty()) {
      body.scope = credential.scope.toString();
    }
    if (credential.resourceOwnerId) {
      body.username = credential.resourceOwnerId;
    }

    return jsonResponse(200, body);
  }

  private async revokeToken(request: RevocationRequest): Promise<EngineResponse> {
    const { client, signature, hint } = await this.tokenRequestContext(request);
    const { credentials } = this.storage;

    await credentials.runExclusive(async () => {
      const found = await this.findToken(signature, hint);

      // RFC 7009 Section 2.2: unknown tokens are not an error
      if (!found) {
        return;
      }

      if (found.credential.clientId !== client.id) {
        throw OAuthError.invalidClient('Token was issued to a different client');
      }

      await credentials.delete(found.kind, found.signature);
      logger.debug('Token revoked', { clientId: client.id, tokenType: found.kind });
    });

    return emptyResponse(200);
  }

  /**
   * Common checks of introspection and revocation requests
   */
  private async tokenRequestContext(request: RevocationRequest) {
    if (request.method !== 'POST') {
      throw OAuthError.invalidRequest('Requests must use POST');
    }

    const client = await this.clientAuthenticator.authenticate(request.client);

    if (!request.token) {
      throw OAuthError.invalidRequest('Missing token parameter');
    }

    let hint: TokenTypeHint | undefined;
    if (request.tokenTypeHint) {
      hint = SUPPORTED_TOKEN_TYPE_HINTS.find((type) => type === request.tokenTypeHint);
      if (!hint) {
        throw OAuthError.unsupportedTokenType(`Unsupported token_type_hint: ${request.tokenTypeHint}`);
      }
    }

    let signature: string;
    try {
      signature = parseToken(this.config.secret, request.token).signature;
    } catch (error) {
      if (error instanceof MalformedTokenError) {
        throw OAuthError.invalidRequest('Malformed token');
      }
      throw error;
    }

    return { client, signature, hint };
  }

  /**
   * Look a token up among access and refresh tokens, hinted kind first
   */
  private async findToken(signature: string, hint: TokenTypeHint | undefined): Promise<FoundToken | null> {
    const kinds: TokenTypeHint[] =
      hint === TOKEN_TYPE_HINT_REFRESH_TOKEN
        ? [TOKEN_TYPE_HINT_REFRESH_TOKEN, TOKEN_TYPE_HINT_ACCESS_TOKEN]
        : [TOKEN_TYPE_HINT_ACCESS_TOKEN, TOKEN_TYPE_HINT_REFRESH_TOKEN];

    for (const kind of kinds) {
      const credential = await this.storage.credentials.get(kind, signature);
      if (credential) {
        return { kind, signature, credential };
      }
    }

    return null;
  }

  /**
   * Run an endpoint and turn every failure into a direct error response
   */
  private async respond(endpoint: string, fn: () => Promise<EngineResponse>): Promise<EngineResponse> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof OAuthError) {
        logger.debug('Request rejected', { endpoint, error: error.code, description: error.description });
      } else if (error instanceof TokenGenerationError) {
        logger.error('Token generation failed', { endpoint, fatal: true, ...errorFields(error.cause) });
      } else {
        logger.error('Unexpected error', { endpoint, ...errorFields(error) });
      }
      return errorResponse(error);
    }
  }
}
