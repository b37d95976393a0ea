import type { ServerConfig } from '../config/index.js';
import type { TokenResponse } from '../types/oauth.js';
import type { Credential } from '../types/token.js';
import type { ICredentialStorage } from '../storage/interfaces/credential-storage.js';
import type { ScopeSet } from './scope-service.js';
import { generateToken } from '../crypto/opaque-token.js';
import { TOKEN_TYPE_BEARER } from '../config/constants.js';
import { logger } from './logger.js';

export interface TokenIssueOptions {
  clientId: string;
  resourceOwnerId?: string;
  scope: ScopeSet;
  /** Whether the flow is entitled to a refresh token */
  refreshable: boolean;
  /** Signature of the authorization code the tokens derive from */
  parentCode?: string;
  state?: string;
  now: Date;
}

export interface CodeIssueOptions {
  clientId: string;
  resourceOwnerId: string;
  scope: ScopeSet;
  redirectUri: string;
  now: Date;
}

function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/**
 * Service for token and authorization code issuance
 */
export class TokenService {
  constructor(
    private readonly config: ServerConfig,
    private readonly credentials: ICredentialStorage
  ) {}

  /**
   * Mint and store an access token, plus a refresh token when the flow is
   * entitled to one and the server issues them
   */
  async issueTokens(options: TokenIssueOptions): Promise<TokenResponse> {
    const { clientId, resourceOwnerId, scope, refreshable, parentCode, state, now } = options;
    const { accessTokenLifespan, refreshTokenLifespan } = this.config;

    const accessToken = generateToken(this.config.secret, this.config.keyLength);
    const refreshToken =
      refreshable && this.config.issueRefreshTokens
        ? generateToken(this.config.secret, this.config.keyLength)
        : null;

    await this.credentials.put(
      'access_token',
      accessToken.signature,
      this.credential(clientId, resourceOwnerId, scope, parentCode, now, accessTokenLifespan)
    );

    if (refreshToken) {
      await this.credentials.put(
        'refresh_token',
        refreshToken.signature,
        this.credential(clientId, resourceOwnerId, scope, parentCode, now, refreshTokenLifespan)
      );
    }

    logger.debug('Issued tokens', {
      clientId,
      resourceOwnerId,
      scope: scope.toString(),
      refreshToken: refreshToken !== null,
    });

    // Build response
    const response: TokenResponse = {
      token_type: TOKEN_TYPE_BEARER,
      access_token: accessToken.toString(),
      expires_in: accessTokenLifespan,
    };

    if (refreshToken) {
      response.refresh_token = refreshToken.toString();
    }

    if (!scope.isEmpty()) {
      response.scope = scope.toString();
    }

    if (state) {
      response.state = state;
    }

    return response;
  }

  /**
   * Mint and store a single-use authorization code
   */
  async issueAuthorizationCode(options: CodeIssueOptions): Promise<string> {
    const { clientId, resourceOwnerId, scope, redirectUri, now } = options;
    const code = generateToken(this.config.secret, this.config.keyLength);

    await this.credentials.put('authorization_code', code.signature, {
      ...this.credential(clientId, resourceOwnerId, scope, undefined, now, this.config.authorizationCodeLifespan),
      redirectUri,
    });

    logger.debug('Issued authorization code', { clientId, resourceOwnerId, scope: scope.toString() });

    return code.toString();
  }

  private credential(
    clientId: string,
    resourceOwnerId: string | undefined,
    scope: ScopeSet,
    parentCode: string | undefined,
    now: Date,
    lifespan: number
  ): Credential {
    const credential: Credential = {
      clientId,
      scope,
      issuedAt: now,
      expiresAt: addSeconds(now, lifespan),
      used: false,
    };

    if (resourceOwnerId) {
      credential.resourceOwnerId = resourceOwnerId;
    }
    if (parentCode) {
      credential.parentCode = parentCode;
    }

    return credential;
  }
}
