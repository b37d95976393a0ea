import {
  type OAuthErrorCode,
  type OAuthErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CLIENT,
  ERROR_INVALID_GRANT,
  ERROR_ACCESS_DENIED,
  ERROR_UNSUPPORTED_RESPONSE_TYPE,
  ERROR_INVALID_SCOPE,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_SERVER_ERROR,
  ERROR_TEMPORARILY_UNAVAILABLE,
  ERROR_UNSUPPORTED_TOKEN_TYPE,
} from './error-codes.js';

/**
 * OAuth 2.0 Error Response
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  error_uri?: string;
  state?: string;
}

/**
 * OAuth 2.0 Error class
 * Represents RFC-compliant OAuth errors
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: OAuthErrorStatus;
  public readonly description?: string;
  public readonly errorUri?: string;
  public readonly state?: string;

  constructor(
    code: OAuthErrorCode,
    description?: string,
    options?: {
      errorUri?: string;
      state?: string;
      cause?: unknown;
    }
  ) {
    super(description || ERROR_DESCRIPTIONS[code]);
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];

    if (description) {
      this.description = description;
    }
    if (options?.errorUri) {
      this.errorUri = options.errorUri;
    }
    if (options?.state) {
      this.state = options.state;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Copy of this error carrying the given state
   */
  withState(state: string | undefined): OAuthError {
    if (!state || state === this.state) {
      return this;
    }
    return new OAuthError(this.code, this.description, {
      errorUri: this.errorUri,
      state,
      cause: this.cause,
    });
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.errorUri) {
      response.error_uri = this.errorUri;
    }

    if (this.state) {
      response.state = this.state;
    }

    return response;
  }

  /**
   * Flat parameter map for redirect delivery (query or fragment)
   */
  toParams(): Record<string, string> {
    const params: Record<string, string> = { error: this.code };

    if (this.description) {
      params['error_description'] = this.description;
    }

    if (this.errorUri) {
      params['error_uri'] = this.errorUri;
    }

    if (this.state) {
      params['state'] = this.state;
    }

    return params;
  }

  /**
   * Classify any thrown value. Errors outside the taxonomy become a
   * server_error without description so internal text never reaches a client.
   */
  static from(error: unknown): OAuthError {
    if (error instanceof OAuthError) {
      return error;
    }
    return OAuthError.serverError(undefined, error);
  }

  // Factory methods for common errors

  static invalidRequest(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description, { state });
  }

  static invalidClient(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_CLIENT, description);
  }

  static invalidGrant(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_GRANT, description);
  }

  static accessDenied(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_ACCESS_DENIED, description, { state });
  }

  static unsupportedResponseType(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_RESPONSE_TYPE, description, { state });
  }

  static invalidScope(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_SCOPE, description, { state });
  }

  static unsupportedGrantType(description?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_GRANT_TYPE, description);
  }

  static unsupportedTokenType(description?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_TOKEN_TYPE, description);
  }

  static serverError(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, description, { cause });
  }

  static temporarilyUnavailable(description?: string): OAuthError {
    return new OAuthError(ERROR_TEMPORARILY_UNAVAILABLE, description);
  }
}
