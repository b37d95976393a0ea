import {
  type BearerErrorCode,
  BEARER_ERROR_INVALID_REQUEST,
  BEARER_ERROR_INVALID_TOKEN,
  BEARER_ERROR_INSUFFICIENT_SCOPE,
} from './error-codes.js';
import { DEFAULT_REALM } from '../config/constants.js';

export type BearerErrorStatus = 400 | 401 | 403 | 500;

/**
 * Bearer token authentication failure
 * RFC 6750 Section 3
 *
 * Delivered only as a WWW-Authenticate challenge, never as a body.
 */
export class BearerError extends Error {
  public readonly code?: BearerErrorCode;
  public readonly statusCode: BearerErrorStatus;
  public readonly description?: string;
  public readonly errorUri?: string;
  public readonly realm?: string;
  public readonly scope?: string;

  constructor(
    statusCode: BearerErrorStatus,
    code?: BearerErrorCode,
    options?: {
      description?: string;
      errorUri?: string;
      realm?: string;
      scope?: string;
      cause?: unknown;
    }
  ) {
    super(code ? `${code}: ${options?.description ?? ''}` : `bearer authentication failed (${statusCode})`);
    this.name = 'BearerError';
    this.statusCode = statusCode;

    if (code) {
      this.code = code;
    }
    if (options?.description) {
      this.description = options.description;
    }
    if (options?.errorUri) {
      this.errorUri = options.errorUri;
    }
    if (options?.realm) {
      this.realm = options.realm;
    }
    if (options?.scope) {
      this.scope = options.scope;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * All parameters that may be presented to the client
   */
  toParams(): Record<string, string> {
    const params: Record<string, string> = {};

    if (this.code) {
      params['error'] = this.code;
    }
    if (this.description) {
      params['error_description'] = this.description;
    }
    if (this.errorUri) {
      params['error_uri'] = this.errorUri;
    }
    if (this.realm) {
      params['realm'] = this.realm;
    }
    if (this.scope) {
      params['scope'] = this.scope;
    }

    return params;
  }

  /**
   * WWW-Authenticate header value with sorted, quoted parameters
   */
  toChallenge(): string {
    const params = Object.entries(this.toParams())
      .map(([key, value]) => `${key}="${value}"`)
      .sort();

    if (params.length === 0) {
      params.push(`realm="${DEFAULT_REALM}"`);
    }

    return `Bearer ${params.join(', ')}`;
  }

  /**
   * The request lacks any authentication information
   */
  static protectedResource(realm?: string): BearerError {
    return new BearerError(401, undefined, { realm });
  }

  static invalidRequest(description?: string): BearerError {
    return new BearerError(400, BEARER_ERROR_INVALID_REQUEST, { description });
  }

  static invalidToken(description?: string): BearerError {
    return new BearerError(401, BEARER_ERROR_INVALID_TOKEN, { description });
  }

  static insufficientScope(requiredScope: string): BearerError {
    return new BearerError(403, BEARER_ERROR_INSUFFICIENT_SCOPE, { scope: requiredScope });
  }

  static serverError(cause?: unknown): BearerError {
    return new BearerError(500, undefined, { cause });
  }
}
