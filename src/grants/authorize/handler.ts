import type { GrantContext } from '../context.js';
import type { AuthorizationRequest, EngineResponse } from '../../types/oauth.js';
import { allowedScopeFor, authenticateOwner } from '../context.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { logger, errorFields } from '../../services/logger.js';
import {
  codeResponseParams,
  redirectErrorResponse,
  redirectResponse,
  textResponse,
  tokenResponseParams,
} from '../../services/response-service.js';
import {
  AUTHORIZATION_FORM_NOTICE,
  RESPONSE_TYPE_CODE,
  RESPONSE_TYPE_TOKEN,
} from '../../config/constants.js';

export type AuthorizeHandler = (request: AuthorizationRequest) => Promise<EngineResponse>;

/**
 * Handle the authorization endpoint (GET/POST /authorize)
 *
 * RFC 6749 Section 4.1.1 (code) and 4.2.1 (implicit)
 *
 * Until the redirect URI is verified, errors are thrown for direct delivery.
 * From then on they are redirected to the client: in the query for the code
 * flow, in the fragment for the implicit flow.
 */
export function createAuthorizeHandler(context: GrantContext): AuthorizeHandler {
  return async (request) => {
    const { responseType, redirectUri, state } = request;

    if (responseType !== RESPONSE_TYPE_TOKEN && responseType !== RESPONSE_TYPE_CODE) {
      throw OAuthError.unsupportedResponseType(
        responseType ? `Unsupported response_type: ${responseType}` : 'Missing response_type parameter',
        state
      );
    }

    // Look up client
    const client = request.clientId ? await context.storage.clients.findById(request.clientId) : null;
    if (!client) {
      throw OAuthError.invalidClient('Unknown client');
    }

    // Validate redirect_uri (must be exact match)
    if (redirectUri !== client.redirectUri) {
      throw OAuthError.invalidRequest('redirect_uri does not match the registered redirect URI', state);
    }

    if (request.method === 'GET') {
      return textResponse(200, AUTHORIZATION_FORM_NOTICE);
    }

    const useFragment = responseType === RESPONSE_TYPE_TOKEN;

    try {
      if (!allowedScopeFor(client, context.config).includes(request.scope)) {
        return redirectErrorResponse(redirectUri, OAuthError.invalidScope(), useFragment, state);
      }

      const owner = await authenticateOwner(context, request.username, request.password);
      if (!owner) {
        return redirectErrorResponse(redirectUri, OAuthError.accessDenied(), useFragment, state);
      }

      const now = context.now();

      if (responseType === RESPONSE_TYPE_TOKEN) {
        // Implicit grant never issues refresh tokens (RFC 6749 Section 4.2.2)
        const tokens = await context.tokens.issueTokens({
          clientId: client.id,
          resourceOwnerId: owner.username,
          scope: request.scope,
          refreshable: false,
          state,
          now,
        });
        return redirectResponse(redirectUri, tokenResponseParams(tokens), true);
      }

      const code = await context.tokens.issueAuthorizationCode({
        clientId: client.id,
        resourceOwnerId: owner.username,
        scope: request.scope,
        redirectUri,
        now,
      });
      return redirectResponse(redirectUri, codeResponseParams({ code, state }), false);
    } catch (error) {
      if (!(error instanceof OAuthError)) {
        logger.error('Authorization request failed', { clientId: client.id, ...errorFields(error) });
      }
      return redirectErrorResponse(redirectUri, error, useFragment, state);
    }
  };
}
