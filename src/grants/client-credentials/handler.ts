import type { GrantContext, GrantHandler } from '../context.js';
import { allowedScopeFor } from '../context.js';
import { isConfidential } from '../../types/client.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';

/**
 * Handle client credentials token request
 *
 * RFC 6749 Section 4.4
 */
export function createClientCredentialsHandler(context: GrantContext): GrantHandler {
  return async (request, client) => {
    // Client credentials only for confidential clients
    if (!isConfidential(client)) {
      throw OAuthError.invalidClient('Client credentials grant requires a confidential client');
    }

    const scope = scopeService.validate(request.scope, allowedScopeFor(client, context.config));

    // Tokens act for the client itself, no resource owner
    return context.tokens.issueTokens({
      clientId: client.id,
      scope,
      refreshable: true,
      now: context.now(),
    });
  };
}
