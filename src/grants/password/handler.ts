import type { GrantContext, GrantHandler } from '../context.js';
import { allowedScopeFor, authenticateOwner } from '../context.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';

/**
 * Handle resource owner password credentials grant
 *
 * RFC 6749 Section 4.3
 */
export function createPasswordHandler(context: GrantContext): GrantHandler {
  return async (request, client) => {
    const owner = await authenticateOwner(context, request.username, request.password);
    if (!owner) {
      throw OAuthError.accessDenied('Invalid resource owner credentials');
    }

    const scope = scopeService.validate(request.scope, allowedScopeFor(client, context.config));

    return context.tokens.issueTokens({
      clientId: client.id,
      resourceOwnerId: owner.username,
      scope,
      refreshable: true,
      now: context.now(),
    });
  };
}
