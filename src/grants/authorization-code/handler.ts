import type { GrantContext, GrantHandler } from '../context.js';
import { allowedScopeFor, grantSignature } from '../context.js';
import { isExpired } from '../../types/token.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { logger } from '../../services/logger.js';

/**
 * Handle authorization code grant
 *
 * RFC 6749 Section 4.1.3
 *
 * Codes are single use. Presenting a redeemed code again revokes every
 * token that was issued from it (RFC 6749 Section 4.1.2).
 */
export function createAuthorizationCodeHandler(context: GrantContext): GrantHandler {
  const { credentials } = context.storage;

  return async (request, client) => {
    if (!request.code) {
      throw OAuthError.invalidRequest('Missing code parameter');
    }

    const signature = grantSignature(context, request.code);

    return credentials.runExclusive(async () => {
      const authCode = await credentials.get('authorization_code', signature);
      if (!authCode) {
        throw OAuthError.invalidGrant('Invalid authorization code');
      }

      if (authCode.used) {
        await credentials.markUsed(signature);
        logger.warn('Authorization code replayed, derived tokens revoked', {
          clientId: authCode.clientId,
          presentedBy: client.id,
        });
        throw OAuthError.invalidGrant('Authorization code has already been used');
      }

      const now = context.now();
      if (isExpired(authCode, now)) {
        throw OAuthError.invalidGrant('Authorization code has expired');
      }

      // Validate client matches
      if (authCode.clientId !== client.id) {
        throw OAuthError.invalidGrant('Authorization code was issued to a different client');
      }

      // Validate redirect_uri matches (exact match required)
      if (authCode.redirectUri !== request.redirectUri) {
        throw OAuthError.invalidGrant('redirect_uri does not match');
      }

      // Granted scope must not exceed what the client may hold today
      scopeService.validate(authCode.scope, allowedScopeFor(client, context.config));

      const response = await context.tokens.issueTokens({
        clientId: client.id,
        resourceOwnerId: authCode.resourceOwnerId,
        scope: authCode.scope,
        refreshable: true,
        parentCode: signature,
        now,
      });

      if (!(await credentials.markUsed(signature))) {
        throw OAuthError.invalidGrant('Authorization code has already been used');
      }

      return response;
    });
  };
}
