import type { GrantContext, GrantHandler } from '../context.js';
import { grantSignature } from '../context.js';
import { isExpired } from '../../types/token.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { scopeService } from '../../services/scope-service.js';
import { logger } from '../../services/logger.js';

/**
 * Handle refresh token grant
 *
 * RFC 6749 Section 6
 *
 * Implements refresh token rotation:
 * - Each refresh token can only be used once
 * - A new refresh token is issued with each refresh
 * - The new tokens keep the authorization code they descend from, so a
 *   replayed code still revokes the whole chain
 */
export function createRefreshTokenHandler(context: GrantContext): GrantHandler {
  const { credentials } = context.storage;

  return async (request, client) => {
    if (!request.refreshToken) {
      throw OAuthError.invalidRequest('Missing refresh_token parameter');
    }

    const signature = grantSignature(context, request.refreshToken);

    return credentials.runExclusive(async () => {
      const refreshToken = await credentials.get('refresh_token', signature);
      if (!refreshToken) {
        throw OAuthError.invalidGrant('Invalid refresh token');
      }

      const now = context.now();
      if (isExpired(refreshToken, now)) {
        throw OAuthError.invalidGrant('Refresh token has expired');
      }

      // Check if token belongs to this client
      if (refreshToken.clientId !== client.id) {
        throw OAuthError.invalidGrant('Refresh token was issued to a different client');
      }

      // Omitted scope means the original grant; otherwise only a subset of it
      const scope = request.scope.isEmpty()
        ? refreshToken.scope
        : scopeService.validate(request.scope, refreshToken.scope);

      const response = await context.tokens.issueTokens({
        clientId: client.id,
        resourceOwnerId: refreshToken.resourceOwnerId,
        scope,
        refreshable: true,
        parentCode: refreshToken.parentCode,
        now,
      });

      // Rotation
      await credentials.delete('refresh_token', signature);
      logger.debug('Refresh token rotated', { clientId: client.id });

      return response;
    });
  };
}
