import type { OAuthClient, ClientCredentials } from '../types/client.js';
import type { IClientStorage } from '../storage/interfaces/client-storage.js';
import type { SecretVerifier } from '../crypto/hash.js';
import { OAuthError } from '../errors/oauth-error.js';

/**
 * Authenticates clients on the token, introspection and revocation endpoints
 *
 * Supports:
 * - client_secret_basic: HTTP Basic authentication
 * - client_secret_post: credentials in the POST body
 * - none: public clients identify themselves with client_id only
 */
export class ClientAuthenticator {
  constructor(
    private readonly clients: IClientStorage,
    private readonly verifySecret: SecretVerifier
  ) {}

  /**
   * @throws OAuthError invalid_client
   */
  async authenticate(credentials: ClientCredentials | undefined): Promise<OAuthClient> {
    if (!credentials) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    const client = await this.clients.findById(credentials.clientId);
    if (!client) {
      throw OAuthError.invalidClient('Unknown client');
    }

    // Public clients have nothing to verify
    if (!client.secret) {
      return client;
    }

    if (credentials.clientSecret === undefined) {
      throw OAuthError.invalidClient('Client secret required');
    }

    const isValid = await this.verifySecret(client.secret, credentials.clientSecret);
    if (!isValid) {
      throw OAuthError.invalidClient('Invalid client credentials');
    }

    return client;
  }
}
