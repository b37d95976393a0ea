import type { Credential } from './token.js';

/**
 * Extended Hono context variables for OAuth
 */
export interface OAuthVariables {
  credential?: Credential;
}
