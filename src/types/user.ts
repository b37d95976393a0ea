/**
 * Resource owner as returned by the owner lookup
 */
export interface ResourceOwner {
  username: string;
  secret: string; // As understood by the configured SecretVerifier
}

/**
 * Resource owner creation input
 */
export interface CreateResourceOwnerInput {
  username: string;
  secret: string;
}
