// Engine
export {
  AuthorizationServer,
  type AuthorizationServerOptions,
  type ResourceAuthResult,
} from './authorization-server.js';
export { TokenService } from './services/token-service.js';
export { BearerValidator, extractBearerToken, type BearerTokenSources } from './services/bearer-validator.js';
export { ClientAuthenticator } from './services/client-authenticator.js';
export * from './services/request-parser.js';
export * from './services/response-service.js';
export { ScopeSet, ScopeService, scopeService } from './services/scope-service.js';
export { Logger, logger, type LogLevel } from './services/logger.js';

// Hono adapter
export { createOAuth2Server, type OAuth2ServerOptions } from './app.js';
export { bearerAuth, type BearerAuthOptions } from './middleware/bearer-auth.js';
export { rateLimiter, type RateLimiterOptions } from './middleware/rate-limiter.js';

// Storage
export { createMemoryStorage, type MemoryStorage } from './storage/memory/index.js';
export {
  MemoryClientStorage,
  MemoryResourceOwnerStorage,
  MemoryCredentialStorage,
} from './storage/memory/index.js';

export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
