import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';
import { ScopeSet } from '../services/scope-service.js';
import { logger } from '../services/logger.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: NodeJS.ProcessEnv, envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const filePath = env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      logger.warn('Could not read secret file', {
        path: filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Fall back to direct environment variable
  return env[envVar];
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  PORT: positiveInt.default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  TOKEN_SECRET: z
    .string()
    .min(constants.MIN_SECRET_LENGTH, `TOKEN_SECRET must be at least ${constants.MIN_SECRET_LENGTH} characters`)
    .optional(),
  ALLOWED_SCOPE: z.string().default(''),
  TOKEN_KEY_LENGTH: positiveInt.min(constants.DEFAULT_TOKEN_KEY_LENGTH).default(constants.DEFAULT_TOKEN_KEY_LENGTH),
  ACCESS_TOKEN_TTL: positiveInt.default(constants.DEFAULT_ACCESS_TOKEN_TTL),
  REFRESH_TOKEN_TTL: positiveInt.default(constants.DEFAULT_REFRESH_TOKEN_TTL),
  AUTHORIZATION_CODE_TTL: positiveInt.default(constants.DEFAULT_AUTHORIZATION_CODE_TTL),
  ISSUE_REFRESH_TOKENS: z.enum(['true', 'false']).default('true'),
  RATE_LIMIT_WINDOW_MS: positiveInt.default(constants.DEFAULT_RATE_LIMIT_WINDOW_MS),
  RATE_LIMIT_MAX_REQUESTS: positiveInt.default(constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS),
});

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  secrets: {
    tokenSecret: string | undefined;
  };
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  tokens: {
    allowedScope: string;
    keyLength: number;
    accessTokenTtl: number;
    refreshTokenTtl: number;
    authorizationCodeTtl: number;
    issueRefreshTokens: boolean;
  };
}

/**
 * Load configuration from environment variables
 *
 * @throws ZodError when a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse({ ...env, TOKEN_SECRET: readSecret(env, 'TOKEN_SECRET') });

  return {
    server: {
      port: parsed.PORT,
      host: parsed.HOST,
      nodeEnv: parsed.NODE_ENV,
    },
    secrets: {
      tokenSecret: parsed.TOKEN_SECRET,
    },
    logging: {
      level: parsed.LOG_LEVEL,
    },
    rateLimit: {
      windowMs: parsed.RATE_LIMIT_WINDOW_MS,
      maxRequests: parsed.RATE_LIMIT_MAX_REQUESTS,
    },
    tokens: {
      allowedScope: parsed.ALLOWED_SCOPE,
      keyLength: parsed.TOKEN_KEY_LENGTH,
      accessTokenTtl: parsed.ACCESS_TOKEN_TTL,
      refreshTokenTtl: parsed.REFRESH_TOKEN_TTL,
      authorizationCodeTtl: parsed.AUTHORIZATION_CODE_TTL,
      issueRefreshTokens: parsed.ISSUE_REFRESH_TOKENS === 'true',
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Engine configuration
 */
export interface ServerConfig {
  /** HMAC key; never leaves the server */
  secret: Buffer;
  /** Random key length of generated tokens, in bytes */
  keyLength: number;
  /** Scope a client may request unless it declares its own */
  allowedScope: ScopeSet;
  /** Lifespans in seconds */
  accessTokenLifespan: number;
  refreshTokenLifespan: number;
  authorizationCodeLifespan: number;
  /** Whether token-endpoint flows also issue refresh tokens */
  issueRefreshTokens: boolean;
}

const serverOverridesSchema = z.object({
  keyLength: positiveInt.min(constants.DEFAULT_TOKEN_KEY_LENGTH).default(constants.DEFAULT_TOKEN_KEY_LENGTH),
  accessTokenLifespan: positiveInt.default(constants.DEFAULT_ACCESS_TOKEN_TTL),
  refreshTokenLifespan: positiveInt.default(constants.DEFAULT_REFRESH_TOKEN_TTL),
  authorizationCodeLifespan: positiveInt.default(constants.DEFAULT_AUTHORIZATION_CODE_TTL),
  issueRefreshTokens: z.boolean().default(true),
});

/**
 * Build an engine configuration with defaults
 *
 * @throws Error when the secret is shorter than MIN_SECRET_LENGTH bytes,
 *   or an override is not a positive integer (key length: at least the default)
 */
export function createServerConfig(
  secret: Buffer | string,
  allowedScope: ScopeSet | string,
  overrides: Partial<Omit<ServerConfig, 'secret' | 'allowedScope'>> = {}
): ServerConfig {
  const secretBytes = typeof secret === 'string' ? Buffer.from(secret, 'utf8') : Buffer.from(secret);

  if (secretBytes.length < constants.MIN_SECRET_LENGTH) {
    throw new Error(`Token secret must be at least ${constants.MIN_SECRET_LENGTH} bytes`);
  }

  const result = serverOverridesSchema.safeParse(overrides);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid server configuration: ${issue?.path.join('.')}: ${issue?.message}`);
  }

  return {
    secret: secretBytes,
    allowedScope: typeof allowedScope === 'string' ? ScopeSet.parse(allowedScope) : allowedScope,
    ...result.data,
  };
}

/**
 * Engine configuration from the loaded application configuration
 *
 * @throws Error when TOKEN_SECRET is not set
 */
export function serverConfigFromEnv(appConfig: Config = getConfig()): ServerConfig {
  const { tokenSecret } = appConfig.secrets;
  if (!tokenSecret) {
    throw new Error('TOKEN_SECRET (or TOKEN_SECRET_FILE) must be set');
  }

  return createServerConfig(tokenSecret, appConfig.tokens.allowedScope, {
    keyLength: appConfig.tokens.keyLength,
    accessTokenLifespan: appConfig.tokens.accessTokenTtl,
    refreshTokenLifespan: appConfig.tokens.refreshTokenTtl,
    authorizationCodeLifespan: appConfig.tokens.authorizationCodeTtl,
    issueRefreshTokens: appConfig.tokens.issueRefreshTokens,
  });
}

// Re-export constants
export { constants };
