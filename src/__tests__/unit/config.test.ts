import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { createServerConfig, loadConfig, serverConfigFromEnv } from '../../config/index.js';

describe('Configuration', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({ port: 3000, host: '0.0.0.0', nodeEnv: 'development' });
    expect(config.tokens).toEqual({
      allowedScope: '',
      keyLength: 16,
      accessTokenTtl: 3600,
      refreshTokenTtl: 604800,
      authorizationCodeTtl: 600,
      issueRefreshTokens: true,
    });
    expect(config.secrets.tokenSecret).toBeUndefined();
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      TOKEN_SECRET: 'test-secret-for-hmac-signing',
      ALLOWED_SCOPE: 'foo bar',
      ISSUE_REFRESH_TOKENS: 'false',
      LOG_LEVEL: 'debug',
    });

    expect(config.server.port).toBe(8080);
    expect(config.logging.level).toBe('debug');
    expect(config.tokens.issueRefreshTokens).toBe(false);

    const serverConfig = serverConfigFromEnv(config);
    expect(serverConfig.allowedScope.toString()).toBe('foo bar');
    expect(serverConfig.issueRefreshTokens).toBe(false);
    expect(serverConfig.secret.toString('utf8')).toBe('test-secret-for-hmac-signing');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'not-a-port' })).toThrow(ZodError);
    expect(() => loadConfig({ TOKEN_SECRET: 'short' })).toThrow(ZodError);
    expect(() => loadConfig({ TOKEN_KEY_LENGTH: '8' })).toThrow(ZodError);
  });

  it('should require a token secret for the engine', () => {
    expect(() => serverConfigFromEnv(loadConfig({}))).toThrow('TOKEN_SECRET (or TOKEN_SECRET_FILE) must be set');
  });

  it('should refuse a short secret', () => {
    expect(() => createServerConfig('short', 'foo')).toThrow('Token secret must be at least 16 bytes');
  });

  it('should refuse lifespans that are not positive', () => {
    expect(() => createServerConfig('test-secret-for-hmac-signing', 'foo', { accessTokenLifespan: 0 })).toThrow(
      'Invalid server configuration: accessTokenLifespan: Number must be greater than 0'
    );
    expect(() => createServerConfig('test-secret-for-hmac-signing', 'foo', { refreshTokenLifespan: -60 })).toThrow(
      'Invalid server configuration: refreshTokenLifespan'
    );
    expect(() => createServerConfig('test-secret-for-hmac-signing', 'foo', { authorizationCodeLifespan: 1.5 })).toThrow(
      'Invalid server configuration: authorizationCodeLifespan'
    );
  });

  it('should refuse a key length below the default', () => {
    expect(() => createServerConfig('test-secret-for-hmac-signing', 'foo', { keyLength: 0 })).toThrow(
      'Invalid server configuration: keyLength'
    );
    expect(createServerConfig('test-secret-for-hmac-signing', 'foo', { keyLength: 32 }).keyLength).toBe(32);
  });

  it('should take overrides', () => {
    const config = createServerConfig('test-secret-for-hmac-signing', 'foo', { accessTokenLifespan: 60 });

    expect(config.accessTokenLifespan).toBe(60);
    expect(config.refreshTokenLifespan).toBe(604800);
    expect(config.keyLength).toBe(16);
  });
});
