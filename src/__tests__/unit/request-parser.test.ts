import { describe, it, expect } from 'vitest';
import {
  parseAuthorizationRequest,
  parseBasicAuth,
  parseRevocationRequest,
  parseTokenRequest,
} from '../../services/request-parser.js';
import { OAuthError } from '../../errors/oauth-error.js';

function basic(value: string): string {
  return `Basic ${Buffer.from(value).toString('base64')}`;
}

describe('parseBasicAuth', () => {
  it('should decode client credentials', () => {
    expect(parseBasicAuth(basic('test-client:test-secret'))).toEqual({
      clientId: 'test-client',
      clientSecret: 'test-secret',
    });
  });

  it('should URL-decode both parts', () => {
    expect(parseBasicAuth(basic('my%20client:a%3Ab'))).toEqual({
      clientId: 'my client',
      clientSecret: 'a:b',
    });
  });

  it('should ignore other schemes', () => {
    expect(parseBasicAuth(undefined)).toBeNull();
    expect(parseBasicAuth('Bearer abc')).toBeNull();
  });

  it('should reject credentials without a client id', () => {
    expect(() => parseBasicAuth(basic(':test-secret'))).toThrow('Malformed Basic credentials');
    expect(() => parseBasicAuth(basic('no-colon'))).toThrow('Malformed Basic credentials');
  });
});

describe('parseTokenRequest', () => {
  it('should read the grant parameters', () => {
    const request = parseTokenRequest({
      method: 'post',
      fields: { grant_type: 'password', username: 'test-user', password: 'test-password', scope: 'foo bar' },
      authorization: basic('test-client:test-secret'),
    });

    expect(request.method).toBe('POST');
    expect(request.grantType).toBe('password');
    expect(request.scope.toString()).toBe('foo bar');
    expect(request.client).toEqual({ clientId: 'test-client', clientSecret: 'test-secret' });
    expect(request.username).toBe('test-user');
    expect(request.password).toBe('test-password');
    expect(request.code).toBeUndefined();
  });

  it('should fall back to body credentials', () => {
    const request = parseTokenRequest({
      method: 'POST',
      fields: { grant_type: 'client_credentials', client_id: 'test-public-client' },
    });

    expect(request.client).toEqual({ clientId: 'test-public-client' });
  });

  it('should reject repeated parameters', () => {
    expect(() =>
      parseTokenRequest({ method: 'POST', fields: { grant_type: ['password', 'password'] } })
    ).toThrow('Parameter grant_type must not be repeated');
  });

  it('should reject other methods', () => {
    let caught: unknown;
    try {
      parseTokenRequest({ method: 'PUT', fields: {} });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(OAuthError);
    expect(caught).toMatchObject({ code: 'invalid_request', description: 'Unsupported request method' });
  });
});

describe('parseAuthorizationRequest', () => {
  it('should default missing parameters to empty values', () => {
    const request = parseAuthorizationRequest({ method: 'GET', fields: {} });

    expect(request).toMatchObject({ method: 'GET', responseType: '', clientId: '', redirectUri: '' });
    expect(request.scope.isEmpty()).toBe(true);
    expect(request.state).toBeUndefined();
  });

  it('should keep state and owner credentials', () => {
    const request = parseAuthorizationRequest({
      method: 'POST',
      fields: { response_type: 'code', state: 'foobar', username: 'test-user', password: '' },
    });

    expect(request.state).toBe('foobar');
    expect(request.username).toBe('test-user');
    expect(request.password).toBe('');
  });
});

describe('parseRevocationRequest', () => {
  it('should read the token and its hint', () => {
    const request = parseRevocationRequest({
      method: 'POST',
      fields: { token: 'abc.def', token_type_hint: 'refresh_token', client_id: 'test-client', client_secret: 'test-secret' },
    });

    expect(request.token).toBe('abc.def');
    expect(request.tokenTypeHint).toBe('refresh_token');
    expect(request.client).toEqual({ clientId: 'test-client', clientSecret: 'test-secret' });
  });
});
