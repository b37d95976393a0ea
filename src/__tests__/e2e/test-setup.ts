import { z } from 'zod';
import { createOAuth2Server, type OAuth2ServerOptions } from '../../app.js';
import { AuthorizationServer } from '../../authorization-server.js';
import { createMemoryStorage, type MemoryStorage } from '../../storage/memory/index.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { createServerConfig, type ServerConfig } from '../../config/index.js';

/**
 * Test fixtures and helpers
 */

export const TEST_SECRET = 'test-secret-for-hmac-signing';
export const REDIRECT_URI = 'http://localhost:3001/callback';
export const ALLOWED_SCOPE = 'foo bar';

export const CONFIDENTIAL_CLIENT_ID = 'test-client';
export const CONFIDENTIAL_CLIENT_SECRET = 'test-secret';
export const PUBLIC_CLIENT_ID = 'test-public-client';
export const USERNAME = 'test-user';
export const PASSWORD = 'test-password';

/**
 * Manually advanced clock
 */
export class TestClock {
  private current = new Date('2024-01-01T00:00:00.000Z');

  now = (): Date => new Date(this.current.getTime());

  advance(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

// Create Basic auth header
export function basicAuth(clientId: string, clientSecret: string): string {
  const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
  return `Basic ${credentials}`;
}

// Form-encoded POST request
export function formPost(
  params: Record<string, string>,
  headers: Record<string, string> = {}
): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded', ...headers },
    body: new URLSearchParams(params),
  };
}

// Response schemas
export const tokenResponseSchema = z.object({
  token_type: z.literal('bearer'),
  access_token: z.string(),
  expires_in: z.number(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  state: z.string().optional(),
});

export const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
  error_uri: z.string().optional(),
  state: z.string().optional(),
});

export const introspectionResponseSchema = z.object({
  active: z.boolean(),
  scope: z.string().optional(),
  client_id: z.string().optional(),
  username: z.string().optional(),
  token_type: z.string().optional(),
  exp: z.number().optional(),
  iat: z.number().optional(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export async function readTokenResponse(res: Response): Promise<TokenResponse> {
  return tokenResponseSchema.parse(await res.json());
}

export async function readErrorResponse(res: Response): Promise<z.infer<typeof errorResponseSchema>> {
  return errorResponseSchema.parse(await res.json());
}

/**
 * Location header of a redirect, parsed
 */
export function redirectLocation(res: Response): URL {
  const location = res.headers.get('Location');
  if (!location) {
    throw new Error(`Expected a Location header (status ${res.status})`);
  }
  return new URL(location);
}

/**
 * Parameters carried in a URL fragment
 */
export function fragmentParams(url: URL): URLSearchParams {
  return new URLSearchParams(url.hash.slice(1));
}

// Shared test context
export interface TestContext {
  storage: MemoryStorage;
  server: AuthorizationServer;
  config: ServerConfig;
  clock: TestClock;
  app: ReturnType<typeof createOAuth2Server>;
}

export interface TestContextOptions {
  config?: Partial<Omit<ServerConfig, 'secret' | 'allowedScope'>>;
  rateLimit?: OAuth2ServerOptions['rateLimit'];
}

// Setup function for tests
export async function setupTestContext(options: TestContextOptions = {}): Promise<TestContext> {
  const storage = createMemoryStorage();
  const clock = new TestClock();
  const config = createServerConfig(TEST_SECRET, ALLOWED_SCOPE, options.config);

  await storage.clients.create({
    id: CONFIDENTIAL_CLIENT_ID,
    secret: CONFIDENTIAL_CLIENT_SECRET,
    redirectUri: REDIRECT_URI,
  });
  await storage.clients.create({ id: PUBLIC_CLIENT_ID, redirectUri: REDIRECT_URI });
  await storage.owners.create({ username: USERNAME, secret: PASSWORD });

  const server = new AuthorizationServer({ storage, config, now: clock.now });

  // High rate limits for testing unless a test asks otherwise
  const app = createOAuth2Server({
    server,
    enableLogging: false,
    rateLimit: options.rateLimit ?? { windowMs: 60000, maxRequests: 1000 },
  });

  // Protected resources
  app.get('/resource', bearerAuth({ server, requiredScope: 'foo' }), (c) =>
    c.json({ client_id: c.get('credential')?.clientId, username: c.get('credential')?.resourceOwnerId })
  );
  app.get('/resource/admin', bearerAuth({ server, requiredScope: 'admin' }), (c) => c.json({ ok: true }));

  return { storage, server, config, clock, app };
}

/**
 * Run a client credentials grant and return the token response
 */
export async function clientCredentialsToken(ctx: TestContext, scope = 'foo'): Promise<TokenResponse> {
  const res = await ctx.app.request(
    '/token',
    formPost(
      { grant_type: 'client_credentials', scope },
      { Authorization: basicAuth(CONFIDENTIAL_CLIENT_ID, CONFIDENTIAL_CLIENT_SECRET) }
    )
  );
  if (res.status !== 200) {
    throw new Error(`Token request failed with status ${res.status}`);
  }
  return readTokenResponse(res);
}

/**
 * Run the authorization step of the code flow and return the code
 */
export async function authorizationCode(ctx: TestContext, scope = 'foo', state = 'foobar'): Promise<string> {
  const res = await ctx.app.request(
    '/authorize',
    formPost({
      response_type: 'code',
      client_id: CONFIDENTIAL_CLIENT_ID,
      redirect_uri: REDIRECT_URI,
      scope,
      state,
      username: USERNAME,
      password: PASSWORD,
    })
  );
  const code = redirectLocation(res).searchParams.get('code');
  if (!code) {
    throw new Error('Expected an authorization code in the redirect');
  }
  return code;
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}
