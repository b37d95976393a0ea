import { serve } from '@hono/node-server';
import { createOAuth2Server } from './app.js';
import { AuthorizationServer } from './authorization-server.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { bearerAuth } from './middleware/bearer-auth.js';
import { getConfig, serverConfigFromEnv } from './config/index.js';
import { scryptSecretVerifier, hashSecret } from './crypto/hash.js';
import { logger, errorFields } from './services/logger.js';

// Load configuration
const config = getConfig();
logger.setLevel(config.logging.level);

/**
 * Development seed: one confidential client, one public client and one
 * resource owner, all with placeholder credentials
 */
async function seed() {
  const storage = createMemoryStorage();
  const redirectUri = `http://localhost:${config.server.port}/callback`;

  await storage.clients.create({
    id: 'dev-confidential-client',
    secret: await hashSecret('dev-client-secret'),
    redirectUri,
  });
  await storage.clients.create({ id: 'dev-public-client', redirectUri });
  await storage.owners.create({ username: 'dev-user', secret: await hashSecret('dev-password') });

  return storage;
}

async function main() {
  const storage = await seed();
  const server = new AuthorizationServer({
    storage,
    config: serverConfigFromEnv(config),
    verifySecret: scryptSecretVerifier,
  });

  const app = createOAuth2Server({
    server,
    rateLimit: config.rateLimit,
    enableLogging: config.server.nodeEnv !== 'test',
    sweepIntervalMs: 60_000,
  });

  // Example protected resource
  app.get('/me', bearerAuth({ server }), (c) => {
    const credential = c.get('credential');
    return c.json({
      client_id: credential?.clientId,
      username: credential?.resourceOwnerId,
      scope: credential?.scope.toString(),
    });
  });

  serve(
    {
      fetch: app.fetch,
      port: config.server.port,
      hostname: config.server.host,
    },
    (info) => {
      logger.info('OAuth 2.0 Authorization Server running', {
        address: info.address,
        port: info.port,
        endpoints: ['/authorize', '/token', '/introspect', '/revoke', '/me'],
        storage: 'memory',
      });
    }
  );
}

main().catch((error: unknown) => {
  logger.error('Server failed to start', errorFields(error));
  process.exit(1);
});
