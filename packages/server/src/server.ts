import { readFileSync } from 'node:fs';
import { createServer as createHttpsServer } from 'node:https';
import { serve } from '@hono/node-server';
import { createLogger, describeError, generateRandomBase64Url } from '@campus-sso/shared';
import { createIdentityProvider } from './app.js';
import { createMemoryStorage, MemoryClientRegistry } from './storage/memory/index.js';
import { startSweeper } from './storage/sweeper.js';
import { getConfig } from './config/index.js';
import { loadSeedFile, resolveClientInputs, applySeedUsers } from './config/seed.js';

// Load configuration
const config = getConfig();
const logger = createLogger('identity-provider', config.logging.level);

async function main(): Promise<void> {
  let signingSecret = config.secrets.jwtSecret;
  if (!signingSecret) {
    if (config.server.nodeEnv === 'production') {
      throw new Error('JWT_SECRET (or JWT_SECRET_FILE) must be set in production');
    }
    logger.warn('JWT_SECRET not set; using a random secret, tokens will not survive a restart');
    signingSecret = generateRandomBase64Url(32);
  }

  const seed = loadSeedFile(config.seedFile);
  const storage = createMemoryStorage();
  const clients = await MemoryClientRegistry.create(resolveClientInputs(seed));
  const seededUsers = await applySeedUsers(seed, storage.users, logger);
  logger.info('Seed loaded', { clients: seed.clients.length, users: seededUsers });

  const { app } = createIdentityProvider({
    storage,
    clients,
    signingSecret,
    issuer: config.server.issuer,
    loginUrl: config.server.loginUrl,
    accessTokenTtl: config.defaults.accessTokenTtl,
    refreshTokenTtl: config.defaults.refreshTokenTtl,
    authorizationCodeTtl: config.defaults.authorizationCodeTtl,
    ssoSessionTtl: config.defaults.ssoSessionTtl,
    cookieSecure: config.server.cookieSecure,
    allowRegistration: config.server.allowRegistration,
    trustProxyCertHeaders: config.server.trustProxyCertHeaders,
    rateLimit: config.rateLimit,
    enableLogging: config.server.nodeEnv !== 'test',
    logger,
  });

  const stopSweeper = startSweeper(storage, config.defaults.sweepIntervalMs, logger.child('sweeper'));

  const { certFile, keyFile, caFile } = config.tls;
  const onListen = (info: { address: string; port: number }) => {
    logger.info('Identity provider listening', {
      address: info.address,
      port: info.port,
      tls: certFile !== undefined,
      issuer: config.server.issuer,
    });
  };

  const server =
    certFile && keyFile
      ? serve(
          {
            fetch: app.fetch,
            port: config.server.port,
            hostname: config.server.host,
            createServer: createHttpsServer,
            serverOptions: {
              cert: readFileSync(certFile),
              key: readFileSync(keyFile),
              ca: caFile ? readFileSync(caFile) : undefined,
              // Client certificates are optional; unverified ones are ignored
              requestCert: caFile !== undefined,
              rejectUnauthorized: false,
            },
          },
          onListen
        )
      : serve({ fetch: app.fetch, port: config.server.port, hostname: config.server.host }, onListen);

  const shutdown = () => {
    stopSweeper();
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.error('Identity provider failed to start', { error: describeError(error) });
  process.exit(1);
});
