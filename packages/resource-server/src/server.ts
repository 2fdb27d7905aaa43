import { readFileSync } from 'node:fs';
import { createServer as createHttpsServer } from 'node:https';
import { serve } from '@hono/node-server';
import { createLogger, describeError } from '@campus-sso/shared';
import { createResourceServer } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { startSweeper } from './storage/sweeper.js';
import { getConfig } from './config/index.js';

// Load configuration
const config = getConfig();
const logger = createLogger(`${config.site}-api`, config.logging.level);

function main(): void {
  const { clientSecret } = config.client;
  if (!clientSecret) {
    throw new Error(`CLIENT_SECRET (or ${config.site.toUpperCase()}_CLIENT_SECRET) must be set`);
  }

  const storage = createMemoryStorage(config.site);

  const { app } = createResourceServer({
    site: config.site,
    publicUrl: config.server.publicUrl,
    idpUrl: config.idp.url,
    idpPublicUrl: config.idp.publicUrl,
    clientId: config.client.clientId,
    clientSecret,
    scope: config.client.scope,
    storage,
    cookieName: config.server.cookieName,
    cookieSecure: config.server.cookieSecure,
    trustProxyCertHeaders: config.server.trustProxyCertHeaders,
    backchannelTimeoutMs: config.idp.timeoutMs,
    idpCaCert: config.idp.caFile ? readFileSync(config.idp.caFile) : undefined,
    loginStateTtl: config.defaults.loginStateTtl,
    enableLogging: config.server.nodeEnv !== 'test',
    logger,
  });

  const stopSweeper = startSweeper(storage, config.defaults.sweepIntervalMs, logger.child('sweeper'));

  const { certFile, keyFile, caFile } = config.tls;
  const onListen = (info: { address: string; port: number }) => {
    logger.info('Resource server listening', {
      site: config.site,
      address: info.address,
      port: info.port,
      tls: certFile !== undefined,
      idp: config.idp.url,
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

try {
  main();
} catch (error) {
  logger.error('Resource server failed to start', { error: describeError(error) });
  process.exit(1);
}
