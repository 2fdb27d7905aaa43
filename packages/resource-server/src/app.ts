import { Hono } from 'hono';
import {
  clientCertificate,
  createLogger,
  oauthErrorHandler,
  securityHeaders,
  requestLogger,
  type Logger,
} from '@campus-sso/shared';
import type { ResourceEnv } from './types/hono.js';
import type { IResourceStorage } from './storage/interfaces/index.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { IdentityProviderClient, type FetchLike } from './client/identity-provider-client.js';
import { SessionBridge } from './bridge/session-bridge.js';
import { ValidationClient } from './bridge/validation-client.js';
import { createSessionAuth, type SessionAuth } from './middleware/session-auth.js';
import { createSessionRoutes } from './routes/session.js';
import {
  SITE_DEFAULTS,
  CALLBACK_PATH,
  DEFAULT_BACKCHANNEL_TIMEOUT_MS,
  DEFAULT_LOGIN_STATE_TTL,
  type SiteName,
} from './config/sites.js';

export interface ResourceServerOptions {
  site: SiteName;
  /** Origin browsers use for this site; the callback URL hangs off it */
  publicUrl: string;
  /** Back-channel base URL of the identity provider */
  idpUrl: string;
  /** Identity provider base URL as browsers reach it */
  idpPublicUrl?: string;
  clientSecret: string;
  clientId?: string;
  scope?: string;
  storage?: IResourceStorage;
  cookieName?: string;
  cookieSecure?: boolean;
  /**
   * Accept client certificate fingerprints forwarded by a TLS-terminating proxy
   */
  trustProxyCertHeaders?: boolean;
  backchannelTimeoutMs?: number;
  /** CA the identity provider's TLS certificate must chain to */
  idpCaCert?: string | Buffer;
  loginStateTtl?: number;
  /** Replaces global `fetch` on the back channel */
  fetch?: FetchLike;
  enableLogging?: boolean;
  logger?: Logger;
}

export interface ResourceServer {
  app: Hono<ResourceEnv>;
  /** Guards business routes mounted on `app` */
  sessionAuth: SessionAuth;
  bridge: SessionBridge;
  validationClient: ValidationClient;
  storage: IResourceStorage;
}

/**
 * Create one site's application: session routes plus the `sessionAuth`
 * guard for the site's own endpoints
 */
export function createResourceServer(options: ResourceServerOptions): ResourceServer {
  const defaults = SITE_DEFAULTS[options.site];
  const {
    site,
    idpUrl,
    clientSecret,
    clientId = defaults.clientId,
    scope = defaults.scope,
    storage = createMemoryStorage(options.site),
    cookieName = defaults.cookieName,
    cookieSecure = true,
    trustProxyCertHeaders = true,
    backchannelTimeoutMs = DEFAULT_BACKCHANNEL_TIMEOUT_MS,
    loginStateTtl = DEFAULT_LOGIN_STATE_TTL,
    enableLogging = true,
    logger = createLogger(`${options.site}-api`, enableLogging ? undefined : 'silent'),
  } = options;

  const publicUrl = options.publicUrl.replace(/\/+$/, '');
  const idpPublicUrl = (options.idpPublicUrl ?? idpUrl).replace(/\/+$/, '');

  const idp = new IdentityProviderClient({
    baseUrl: idpUrl,
    clientId,
    clientSecret,
    timeoutMs: backchannelTimeoutMs,
    caCert: options.idpCaCert,
    fetch: options.fetch,
    logger: logger.child('idp-client'),
  });

  const bridge = new SessionBridge({
    storage,
    idp,
    authorizeEndpoint: `${idpPublicUrl}/auth/authorize`,
    redirectUri: `${publicUrl}${CALLBACK_PATH}`,
    scope,
    loginStateTtl,
    logger: logger.child('bridge'),
  });

  const validationClient = new ValidationClient({
    sessions: storage.sessions,
    idp,
    logger: logger.child('validation'),
  });

  const sessionAuth = createSessionAuth({ validationClient, cookieName, cookieSecure });

  const app = new Hono<ResourceEnv>();

  app.onError(oauthErrorHandler<ResourceEnv>(logger.child('http')));

  app.use('*', securityHeaders<ResourceEnv>());

  if (enableLogging) {
    app.use('*', requestLogger<ResourceEnv>(logger.child('http'), (c) => ({ subject: c.get('identity')?.subject })));
  }

  // Browser certificate, forwarded to the identity provider on validation
  app.use('*', clientCertificate({ trustProxyHeaders: trustProxyCertHeaders }));

  app.get('/health', (c) => c.json({ status: 'ok', site }));

  app.route(
    '/session',
    createSessionRoutes({
      bridge,
      sessionAuth,
      cookieName,
      cookieSecure,
      loginStateTtl,
      logger: logger.child('session'),
    })
  );

  return { app, sessionAuth, bridge, validationClient, storage };
}
