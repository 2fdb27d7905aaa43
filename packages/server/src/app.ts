import { Hono } from 'hono';
import {
  clientCertificate,
  createLogger,
  oauthErrorHandler,
  securityHeaders,
  requestLogger,
  type Logger,
} from '@campus-sso/shared';
import type { IdpEnv } from './types/hono.js';
import type { IStorage, IClientRegistry } from './storage/interfaces/index.js';
import { createProtocolServices, type ProtocolServices } from './services/index.js';
import { rateLimiter } from './middleware/rate-limiter.js';
import {
  createSessionRoutes,
  createRegisterRoutes,
  createAccountRoutes,
  createAuthorizeRoutes,
  createTokenRoutes,
  createValidateRoutes,
  createRevokeRoutes,
} from './routes/auth/index.js';
import {
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_REFRESH_TOKEN_TTL,
  DEFAULT_AUTHORIZATION_CODE_TTL,
  DEFAULT_SSO_SESSION_TTL,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
  DEFAULT_RATE_LIMIT_MAX_REQUESTS,
} from './config/constants.js';

export interface IdentityProviderOptions {
  storage: IStorage;
  clients: IClientRegistry;
  /** HMAC secret for access tokens */
  signingSecret: string;
  issuer: string;
  /**
   * Login page the authorize endpoint sends browsers without a session to
   */
  loginUrl?: string;
  accessTokenTtl?: number;
  refreshTokenTtl?: number;
  authorizationCodeTtl?: number;
  ssoSessionTtl?: number;
  cookieSecure?: boolean;
  /**
   * Allow self-service registration at /auth/register
   */
  allowRegistration?: boolean;
  /**
   * Accept client certificate fingerprints forwarded by a TLS-terminating proxy
   */
  trustProxyCertHeaders?: boolean;
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  enableLogging?: boolean;
  logger?: Logger;
}

export interface IdentityProvider {
  app: Hono<IdpEnv>;
  services: ProtocolServices;
}

/**
 * Create the identity provider application
 */
export function createIdentityProvider(options: IdentityProviderOptions): IdentityProvider {
  const {
    storage,
    clients,
    signingSecret,
    issuer,
    loginUrl = '/login',
    accessTokenTtl = DEFAULT_ACCESS_TOKEN_TTL,
    refreshTokenTtl = DEFAULT_REFRESH_TOKEN_TTL,
    authorizationCodeTtl = DEFAULT_AUTHORIZATION_CODE_TTL,
    ssoSessionTtl = DEFAULT_SSO_SESSION_TTL,
    cookieSecure = true,
    allowRegistration = true,
    trustProxyCertHeaders = true,
    rateLimit = { windowMs: DEFAULT_RATE_LIMIT_WINDOW_MS, maxRequests: DEFAULT_RATE_LIMIT_MAX_REQUESTS },
    enableLogging = true,
    logger = createLogger('identity-provider', enableLogging ? undefined : 'silent'),
  } = options;

  const services = createProtocolServices({
    storage,
    clients,
    signingSecret,
    issuer,
    accessTokenTtl,
    refreshTokenTtl,
    authorizationCodeTtl,
    ssoSessionTtl,
    logger,
  });

  const app = new Hono<IdpEnv>();

  // Global error handler
  app.onError(oauthErrorHandler<IdpEnv>(logger.child('http')));

  // Security headers
  app.use('*', securityHeaders<IdpEnv>());

  // Logging
  if (enableLogging) {
    app.use(
      '*',
      requestLogger<IdpEnv>(logger.child('http'), (c) => ({ client: c.get('client')?.client.clientId }))
    );
  }

  // Rate limiting
  app.use('*', rateLimiter(rateLimit));

  // Client certificate fingerprint (TLS peer or proxy headers)
  app.use('/auth/*', clientCertificate({ trustProxyHeaders: trustProxyCertHeaders }));

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  if (allowRegistration) {
    app.route('/auth/register', createRegisterRoutes({ users: storage.users }));
  }

  app.route(
    '/auth',
    createSessionRoutes({ sessionManager: services.sessionManager, ssoSessionTtl, cookieSecure })
  );

  app.route('/auth', createAccountRoutes({ sessionManager: services.sessionManager }));

  app.route('/auth/authorize', createAuthorizeRoutes({ codeIssuer: services.codeIssuer, loginUrl }));

  app.route('/auth/token', createTokenRoutes({ services, clients }));

  app.route(
    '/auth/validate',
    createValidateRoutes({ tokenService: services.tokenService, trustProxyCertHeaders })
  );

  app.route('/auth/revoke', createRevokeRoutes({ clients, tokenService: services.tokenService }));

  return { app, services };
}
