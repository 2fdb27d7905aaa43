import { Hono } from 'hono';
import { getCookie, setCookie, deleteCookie } from 'hono/cookie';
import { OAuthError, createLogger, type Logger } from '@campus-sso/shared';
import type { ResourceEnv } from '../types/hono.js';
import type { SessionBridge } from '../bridge/session-bridge.js';
import type { SessionAuth } from '../middleware/session-auth.js';
import { LOGIN_FAILED_LOCATION } from '../config/sites.js';

export interface SessionRouteOptions {
  bridge: SessionBridge;
  sessionAuth: SessionAuth;
  cookieName: string;
  cookieSecure: boolean;
  /** Seconds the state cookie lives */
  loginStateTtl: number;
  logger?: Logger;
}

/**
 * Profile of the signed-in user (GET /session/me)
 */
export interface MeResponse {
  subject: string;
  role: string;
  scope: string;
}

/**
 * Name of the cookie binding a login's `state` to the browser that started it
 */
export function stateCookieName(cookieName: string): string {
  return `${cookieName}_state`;
}

/**
 * Create the site's login, callback, logout and profile routes
 */
export function createSessionRoutes(options: SessionRouteOptions) {
  const { bridge, sessionAuth, cookieName, cookieSecure, loginStateTtl } = options;
  const logger = options.logger ?? createLogger('session');
  const stateCookie = stateCookieName(cookieName);

  const router = new Hono<ResourceEnv>();

  const sessionCookieOptions = {
    path: '/',
    httpOnly: true,
    secure: cookieSecure,
    sameSite: 'Lax',
  } as const;

  const stateCookieOptions = { ...sessionCookieOptions, path: '/session' } as const;

  // GET /login
  router.get('/login', async (c) => {
    const { state, authorizeUrl } = await bridge.beginLogin(c.req.query('return_to'));

    setCookie(c, stateCookie, state, { ...stateCookieOptions, maxAge: loginStateTtl });
    c.header('Cache-Control', 'no-store');
    return c.redirect(authorizeUrl, 302);
  });

  // GET /callback
  router.get('/callback', async (c) => {
    const browserState = getCookie(c, stateCookie);
    deleteCookie(c, stateCookie, stateCookieOptions);
    c.header('Cache-Control', 'no-store');

    const error = c.req.query('error');
    if (error) {
      logger.info('Authorization refused by identity provider', { error });
    }

    try {
      const result = await bridge.completeLogin(c.req.query('code'), c.req.query('state'), browserState);

      const maxAge = Math.max(0, Math.floor((result.session.expiresAt.getTime() - Date.now()) / 1000));
      setCookie(c, cookieName, result.sessionId, { ...sessionCookieOptions, maxAge });
      return c.redirect(result.returnTo, 302);
    } catch (err) {
      if (err instanceof OAuthError) {
        return c.redirect(LOGIN_FAILED_LOCATION, 302);
      }
      throw err;
    }
  });

  // POST /logout
  router.post('/logout', async (c) => {
    await bridge.logout(getCookie(c, cookieName));
    deleteCookie(c, cookieName, sessionCookieOptions);
    return c.json({});
  });

  // GET /me
  router.get('/me', sessionAuth(), (c) => {
    const identity = c.get('identity');
    if (!identity) {
      throw OAuthError.serverError('Identity not resolved');
    }

    const body: MeResponse = { subject: identity.subject, role: identity.role, scope: identity.scope };
    return c.json(body);
  });

  return router;
}
