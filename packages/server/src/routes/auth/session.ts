import { Hono } from 'hono';
import { setCookie, deleteCookie } from 'hono/cookie';
import { z } from 'zod';
import { safeReturnTo, type LoginResponse, type SessionResponse } from '@campus-sso/shared';
import type { IdpEnv } from '../../types/hono.js';
import type { SessionManager } from '../../services/session-manager.js';
import { readRequestParams, readSessionId } from './params.js';
import { SSO_SESSION_COOKIE } from '../../config/constants.js';

export interface SessionRouteOptions {
  sessionManager: SessionManager;
  /** SSO session lifetime in seconds, used as the cookie max-age */
  ssoSessionTtl: number;
  cookieSecure: boolean;
}

const loginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  return_to: z.string().optional(),
});

/**
 * Create login, logout and session lookup routes
 */
export function createSessionRoutes(options: SessionRouteOptions) {
  const { sessionManager, ssoSessionTtl, cookieSecure } = options;

  const router = new Hono<IdpEnv>();

  const cookieOptions = {
    path: '/',
    httpOnly: true,
    secure: cookieSecure,
    sameSite: 'Lax',
  } as const;

  // POST /login
  router.post('/login', async (c) => {
    const input = loginSchema.parse(await readRequestParams(c));

    const session = await sessionManager.login(input.username, input.password, c.get('certFingerprint'));
    // One SSO session per browser: the one this browser held before ends here
    await sessionManager.logout(readSessionId(c));

    setCookie(c, SSO_SESSION_COOKIE, session.sessionId, { ...cookieOptions, maxAge: ssoSessionTtl });

    const returnTo = safeReturnTo(input.return_to);
    if (returnTo) {
      return c.redirect(returnTo, 302);
    }

    const body: LoginResponse = { subject: session.subject, expires_in: ssoSessionTtl };
    return c.json(body);
  });

  // GET /session
  router.get('/session', async (c) => {
    const identity = await sessionManager.currentSubject(readSessionId(c));
    const body: SessionResponse = { subject: identity.subject, role: identity.role };
    return c.json(body);
  });

  // POST /logout
  router.post('/logout', async (c) => {
    await sessionManager.logout(readSessionId(c));
    deleteCookie(c, SSO_SESSION_COOKIE, cookieOptions);
    return c.json({});
  });

  return router;
}
