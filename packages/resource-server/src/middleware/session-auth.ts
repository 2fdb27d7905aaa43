import type { MiddlewareHandler } from 'hono';
import { getCookie, deleteCookie } from 'hono/cookie';
import { OAuthError, ERROR_DESCRIPTIONS, type AuthenticatedIdentity, type Role } from '@campus-sso/shared';
import type { ResourceEnv } from '../types/hono.js';
import type { ValidationClient } from '../bridge/validation-client.js';
import { LOGIN_PATH } from '../config/sites.js';

export interface SessionAuthOptions {
  /** Every one of these must be granted */
  requiredScopes?: string[];
  allowedRoles?: Role[];
}

export interface SessionAuthFactoryOptions {
  validationClient: ValidationClient;
  cookieName: string;
  cookieSecure: boolean;
}

/**
 * Body of a 401 from a protected route
 */
export interface UnauthenticatedResponse {
  error: 'unauthenticated';
  error_description: string;
  login_url: string;
}

/**
 * Login URL that brings the browser back to `path` afterwards
 */
export function loginUrlFor(path: string): string {
  return `${LOGIN_PATH}?${new URLSearchParams({ return_to: path }).toString()}`;
}

/**
 * Build the `sessionAuth()` middleware factory for one site
 *
 * The returned middleware resolves the site cookie to an identity and sets
 * `identity` in context variables.
 */
export function createSessionAuth(factoryOptions: SessionAuthFactoryOptions) {
  const { validationClient, cookieName, cookieSecure } = factoryOptions;

  return function sessionAuth(options: SessionAuthOptions = {}): MiddlewareHandler<ResourceEnv> {
    const { requiredScopes = [], allowedRoles } = options;

    return async (c, next) => {
      let identity: AuthenticatedIdentity;
      try {
        identity = await validationClient.authenticate(getCookie(c, cookieName), c.get('certFingerprint'));
      } catch (error) {
        if (!(error instanceof OAuthError && error.is('unauthenticated'))) {
          throw error;
        }

        // The reason stays in the logs; browsers only learn that they must sign in again
        deleteCookie(c, cookieName, { path: '/', httpOnly: true, secure: cookieSecure, sameSite: 'Lax' });
        c.header('Cache-Control', 'no-store');
        const body: UnauthenticatedResponse = {
          error: 'unauthenticated',
          error_description: ERROR_DESCRIPTIONS.unauthenticated,
          login_url: loginUrlFor(c.req.path),
        };
        return c.json(body, 401);
      }

      const granted = new Set(identity.scope.split(' ').filter(Boolean));
      const missing = requiredScopes.filter((scope) => !granted.has(scope));
      if (missing.length > 0) {
        throw OAuthError.insufficientScope(`Missing scope: ${missing.join(' ')}`);
      }

      if (allowedRoles && !allowedRoles.includes(identity.role)) {
        throw OAuthError.accessDenied(`Role ${identity.role} may not use this resource`);
      }

      c.set('identity', identity);
      await next();
    };
  };
}

export type SessionAuth = ReturnType<typeof createSessionAuth>;
