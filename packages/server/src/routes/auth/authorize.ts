import { Hono } from 'hono';
import { z } from 'zod';
import {
  OAuthError,
  ERROR_NO_SESSION,
  ERROR_INVALID_SCOPE,
} from '@campus-sso/shared';
import type { IdpEnv } from '../../types/hono.js';
import type { AuthorizationCodeIssuer } from '../../services/authorization-code-issuer.js';
import { readSessionId } from './params.js';
import { RESPONSE_TYPE_CODE } from '../../config/constants.js';

export interface AuthorizeRouteOptions {
  codeIssuer: AuthorizationCodeIssuer;
  /** Login page; receives `return_to` pointing back at this request */
  loginUrl: string;
}

const authorizeQuerySchema = z.object({
  response_type: z.string().optional(),
  client_id: z.string().min(1),
  redirect_uri: z.string().min(1),
  scope: z.string().optional(),
  state: z.string().optional(),
});

/**
 * Redirect back to the client with an error
 */
function errorRedirectUrl(redirectUri: string, error: OAuthError): string {
  const url = new URL(redirectUri);
  for (const [key, value] of Object.entries(error.toJSON())) {
    if (typeof value === 'string') {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}

function loginRedirectUrl(loginUrl: string, requestUrl: string): string {
  const url = new URL(requestUrl);
  const returnTo = encodeURIComponent(url.pathname + url.search);
  return `${loginUrl}${loginUrl.includes('?') ? '&' : '?'}return_to=${returnTo}`;
}

/**
 * Create authorization endpoint routes
 *
 * Unknown clients and redirect mismatches are answered here with a 400;
 * nothing is ever sent to an unverified redirect URI.
 */
export function createAuthorizeRoutes(options: AuthorizeRouteOptions) {
  const { codeIssuer, loginUrl } = options;

  const router = new Hono<IdpEnv>();

  // GET /authorize
  router.get('/', async (c) => {
    const query = authorizeQuerySchema.parse(c.req.query());

    await codeIssuer.resolveClient(query.client_id, query.redirect_uri);

    const responseType = query.response_type ?? RESPONSE_TYPE_CODE;
    if (responseType !== RESPONSE_TYPE_CODE) {
      const error = OAuthError.unsupportedResponseType(`Unsupported response_type: ${responseType}`, query.state);
      return c.redirect(errorRedirectUrl(query.redirect_uri, error), 302);
    }

    try {
      const issued = await codeIssuer.issue(
        readSessionId(c),
        query.client_id,
        query.redirect_uri,
        query.scope,
        query.state
      );

      const url = new URL(query.redirect_uri);
      url.searchParams.set('code', issued.code);
      if (query.state !== undefined) {
        url.searchParams.set('state', query.state);
      }

      return c.redirect(url.toString(), 302);
    } catch (error) {
      if (error instanceof OAuthError && error.is(ERROR_NO_SESSION)) {
        return c.redirect(loginRedirectUrl(loginUrl, c.req.url), 302);
      }
      if (error instanceof OAuthError && error.is(ERROR_INVALID_SCOPE)) {
        return c.redirect(errorRedirectUrl(query.redirect_uri, error), 302);
      }
      throw error;
    }
  });

  return router;
}
