import type { Context } from 'hono';
import { getCookie } from 'hono/cookie';
import { OAuthError } from '@campus-sso/shared';
import {
  CONTENT_TYPE_FORM,
  CONTENT_TYPE_JSON,
  HEADER_CONTENT_TYPE,
  HEADER_SESSION_TOKEN,
  SSO_SESSION_COOKIE,
} from '../../config/constants.js';

function stringEntries(body: unknown): Record<string, string> {
  const params: Record<string, string> = {};
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return params;
  }

  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value;
    }
  }
  return params;
}

/**
 * Read string parameters from a JSON or form body
 *
 * Hono caches the parsed body, so middleware and handlers may both call this.
 */
export async function readRequestParams(c: Context): Promise<Record<string, string>> {
  const contentType = c.req.header(HEADER_CONTENT_TYPE) ?? '';

  if (contentType.includes(CONTENT_TYPE_JSON)) {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw OAuthError.invalidRequest('Malformed JSON body');
    }
    return stringEntries(body);
  }

  if (contentType.includes(CONTENT_TYPE_FORM) || contentType.includes('multipart/form-data')) {
    return stringEntries(await c.req.parseBody());
  }

  return {};
}

/**
 * SSO session id from the cookie, or the `X-Session-Token` header for non-browser callers
 */
export function readSessionId(c: Context): string | undefined {
  return getCookie(c, SSO_SESSION_COOKIE) ?? c.req.header(HEADER_SESSION_TOKEN) ?? undefined;
}

/**
 * Bearer token from an Authorization header
 */
export function readBearerToken(authHeader: string | undefined): string | undefined {
  if (!authHeader?.startsWith('Bearer ')) {
    return undefined;
  }
  const token = authHeader.slice(7).trim();
  return token.length > 0 ? token : undefined;
}
