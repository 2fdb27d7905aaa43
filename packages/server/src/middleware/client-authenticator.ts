import type { MiddlewareHandler } from 'hono';
import { OAuthError } from '@campus-sso/shared';
import type { IdpEnv } from '../types/hono.js';
import type { ClientCredentials } from '../types/client.js';
import type { IClientRegistry } from '../storage/interfaces/index.js';
import { readRequestParams } from '../routes/auth/params.js';
import { CLIENT_AUTH_BASIC, CLIENT_AUTH_POST, HEADER_AUTHORIZATION } from '../config/constants.js';

export interface ClientAuthenticatorOptions {
  clients: IClientRegistry;
}

/**
 * Extract client credentials from Basic auth header
 */
export function extractBasicAuth(authHeader: string): { clientId: string; clientSecret: string } | null {
  if (!authHeader.startsWith('Basic ')) {
    return null;
  }

  const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf-8');

  const colonIndex = decoded.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, colonIndex)),
      clientSecret: decodeURIComponent(decoded.slice(colonIndex + 1)),
    };
  } catch {
    return null;
  }
}

/**
 * Client credentials from the Authorization header, or else from the body
 */
export function extractClientCredentials(
  authHeader: string | undefined,
  params: Record<string, string>
): ClientCredentials | null {
  if (authHeader) {
    const basic = extractBasicAuth(authHeader);
    if (basic) {
      return { ...basic, authMethod: CLIENT_AUTH_BASIC };
    }
  }

  const clientId = params['client_id'];
  const clientSecret = params['client_secret'];
  if (clientId && clientSecret) {
    return { clientId, clientSecret, authMethod: CLIENT_AUTH_POST };
  }

  return null;
}

/**
 * Middleware to authenticate resource servers on the back channel
 *
 * Supports:
 * - client_secret_basic: HTTP Basic authentication
 * - client_secret_post: Credentials in a form or JSON body
 *
 * Sets `client` in context variables on success
 */
export function clientAuthenticator(options: ClientAuthenticatorOptions): MiddlewareHandler<IdpEnv> {
  const { clients } = options;

  return async (c, next) => {
    const params = await readRequestParams(c);
    const credentials = extractClientCredentials(c.req.header(HEADER_AUTHORIZATION), params);

    if (!credentials) {
      throw OAuthError.clientAuthFailed('Client authentication required');
    }

    const client = await clients.verifySecret(credentials.clientId, credentials.clientSecret);
    if (!client) {
      throw OAuthError.clientAuthFailed();
    }

    c.set('client', { client, authMethod: credentials.authMethod });

    await next();
  };
}
