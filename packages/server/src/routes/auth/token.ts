import { Hono } from 'hono';
import { OAuthError, type TokenResponse } from '@campus-sso/shared';
import type { IdpEnv } from '../../types/hono.js';
import type { IClientRegistry } from '../../storage/interfaces/index.js';
import type { ProtocolServices } from '../../services/index.js';
import { extractClientCredentials } from '../../middleware/client-authenticator.js';
import { createAuthorizationCodeHandler } from '../../grants/authorization-code/handler.js';
import { createRefreshTokenHandler } from '../../grants/refresh-token/handler.js';
import { readRequestParams } from './params.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_AUTHORIZATION,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
} from '../../config/constants.js';

export interface TokenRouteOptions {
  services: ProtocolServices;
  clients: IClientRegistry;
}

/**
 * Create token endpoint routes
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { services, clients } = options;

  const router = new Hono<IdpEnv>();

  // Create grant handlers
  const authorizationCodeHandler = createAuthorizationCodeHandler({
    codeIssuer: services.codeIssuer,
    tokenService: services.tokenService,
  });

  const refreshTokenHandler = createRefreshTokenHandler({
    clients,
    tokenService: services.tokenService,
  });

  // POST /token
  router.post('/', async (c) => {
    // Set cache control headers
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const params = await readRequestParams(c);
    const grantType = params['grant_type'];

    if (!grantType) {
      throw OAuthError.invalidRequest('Missing grant_type parameter');
    }

    if (grantType !== GRANT_TYPE_AUTHORIZATION_CODE && grantType !== GRANT_TYPE_REFRESH_TOKEN) {
      throw OAuthError.unsupportedGrantType(`Unsupported grant type: ${grantType}`);
    }

    const credentials = extractClientCredentials(c.req.header(HEADER_AUTHORIZATION), params);
    if (!credentials) {
      throw OAuthError.clientAuthFailed('Client authentication required');
    }

    const response: TokenResponse =
      grantType === GRANT_TYPE_AUTHORIZATION_CODE
        ? await authorizationCodeHandler(params, credentials)
        : await refreshTokenHandler(params, credentials);

    return c.json(response);
  });

  return router;
}
