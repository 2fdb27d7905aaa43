import { Hono } from 'hono';
import { z } from 'zod';
import { OAuthError, readForwardedFingerprint, type ValidateResponse } from '@campus-sso/shared';
import type { IdpEnv } from '../../types/hono.js';
import type { TokenService } from '../../services/token-service.js';
import { readBearerToken, readRequestParams } from './params.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_AUTHORIZATION,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../../config/constants.js';

export interface ValidateRouteOptions {
  tokenService: TokenService;
  trustProxyCertHeaders: boolean;
}

const validateSchema = z.object({
  access_token: z.string().min(1).optional(),
  client_cert_fingerprint: z.string().optional(),
  client_id: z.string().min(1).optional(),
});

/**
 * Create access token validation routes
 *
 * Resource servers call this on the back channel and forward the browser's
 * certificate fingerprint, since their own connection carries their own
 * certificate.
 */
export function createValidateRoutes(options: ValidateRouteOptions) {
  const { tokenService, trustProxyCertHeaders } = options;

  const router = new Hono<IdpEnv>();

  // POST /validate
  router.post('/', async (c) => {
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const params = validateSchema.parse(await readRequestParams(c));

    const accessToken = params.access_token ?? readBearerToken(c.req.header(HEADER_AUTHORIZATION));
    if (!accessToken) {
      throw OAuthError.invalidRequest('Missing access_token parameter');
    }

    const certFingerprint =
      params.client_cert_fingerprint ??
      (trustProxyCertHeaders ? readForwardedFingerprint((name) => c.req.header(name)) : null) ??
      undefined;

    const result = await tokenService.validate(accessToken, certFingerprint, params.client_id);

    const body: ValidateResponse = {
      active: true,
      subject: result.subject,
      role: result.role,
      scope: result.scope,
      client_id: result.clientId,
      expires_in: result.expiresIn,
    };
    return c.json(body);
  });

  return router;
}
