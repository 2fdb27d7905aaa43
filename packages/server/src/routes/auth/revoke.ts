import { Hono } from 'hono';
import { z } from 'zod';
import { OAuthError } from '@campus-sso/shared';
import type { IdpEnv } from '../../types/hono.js';
import type { IClientRegistry } from '../../storage/interfaces/index.js';
import type { TokenService } from '../../services/token-service.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { readRequestParams } from './params.js';

export interface RevokeRouteOptions {
  clients: IClientRegistry;
  tokenService: TokenService;
}

const revokeSchema = z.object({
  token: z.string().min(1),
  token_type_hint: z.enum(['access_token', 'refresh_token']).optional(),
});

/**
 * Create token revocation endpoint routes
 *
 * RFC 7009: the answer is `{}` whether or not the token was known
 */
export function createRevokeRoutes(options: RevokeRouteOptions) {
  const { clients, tokenService } = options;

  const router = new Hono<IdpEnv>();

  // POST /revoke
  router.post('/', clientAuthenticator({ clients }), async (c) => {
    const authenticated = c.get('client');
    if (!authenticated) {
      throw OAuthError.serverError('Client not resolved');
    }

    const { token } = revokeSchema.parse(await readRequestParams(c));

    await tokenService.revoke(token, authenticated.client.clientId);

    return c.json({});
  });

  return router;
}
