import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { OAuthError, type CertificateResponse } from '@campus-sso/shared';
import type { IdpEnv } from '../../types/hono.js';
import type { User } from '../../types/user.js';
import type { SessionManager } from '../../services/session-manager.js';
import { readSessionId } from './params.js';
import { MIN_PASSWORD_LENGTH } from '../../config/constants.js';

export interface AccountRouteOptions {
  sessionManager: SessionManager;
}

const passwordSchema = z.object({
  current_password: z.string().min(1),
  new_password: z.string().min(MIN_PASSWORD_LENGTH),
});

function toCertificateResponse(user: User): CertificateResponse {
  return { username: user.username, cert_fingerprint: user.certFingerprint ?? null };
}

/**
 * Create password and certificate rotation routes for the signed-in user
 */
export function createAccountRoutes(options: AccountRouteOptions) {
  const { sessionManager } = options;

  const router = new Hono<IdpEnv>();

  // POST /password
  router.post(
    '/password',
    zValidator('json', passwordSchema, (result) => {
      if (!result.success) {
        throw result.error;
      }
    }),
    async (c) => {
      const input = c.req.valid('json');
      await sessionManager.changePassword(readSessionId(c), input.current_password, input.new_password);
      return c.json({});
    }
  );

  // PUT /certificate binds the certificate presented on this request
  router.put('/certificate', async (c) => {
    const certFingerprint = c.get('certFingerprint');
    if (!certFingerprint) {
      throw OAuthError.invalidRequest('No client certificate presented');
    }

    const user = await sessionManager.bindCertificate(readSessionId(c), certFingerprint);
    return c.json(toCertificateResponse(user));
  });

  // DELETE /certificate
  router.delete('/certificate', async (c) => {
    const user = await sessionManager.bindCertificate(readSessionId(c), null);
    return c.json(toCertificateResponse(user));
  });

  return router;
}
