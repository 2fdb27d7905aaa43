import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { OAuthError, normalizeFingerprint, type RegisterResponse } from '@campus-sso/shared';
import type { IdpEnv } from '../../types/hono.js';
import type { IUserStorage } from '../../storage/interfaces/index.js';
import { USERNAME_PATTERN, MIN_PASSWORD_LENGTH } from '../../config/constants.js';

export interface RegisterRouteOptions {
  users: IUserStorage;
}

// Administrators come from the seed file only
const registerSchema = z.object({
  username: z.string().regex(USERNAME_PATTERN, 'username must be 3-64 letters, digits, dots, dashes or underscores'),
  password: z.string().min(MIN_PASSWORD_LENGTH),
  role: z.enum(['student', 'teacher']).default('student'),
  cert_fingerprint: z.string().optional(),
});

/**
 * Create self-service registration routes
 */
export function createRegisterRoutes(options: RegisterRouteOptions) {
  const { users } = options;

  const router = new Hono<IdpEnv>();

  // POST /register
  router.post(
    '/',
    zValidator('json', registerSchema, (result) => {
      if (!result.success) {
        throw result.error;
      }
    }),
    async (c) => {
      const input = c.req.valid('json');

      let certFingerprint = c.get('certFingerprint');
      if (input.cert_fingerprint !== undefined) {
        const normalized = normalizeFingerprint(input.cert_fingerprint);
        if (!normalized) {
          throw OAuthError.invalidRequest('cert_fingerprint must be a hex SHA-256 fingerprint');
        }
        certFingerprint = normalized;
      }

      const user = await users.create({
        username: input.username,
        password: input.password,
        role: input.role,
        certFingerprint,
      });

      const body: RegisterResponse = {
        username: user.username,
        role: user.role,
        cert_fingerprint: user.certFingerprint ?? null,
      };
      return c.json(body, 201);
    }
  );

  return router;
}
