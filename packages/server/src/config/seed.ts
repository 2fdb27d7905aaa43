import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ROLES, OAuthError, ERROR_USER_EXISTS, type Logger } from '@campus-sso/shared';
import type { ClientRegistrationInput } from '../types/client.js';
import type { IUserStorage } from '../storage/interfaces/index.js';
import { readSecret } from './index.js';

const seedClientSchema = z
  .object({
    client_id: z.string().min(1),
    name: z.string().min(1),
    client_secret: z.string().min(1).optional(),
    client_secret_env: z.string().min(1).optional(),
    redirect_uri: z.string().url(),
    allowed_scopes: z.array(z.string().min(1)).min(1),
    default_scopes: z.array(z.string().min(1)).optional(),
  })
  .refine((client) => (client.default_scopes ?? []).every((scope) => client.allowed_scopes.includes(scope)), {
    message: 'default_scopes must be a subset of allowed_scopes',
  });

const seedUserSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  role: z.enum(ROLES),
  cert_fingerprint: z.string().optional(),
});

const seedSchema = z.object({
  clients: z.array(seedClientSchema),
  users: z.array(seedUserSchema).default([]),
});

export type SeedFile = z.infer<typeof seedSchema>;

/**
 * Seed bundled with the package
 */
export const DEFAULT_SEED_FILE = fileURLToPath(new URL('../../data/seed.json', import.meta.url));

export function parseSeed(raw: unknown): SeedFile {
  return seedSchema.parse(raw);
}

export function loadSeedFile(path: string = DEFAULT_SEED_FILE): SeedFile {
  return parseSeed(JSON.parse(readFileSync(path, 'utf-8')));
}

/**
 * Client registrations with their secrets resolved
 *
 * `client_secret_env` (or its `_FILE` variant) overrides the inline secret.
 */
export function resolveClientInputs(seed: SeedFile): ClientRegistrationInput[] {
  return seed.clients.map((client) => {
    const secret = (client.client_secret_env ? readSecret(client.client_secret_env) : undefined) ?? client.client_secret;
    if (!secret) {
      throw new Error(`No secret configured for client ${client.client_id}`);
    }

    return {
      clientId: client.client_id,
      name: client.name,
      clientSecret: secret,
      redirectUri: client.redirect_uri,
      allowedScopes: client.allowed_scopes,
      defaultScopes: client.default_scopes,
    };
  });
}

/**
 * Create the seed users; existing usernames are left alone
 */
export async function applySeedUsers(seed: SeedFile, users: IUserStorage, logger: Logger): Promise<number> {
  let created = 0;

  for (const user of seed.users) {
    try {
      await users.create({
        username: user.username,
        password: user.password,
        role: user.role,
        certFingerprint: user.cert_fingerprint,
      });
      created++;
    } catch (error) {
      if (error instanceof OAuthError && error.is(ERROR_USER_EXISTS)) {
        logger.debug('Seed user already exists', { username: user.username });
        continue;
      }
      throw error;
    }
  }

  return created;
}
