import * as jose from 'jose';
import { z } from 'zod';
import type { AccessTokenPayload } from '../types/token.js';
import { ACCESS_TOKEN_ALGORITHM, ACCESS_TOKEN_TYP } from '../config/constants.js';

/**
 * HS256 access token signing and verification using jose
 */

const accessTokenClaimsSchema = z.object({
  iss: z.string(),
  sub: z.string(),
  aud: z.string(),
  exp: z.number(),
  iat: z.number(),
  jti: z.string(),
  client_id: z.string(),
  scope: z.string(),
  fam: z.string(),
  cnf: z.object({ 'x5t#S256': z.string() }).optional(),
});

export type AccessTokenVerification =
  | { valid: true; payload: AccessTokenPayload }
  | { valid: false; reason: 'expired'; jti: string | undefined }
  | { valid: false; reason: 'invalid' };

/**
 * Turn the shared secret into key material
 */
export function createSigningKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Sign a JWT access token
 */
export async function signAccessToken(payload: AccessTokenPayload, key: Uint8Array): Promise<string> {
  return new jose.SignJWT({ ...payload })
    .setProtectedHeader({
      alg: ACCESS_TOKEN_ALGORITHM,
      typ: ACCESS_TOKEN_TYP, // RFC 9068 JWT Profile for OAuth 2.0 Access Tokens
    })
    .sign(key);
}

/**
 * Verify an access token's signature, issuer and expiry
 *
 * An expired token still had a good signature, so its `jti` is reported
 * for the caller to look up.
 */
export async function verifyAccessToken(
  token: string,
  key: Uint8Array,
  issuer: string
): Promise<AccessTokenVerification> {
  try {
    const { payload } = await jose.jwtVerify(token, key, {
      issuer,
      algorithms: [ACCESS_TOKEN_ALGORITHM],
      typ: ACCESS_TOKEN_TYP,
    });

    const claims = accessTokenClaimsSchema.safeParse(payload);
    return claims.success ? { valid: true, payload: claims.data } : { valid: false, reason: 'invalid' };
  } catch (error) {
    if (error instanceof jose.errors.JWTExpired) {
      const jti = error.payload.jti;
      return { valid: false, reason: 'expired', jti: typeof jti === 'string' ? jti : undefined };
    }
    if (error instanceof jose.errors.JOSEError) {
      return { valid: false, reason: 'invalid' };
    }
    throw error;
  }
}
